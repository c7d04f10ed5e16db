#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getNewsfoldDir, resolvePath } from '../shared/utils.js';
import { NewsfoldError, InputError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { recordsFromObservations } from '../news/record.js';
import { openCacheStore } from '../enrich/cacheStore.js';
import { runDigest } from '../pipeline.js';

const program = new Command();

program
  .name('newsfold')
  .description('Merge cross-source hotlist items and fill in their publish times')
  .version('0.1.0');

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return n;
}

function readObservations(file: string): unknown {
  const resolved = resolvePath(file);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new InputError(`Cannot read input file: ${resolved}`, { cause: errorMessage(err) });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InputError(`Input file is not valid JSON: ${resolved}`, { cause: errorMessage(err) });
  }
}

// === init ===
program
  .command('init')
  .description('Create ~/.newsfold/config.yaml with default settings')
  .action(() => {
    const configPath = path.join(getNewsfoldDir(), 'config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === digest ===
program
  .command('digest <input>')
  .description('Dedup a JSON array of crawler observations and enrich publish times')
  .option('-o, --output <file>', 'Write merged records here instead of stdout')
  .option('--no-enrich', 'Skip publish time enrichment')
  .option('--max-fetch <n>', 'Override enrich.max_fetch_per_run', parseNonNegativeInt)
  .action(async (input: string, opts: { output?: string; enrich: boolean; maxFetch?: number }) => {
    const loaded = await loadConfig();
    const config: Config = {
      ...loaded,
      enrich: {
        ...loaded.enrich,
        enabled: loaded.enrich.enabled && opts.enrich,
        max_fetch_per_run: opts.maxFetch ?? loaded.enrich.max_fetch_per_run,
      },
    };

    const records = recordsFromObservations(readObservations(input));
    const result = await runDigest(records, config);

    const json = JSON.stringify(result.records, null, 2);
    if (opts.output) {
      const outPath = resolvePath(opts.output);
      fs.mkdirSync(path.dirname(outPath), { recursive: true });
      fs.writeFileSync(outPath, json + '\n', 'utf-8');
      log(`✓ ${result.records.length} records written to ${outPath}`, true);
    } else {
      process.stdout.write(json + '\n');
    }

    const enriched = result.enrich
      ? `, ${result.enrich.cache_hit + result.enrich.fetched_success} publish times filled`
      : ', enrichment skipped';
    log(`✓ ${records.length} observations → ${result.records.length} records (${result.merge_count} merged)${enriched}`, true);
  });

// === cache ===
const cacheCmd = program.command('cache').description('Inspect the publish time cache');

cacheCmd
  .command('stats')
  .description('Show hit and miss counts')
  .action(async () => {
    const config = await loadConfig();
    const store = openCacheStore(config.cache.path);
    try {
      const { hits, misses } = store.stats();
      log(`${resolvePath(config.cache.path)}: ${hits} hits, ${misses} misses`);
    } finally {
      store.close();
    }
  });

cacheCmd
  .command('prune')
  .description('Delete misses older than enrich.miss_ttl_hours')
  .action(async () => {
    const config = await loadConfig();
    const store = openCacheStore(config.cache.path);
    try {
      const removed = store.pruneExpiredMisses(new Date(), config.enrich.miss_ttl_hours);
      log(`✓ ${removed} expired misses removed`);
    } finally {
      store.close();
    }
  });

function log(msg: string, toStderr = false): void {
  if (toStderr) {
    process.stderr.write(msg + '\n');
    return;
  }
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof NewsfoldError) {
    logger.error({ code: err.code, ...err.details }, err.message);
  } else {
    logger.error({ error: errorMessage(err) }, 'Command failed');
  }
  process.exitCode = 1;
});
