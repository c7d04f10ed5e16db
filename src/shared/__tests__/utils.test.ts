import { describe, it, expect } from 'vitest';
import { resolvePath, getPackageRoot, getNewsfoldDir } from '../utils.js';
import { homedir } from 'node:os';
import fs from 'node:fs';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    const result = resolvePath('~/test');
    expect(result).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    const result = resolvePath('~');
    expect(result).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    const result = resolvePath('./foo/bar');
    expect(path.isAbsolute(result)).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    const result = resolvePath('/absolute/path');
    expect(result).toBe('/absolute/path');
  });
});

describe('getPackageRoot', () => {
  it('returns the directory holding package.json', () => {
    const root = getPackageRoot();
    expect(fs.existsSync(path.join(root, 'package.json'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'src', 'db', 'migrations'))).toBe(true);
  });
});

describe('getNewsfoldDir', () => {
  it('lives under the home directory', () => {
    expect(getNewsfoldDir()).toBe(path.join(homedir(), '.newsfold'));
  });
});
