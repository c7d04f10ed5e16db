import { extractPublishTimeFromHtml, extractPublishTimeFromJson } from './extract.js';
import { toIsoTimestamp } from '../shared/time.js';
import { FetchError, errorMessage } from '../shared/errors.js';
import { DEFAULT_USER_AGENT } from '../shared/config.js';
import { logger } from '../shared/logger.js';

/**
 * Looks up the publish time of one article. Resolves null when the page has
 * none; rejects with FetchError when the page could not be fetched.
 */
export interface PublishTimeFetcher {
  fetchPublishTime(url: string, signal?: AbortSignal): Promise<string | null>;
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
  /** Page bodies are cut to this many characters before parsing. */
  maxBodyChars?: number;
}

interface FetchedBody {
  contentType: string;
  body: string;
}

const HN_ITEM_API = 'https://hacker-news.firebaseio.com/v0/item';

/**
 * Item id of a Hacker News discussion URL (`news.ycombinator.com/item?id=N`).
 */
export function hackerNewsItemId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!parsed.hostname.toLowerCase().endsWith('news.ycombinator.com')) return null;
  const id = parsed.searchParams.get('id') ?? '';
  return /^\d+$/.test(id) ? id : null;
}

export class HttpPublishTimeFetcher implements PublishTimeFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxBodyChars: number;

  constructor(options: HttpFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxBodyChars = options.maxBodyChars ?? 800_000;
  }

  async fetchPublishTime(url: string, signal?: AbortSignal): Promise<string | null> {
    const itemId = hackerNewsItemId(url);
    if (itemId) {
      const fromApi = await this.fromHackerNewsApi(itemId, signal);
      if (fromApi) return fromApi;
    }

    const { contentType, body } = await this.request(
      url,
      'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      signal,
    );

    if (contentType.includes('application/json')) {
      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        return null;
      }
      return extractPublishTimeFromJson(payload);
    }

    return extractPublishTimeFromHtml(body.slice(0, this.maxBodyChars));
  }

  private async fromHackerNewsApi(itemId: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const { body } = await this.request(`${HN_ITEM_API}/${itemId}.json`, 'application/json', signal);
      const payload: unknown = JSON.parse(body);
      if (payload !== null && typeof payload === 'object' && 'time' in payload) {
        return toIsoTimestamp(payload.time);
      }
      return null;
    } catch (err) {
      if (err instanceof FetchError && err.reason === 'aborted') throw err;
      // fall back to fetching the discussion page itself
      logger.debug({ itemId, error: errorMessage(err) }, 'Hacker News item lookup failed');
      return null;
    }
  }

  /**
   * GET a URL and read its body, all within the per-request timeout.
   */
  private async request(url: string, accept: string, signal?: AbortSignal): Promise<FetchedBody> {
    if (signal?.aborted) {
      throw new FetchError(`Fetch aborted before start: ${url}`, 'aborted', { url });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: accept,
          'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
          'Cache-Control': 'no-cache',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Page fetch failed: ${response.status} from ${url}`, 'http', {
          url,
          status: response.status,
        });
      }

      const body = await response.text();
      return { contentType: (response.headers.get('content-type') ?? '').toLowerCase(), body };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (signal?.aborted) {
        throw new FetchError(`Fetch aborted: ${url}`, 'aborted', { url });
      }
      if (controller.signal.aborted) {
        throw new FetchError(`Page fetch timed out after ${this.timeoutMs}ms: ${url}`, 'timeout', {
          url,
          timeout: this.timeoutMs,
        });
      }
      throw new FetchError(`Page fetch failed: ${errorMessage(err)}`, 'network', { url });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
