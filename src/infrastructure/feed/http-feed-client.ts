import type { FetchResult } from '../../application/feed-schema.js';
import { parseFeedPayload } from '../../application/feed-schema.js';
import type { FeedSource } from '../../application/feed-source.js';
import type { PipelineLog } from '../../application/pipeline-orchestrator.js';
import { FetchError } from '../../domain/index.js';

export type HttpFeedClientOptions = Readonly<{
  url: string;
  timeoutMs: number;
  log: PipelineLog;
  /** Injectable for tests; defaults to the global fetch. */
  fetchFn?: typeof fetch;
}>;

function isTimeout(err: unknown): boolean {
  return typeof err === 'object'
    && err !== null
    && 'name' in err
    && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function transportError(err: unknown, timeoutMs: number): FetchError {
  if (isTimeout(err)) {
    return new FetchError('transient', 'timeout', `Feed request timed out after ${timeoutMs}ms`, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new FetchError('transient', 'network', `Feed request failed: ${detail}`, { cause: err });
}

/**
 * 5xx, 408 Request Timeout and 429 Too Many Requests are worth retrying;
 * any other non-success status will not fix itself.
 */
function statusError(status: number): FetchError {
  const transient = status >= 500 || status === 408 || status === 429;
  return new FetchError(
    transient ? 'transient' : 'permanent',
    'http_status',
    `Feed responded with HTTP ${status}`,
    { status },
  );
}

/**
 * Fetches the feed with one bounded GET per call.
 *
 * Never throws and never retries: every failure comes back as a
 * classified FetchError for the orchestrator to act on.
 */
export class HttpFeedClient implements FeedSource {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly log: PipelineLog;
  private readonly fetchFn: typeof fetch;

  constructor(opts: HttpFeedClientOptions) {
    this.url = opts.url;
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.log;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async fetch(): Promise<FetchResult> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    let text: string;
    try {
      const response = await this.fetchFn(this.url, {
        method: 'GET',
        headers: { Accept: 'application/geo+json, application/json' },
        signal,
      });

      if (!response.ok) {
        // Release the connection; the error body is not read.
        await response.body?.cancel();
        return { ok: false, error: statusError(response.status) };
      }

      text = await response.text();
    } catch (err: unknown) {
      return { ok: false, error: transportError(err, this.timeoutMs) };
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err: unknown) {
      return {
        ok: false,
        error: new FetchError('permanent', 'unparsable_payload', 'Feed body is not valid JSON', { cause: err }),
      };
    }

    const result = parseFeedPayload(body);

    if (result.ok) {
      this.log.debug(
        { url: this.url, fetched: result.events.length, skipped: result.skipped },
        'Feed fetched',
      );
      if (result.skipped > 0) {
        this.log.warn({ url: this.url, skipped: result.skipped }, 'Skipped malformed feed features');
      }
    }

    return result;
  }
}
