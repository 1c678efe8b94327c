import type { FetchResult } from './feed-schema.js';

/**
 * Anything that can produce one batch of feed events per call.
 *
 * Implementations report failures through the result rather than
 * throwing, and never retry on their own.
 */
export interface FeedSource {
  fetch(): Promise<FetchResult>;
}
