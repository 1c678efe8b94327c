export { HttpFeedClient } from './http-feed-client.js';
export type { HttpFeedClientOptions } from './http-feed-client.js';
