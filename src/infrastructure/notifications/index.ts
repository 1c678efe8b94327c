export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { toNotificationPayload } from './payload.js';
export type { NotificationChannel, RecommendationNotificationPayload } from './payload.js';
export { createSlackChannel, buildSlackMessage, formatCondition } from './slack.js';
export type { SlackBlock, SlackMessage } from './slack.js';
export {
  createNotificationDispatcher,
  createRecommendationNotifier,
  recommendationFingerprint,
  newlyRaised,
} from './dispatcher.js';
