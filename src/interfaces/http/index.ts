export { default as queryRoutes } from './query-routes.js';
export { default as snapshotRoutes } from './snapshot-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
