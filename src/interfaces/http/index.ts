export { default as statsRoutes } from './stats-routes.js';
export type { StatsRoutesOptions } from './stats-routes.js';
