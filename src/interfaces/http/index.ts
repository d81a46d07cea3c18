export { default as pixelRoutes, NO_CACHE_HEADERS } from './pixel-routes.js';
export { default as clickRoutes } from './click-routes.js';
export { default as reportRoutes } from './report-routes.js';
export { default as healthRoutes } from './health-routes.js';
