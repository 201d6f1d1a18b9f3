export { createAuthRouter } from './plugin.js';
export type { AuthRouterOptions } from './plugin.js';
export { requireAuth } from './middleware.js';
