export { authPlugin } from './plugin.js';
export type { AuthPluginOptions } from './plugin.js';
export { requireAuth } from './middleware.js';
