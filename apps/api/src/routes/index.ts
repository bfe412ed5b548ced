/**
 * Routes Index
 *
 * Barrel export for all API routes.
 */

export { healthRoutes } from './health.js';
export { authRoutes } from './auth.js';
export { userRoutes } from './user.js';
export { downloadRoutes } from './downloads.js';
export { watcherRoutes } from './watcher.js';
export { libraryRoutes } from './library.js';
