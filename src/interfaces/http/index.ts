export { default as statusRoutes } from './status-routes.js';
