/**
 * HTTP Module
 */

export type { RouteDependencies } from './routes.js';

export { createRoutes, errorHandler, toWorkflowResponse } from './routes.js';
