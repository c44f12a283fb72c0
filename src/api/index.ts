// REST endpoints (Fastify)
export type { ApiError, ApiResponse, RouteDependencies } from './types.js';

export { registerErrorHandler, sendSuccess, sendError, sendNotFound } from './error-handler.js';
export { paginate, paginationSchema } from './pagination.js';
export type { PaginatedResponse, PaginationQuery } from './pagination.js';
export { registerRoutes } from './routes/index.js';
export { createServer } from './server.js';
export type { ServerOptions } from './server.js';
