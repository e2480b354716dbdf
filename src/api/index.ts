export { FactMaterializerServer, type ServerOptions } from './server.js';
export { resolveConfig, resolveCorsConfig, type ServerConfig, type ServerConfigInput, type CorsConfig } from './config.js';
export { errorHandler, NotFoundError, type ApiError } from './middleware/error-handler.js';
export type { RouteContext } from './routes/index.js';
