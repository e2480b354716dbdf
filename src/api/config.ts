import type { FastifyServerOptions } from 'fastify';

/**
 * CORS configuration of the API server, handed to `@fastify/cors`.
 */
export interface CorsConfig {
  /**
   * Allowed origins.
   *
   * - `true` - any origin (Access-Control-Allow-Origin: *)
   * - `false` - CORS off
   * - `string` / `string[]` - listed origins
   * - `RegExp` - origins matching the pattern
   * - `(origin) => boolean` - decided per request
   *
   * Default: true
   */
  origin?: boolean | string | string[] | RegExp | ((origin: string | undefined) => boolean);

  /** Default: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'] */
  methods?: string[];

  /** Default: ['Content-Type', 'Authorization', 'X-Requested-With'] */
  allowedHeaders?: string[];

  /** Headers readable by browser scripts. Default: ['X-Request-Id'] */
  exposedHeaders?: string[];

  /**
   * Allow cookies and authorization headers. Requires a concrete origin.
   *
   * Default: false
   */
  credentials?: boolean;

  /** Preflight cache lifetime in seconds. Default: 86400 */
  maxAge?: number;

  /** Pass preflight requests on to route handlers. Default: false */
  preflightContinue?: boolean;

  /** Status of a successful OPTIONS response. Default: 204 */
  optionsSuccessStatus?: number;
}

export interface ServerConfig {
  /** Listening port (default: 3000) */
  port: number;

  /** Host address (default: '0.0.0.0') */
  host: string;

  /** Prefix of every API route (default: '/api/v1') */
  apiPrefix: string;

  /**
   * - `true` - CORS with the defaults
   * - `false` - CORS off
   * - `CorsConfig` - explicit settings
   *
   * Default: true
   */
  cors: boolean | CorsConfig;

  /** Fastify's pino request logging (default: true) */
  logger: boolean;

  /** Extra Fastify options */
  fastifyOptions: Omit<FastifyServerOptions, 'logger'> | undefined;
}

export type ServerConfigInput = Partial<ServerConfig>;

const DEFAULT_CORS_CONFIG: Required<CorsConfig> = {
  origin: true,
  methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  exposedHeaders: ['X-Request-Id'],
  credentials: false,
  maxAge: 86400,
  preflightContinue: false,
  optionsSuccessStatus: 204
};

// @fastify/cors reflects the request origin for `true`; any origin means '*'
function toCorsOrigin(origin: Required<CorsConfig>['origin']): Required<CorsConfig>['origin'] {
  return origin === true ? '*' : origin;
}

/**
 * Resolves the CORS input into `@fastify/cors` options, or `false` when CORS
 * is off.
 */
export function resolveCorsConfig(
  input: boolean | CorsConfig | undefined
): false | Required<CorsConfig> {
  if (input === false) {
    return false;
  }

  if (input === true || input === undefined) {
    return { ...DEFAULT_CORS_CONFIG, origin: toCorsOrigin(DEFAULT_CORS_CONFIG.origin) };
  }

  return {
    origin: toCorsOrigin(input.origin ?? DEFAULT_CORS_CONFIG.origin),
    methods: input.methods ?? DEFAULT_CORS_CONFIG.methods,
    allowedHeaders: input.allowedHeaders ?? DEFAULT_CORS_CONFIG.allowedHeaders,
    exposedHeaders: input.exposedHeaders ?? DEFAULT_CORS_CONFIG.exposedHeaders,
    credentials: input.credentials ?? DEFAULT_CORS_CONFIG.credentials,
    maxAge: input.maxAge ?? DEFAULT_CORS_CONFIG.maxAge,
    preflightContinue: input.preflightContinue ?? DEFAULT_CORS_CONFIG.preflightContinue,
    optionsSuccessStatus: input.optionsSuccessStatus ?? DEFAULT_CORS_CONFIG.optionsSuccessStatus
  };
}

export function resolveConfig(input: ServerConfigInput = {}): ServerConfig {
  return {
    port: input.port ?? 3000,
    host: input.host ?? '0.0.0.0',
    apiPrefix: input.apiPrefix ?? '/api/v1',
    cors: input.cors ?? true,
    logger: input.logger ?? true,
    fastifyOptions: input.fastifyOptions
  };
}
