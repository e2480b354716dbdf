import Fastify, { type FastifyInstance, type InjectOptions, type LightMyRequestResponse } from 'fastify';
import cors from '@fastify/cors';
import { SchemaRegistry } from '../core/schema-registry.js';
import { FactMaterializer, type FactMaterializerConfig } from '../core/fact-materializer.js';
import {
  resolveConfig,
  resolveCorsConfig,
  type ServerConfig,
  type ServerConfigInput
} from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { registerRoutes } from './routes/index.js';

export interface ServerOptions {
  /** HTTP server configuration */
  server?: ServerConfigInput;

  /** Existing registry (a new, empty one is created otherwise) */
  registry?: SchemaRegistry;

  /** Configuration of the materializer the server creates over the registry */
  materializerConfig?: FactMaterializerConfig;
}

/**
 * Fastify server exposing schema management and fact materialization.
 *
 * `create()` builds a ready app without listening (for `inject()`), `start()`
 * additionally binds the port.
 */
export class FactMaterializerServer {
  private readonly fastify: FastifyInstance;
  private readonly registry: SchemaRegistry;
  private readonly materializer: FactMaterializer;
  private readonly config: ServerConfig;

  private constructor(
    fastify: FastifyInstance,
    registry: SchemaRegistry,
    materializer: FactMaterializer,
    config: ServerConfig,
  ) {
    this.fastify = fastify;
    this.registry = registry;
    this.materializer = materializer;
    this.config = config;
  }

  static async create(options: ServerOptions = {}): Promise<FactMaterializerServer> {
    const config = resolveConfig(options.server);

    const fastify = Fastify({
      logger: config.logger,
      ajv: {
        customOptions: {
          coerceTypes: false,
          removeAdditional: false,
          useDefaults: true,
          allErrors: true,
          // field defaults take string, number, boolean or null
          allowUnionTypes: true
        }
      },
      ...config.fastifyOptions
    });

    fastify.setErrorHandler(errorHandler);

    const corsConfig = resolveCorsConfig(config.cors);
    if (corsConfig !== false) {
      await fastify.register(cors, {
        origin: corsConfig.origin,
        methods: corsConfig.methods,
        allowedHeaders: corsConfig.allowedHeaders,
        exposedHeaders: corsConfig.exposedHeaders,
        credentials: corsConfig.credentials,
        maxAge: corsConfig.maxAge,
        preflightContinue: corsConfig.preflightContinue,
        optionsSuccessStatus: corsConfig.optionsSuccessStatus
      });
    }

    const registry = options.registry ?? new SchemaRegistry();
    const materializer = new FactMaterializer(registry, options.materializerConfig);

    await fastify.register(
      async (instance) => {
        await registerRoutes(instance, { registry, materializer });
      },
      { prefix: config.apiPrefix }
    );

    await fastify.ready();

    return new FactMaterializerServer(fastify, registry, materializer, config);
  }

  static async start(options: ServerOptions = {}): Promise<FactMaterializerServer> {
    const server = await FactMaterializerServer.create(options);
    try {
      await server.fastify.listen({ port: server.config.port, host: server.config.host });
    } catch (err) {
      await server.stop();
      throw err;
    }
    return server;
  }

  getRegistry(): SchemaRegistry {
    return this.registry;
  }

  getMaterializer(): FactMaterializer {
    return this.materializer;
  }

  /** In-process request, no socket involved. */
  inject(options: InjectOptions | string): Promise<LightMyRequestResponse> {
    return this.fastify.inject(options);
  }

  get address(): string {
    const addr = this.fastify.server.address();
    if (typeof addr === 'string') {
      return addr;
    }
    if (addr) {
      return `http://${addr.address === '::' ? 'localhost' : addr.address}:${addr.port}`;
    }
    return '';
  }

  get port(): number {
    return this.config.port;
  }

  async stop(): Promise<void> {
    this.materializer.dispose();
    await this.fastify.close();
  }
}
