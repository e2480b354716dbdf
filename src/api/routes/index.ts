import type { FastifyInstance } from 'fastify';
import type { SchemaRegistry } from '../../core/schema-registry.js';
import type { FactMaterializer } from '../../core/fact-materializer.js';
import { registerHealthRoutes } from './health.js';
import { registerSchemasRoutes } from './schemas.js';
import { registerFactsRoutes } from './facts.js';

export interface RouteContext {
  registry: SchemaRegistry;
  materializer: FactMaterializer;
}

export async function registerRoutes(
  fastify: FastifyInstance,
  context: RouteContext
): Promise<void> {
  fastify.decorate('registry', context.registry);
  fastify.decorate('materializer', context.materializer);

  await registerHealthRoutes(fastify);
  await registerSchemasRoutes(fastify);
  await registerFactsRoutes(fastify);
}

declare module 'fastify' {
  interface FastifyInstance {
    registry: SchemaRegistry;
    materializer: FactMaterializer;
  }
}
