import type { FastifyInstance } from 'fastify';
import type { MaterializationStrategy, MaterializerStats } from '../../core/fact-materializer.js';
import { healthSchemas } from '../schemas/health.js';

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: number;
  uptime: number;
  strategy: MaterializationStrategy;
}

export interface StatsResponse {
  timestamp: number;
  materializer: MaterializerStats;
  registry: {
    total: number;
    byKind: Record<string, number>;
  };
}

export async function registerHealthRoutes(fastify: FastifyInstance): Promise<void> {
  const { materializer, registry } = fastify;

  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: healthSchemas.health },
    async (): Promise<HealthResponse> => {
      const stats = materializer.getStats();

      return {
        // Running on proxies after the compiler could not be loaded
        status: stats.fallbacks > 0 ? 'degraded' : 'ok',
        timestamp: Date.now(),
        uptime: process.uptime(),
        strategy: stats.strategy
      };
    }
  );

  fastify.get<{ Reply: StatsResponse }>(
    '/stats',
    { schema: healthSchemas.stats },
    async (): Promise<StatsResponse> => {
      const summary = registry.summary();
      const byKind = Object.fromEntries(
        Object.entries(summary.byKind).map(([kind, names]) => [kind, names.length])
      );

      return {
        timestamp: Date.now(),
        materializer: materializer.getStats(),
        registry: { total: summary.total, byKind }
      };
    }
  );
}
