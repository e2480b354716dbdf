/**
 * JSON schemas of the health and stats endpoints.
 */

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded', 'error'] },
    timestamp: { type: 'number' },
    uptime: { type: 'number' },
    strategy: { type: 'string', enum: ['compiled', 'proxy'] }
  },
  required: ['status', 'timestamp', 'uptime', 'strategy']
} as const;

export const statsResponseSchema = {
  type: 'object',
  properties: {
    timestamp: { type: 'number' },
    materializer: {
      type: 'object',
      properties: {
        strategy: { type: 'string' },
        materialized: { type: 'number' },
        failed: { type: 'number' },
        compiled: { type: 'number' },
        compileFailures: { type: 'number' },
        cacheHits: { type: 'number' },
        cacheMisses: { type: 'number' },
        fallbacks: { type: 'number' },
        cacheSize: { type: 'number' }
      }
    },
    registry: {
      type: 'object',
      properties: {
        total: { type: 'number' },
        byKind: { type: 'object', additionalProperties: { type: 'number' } }
      }
    }
  },
  required: ['timestamp', 'materializer', 'registry']
} as const;

export const healthSchemas = {
  health: {
    summary: 'Health check',
    response: {
      200: healthResponseSchema
    }
  },
  stats: {
    summary: 'Materializer and registry statistics',
    response: {
      200: statsResponseSchema
    }
  }
};
