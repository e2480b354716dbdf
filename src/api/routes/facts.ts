import type { FastifyInstance } from 'fastify';
import type { FactRecord } from '../../types/fact.js';
import { factsSchemas } from '../schemas/fact.js';

interface MaterializeBody {
  schema?: string;
  facts: unknown;
}

export interface MaterializedFact {
  index: number;
  factType: string;
  fields: FactRecord;
}

export interface MaterializeFailure {
  index: number;
  code: string;
  message: string;
}

export interface MaterializeResponse {
  facts: MaterializedFact[];
  errors: MaterializeFailure[];
}

export async function registerFactsRoutes(fastify: FastifyInstance): Promise<void> {
  const materializer = fastify.materializer;

  // POST /facts/materialize - JSON facts to typed facts, per-position results
  fastify.post<{ Body: MaterializeBody }>(
    '/facts/materialize',
    { schema: factsSchemas.materialize },
    async (request): Promise<MaterializeResponse> => {
      const outcomes = materializer.fromValue(request.body.facts, request.body.schema);

      const response: MaterializeResponse = { facts: [], errors: [] };
      for (const outcome of outcomes) {
        if (outcome.status === 'fulfilled') {
          response.facts.push({
            index: outcome.index,
            factType: outcome.fact.factType,
            fields: outcome.fact.toRecord()
          });
        } else {
          response.errors.push({
            index: outcome.index,
            code: outcome.error.code,
            message: outcome.error.message
          });
        }
      }
      return response;
    }
  );
}
