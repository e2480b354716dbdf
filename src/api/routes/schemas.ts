import type { FastifyInstance } from 'fastify';
import type { FieldValue } from '../../types/fact.js';
import type { DefinitionInput, FieldType, ObjectSchemaInput, SchemaDefinition } from '../../types/schema.js';
import { NotFoundError } from '../middleware/error-handler.js';
import { schemasSchemas } from '../schemas/schema.js';

interface NameParams {
  name: string;
}

interface RegisterDefinitionBody {
  kind?: string;
  content: string;
}

interface DeclarationsBody {
  content: string;
  namespace?: string;
}

interface ExportQuery {
  namespace?: string;
  names?: string;
}

interface BatchBody {
  definitions: DefinitionInput[];
}

export interface FieldResponse {
  name: string;
  type: FieldType;
  required: boolean;
  default: FieldValue;
  ref?: string;
  elementType?: FieldType;
  elementRef?: string;
}

export interface DefinitionResponse {
  name: string;
  kind: string;
  content: string;
  lastModified: number;
  namespace?: string;
  fields?: FieldResponse[];
}

export function toDefinitionResponse(def: SchemaDefinition): DefinitionResponse {
  const response: DefinitionResponse = {
    name: def.name,
    kind: def.kind,
    content: def.content,
    lastModified: def.lastModified
  };
  if (def.schema) {
    if (def.schema.namespace !== undefined) {
      response.namespace = def.schema.namespace;
    }
    response.fields = def.schema.fields.map((f) => ({
      name: f.name,
      type: f.type,
      required: f.required,
      default: f.defaultValue,
      ...(f.ref !== undefined && { ref: f.ref }),
      ...(f.elementType !== undefined && { elementType: f.elementType }),
      ...(f.elementRef !== undefined && { elementRef: f.elementRef })
    }));
  }
  return response;
}

export async function registerSchemasRoutes(fastify: FastifyInstance): Promise<void> {
  const registry = fastify.registry;

  // GET /schemas - all definitions
  fastify.get('/schemas', { schema: schemasSchemas.list }, async (): Promise<DefinitionResponse[]> => {
    return registry.list().map(toDefinitionResponse);
  });

  // GET /schemas/export - declarative text of the whole registry
  fastify.get<{ Querystring: ExportQuery }>(
    '/schemas/export',
    { schema: schemasSchemas.export },
    async (request, reply): Promise<string> => {
      reply.type('text/plain; charset=utf-8');
      const { namespace, names } = request.query;
      return registry.toDeclarativeText(
        namespace,
        names === undefined ? undefined : names.split(',').filter((name) => name.trim().length > 0)
      );
    }
  );

  // GET /schemas/:name - one definition
  fastify.get<{ Params: NameParams }>(
    '/schemas/:name',
    { schema: schemasSchemas.get },
    async (request): Promise<DefinitionResponse> => {
      const def = registry.get(request.params.name);
      if (!def) {
        throw new NotFoundError('Definition', request.params.name);
      }
      return toDefinitionResponse(def);
    }
  );

  // PUT /schemas/:name - add or replace from text
  fastify.put<{ Params: NameParams; Body: RegisterDefinitionBody }>(
    '/schemas/:name',
    { schema: schemasSchemas.register },
    async (request, reply): Promise<DefinitionResponse> => {
      const { name } = request.params;
      const previous = registry.register(name, request.body.kind ?? 'declare', request.body.content);
      if (!previous) {
        reply.status(201);
      }
      return current(name);
    }
  );

  // POST /schemas - add or replace from a schema object
  fastify.post<{ Body: ObjectSchemaInput }>(
    '/schemas',
    { schema: schemasSchemas.define },
    async (request, reply): Promise<DefinitionResponse> => {
      const previous = registry.define(request.body);
      if (!previous) {
        reply.status(201);
      }
      return current(request.body.name.trim());
    }
  );

  // POST /schemas/declarations - every declare block of a text
  fastify.post<{ Body: DeclarationsBody }>(
    '/schemas/declarations',
    { schema: schemasSchemas.declarations },
    async (request, reply): Promise<{ registered: string[] }> => {
      const registered = registry.loadDeclarations(request.body.content, request.body.namespace);
      reply.status(201);
      return { registered };
    }
  );

  // POST /schemas/batch - definitions of any kinds, all or nothing
  fastify.post<{ Body: BatchBody }>(
    '/schemas/batch',
    { schema: schemasSchemas.batch },
    async (request): Promise<{ registered: string[]; replaced: string[] }> => {
      const replaced = registry.registerAll(request.body.definitions);
      return {
        registered: [...new Set(request.body.definitions.map((def) => def.name.trim()))],
        replaced: [...replaced.keys()]
      };
    }
  );

  // DELETE /schemas/:name
  fastify.delete<{ Params: NameParams }>(
    '/schemas/:name',
    { schema: schemasSchemas.delete },
    async (request, reply): Promise<void> => {
      if (!registry.remove(request.params.name)) {
        throw new NotFoundError('Definition', request.params.name);
      }
      reply.status(204);
    }
  );

  function current(name: string): DefinitionResponse {
    const def = registry.get(name);
    if (!def) {
      throw new NotFoundError('Definition', name);
    }
    return toDefinitionResponse(def);
  }
}
