/**
 * JSON schemas of the schema-definition API.
 */
import { FIELD_TYPES } from '../../types/schema.js';
import { errorResponseSchema, nameParamSchema } from './common.js';

export const fieldSpecSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', enum: FIELD_TYPES },
    required: { type: 'boolean' },
    default: { type: ['string', 'number', 'boolean', 'null'] },
    ref: { type: 'string', minLength: 1 },
    elementType: { type: 'string', enum: FIELD_TYPES },
    elementRef: { type: 'string', minLength: 1 }
  },
  required: ['name', 'type']
} as const;

export const definitionSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    kind: { type: 'string' },
    content: { type: 'string' },
    lastModified: { type: 'number' },
    namespace: { type: 'string' },
    fields: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          type: { type: 'string' },
          required: { type: 'boolean' },
          default: {},
          ref: { type: 'string' },
          elementType: { type: 'string' },
          elementRef: { type: 'string' }
        }
      }
    }
  },
  required: ['name', 'kind', 'content', 'lastModified']
} as const;

export const registerDefinitionBodySchema = {
  type: 'object',
  properties: {
    kind: { type: 'string', minLength: 1 },
    content: { type: 'string', minLength: 1 }
  },
  required: ['content']
} as const;

export const defineSchemaBodySchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    namespace: { type: 'string' },
    fields: { type: 'array', items: fieldSpecSchema }
  },
  required: ['name', 'fields']
} as const;

export const declarationsBodySchema = {
  type: 'object',
  properties: {
    content: { type: 'string', minLength: 1 },
    namespace: { type: 'string' }
  },
  required: ['content']
} as const;

export const exportQuerySchema = {
  type: 'object',
  properties: {
    namespace: { type: 'string' },
    names: { type: 'string', description: 'Comma-separated definition names' }
  }
} as const;

export const batchBodySchema = {
  type: 'object',
  properties: {
    definitions: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          kind: { type: 'string', minLength: 1 },
          content: { type: 'string', minLength: 1 }
        },
        required: ['name', 'content']
      }
    }
  },
  required: ['definitions']
} as const;

export const schemasSchemas = {
  list: {
    summary: 'List all definitions',
    response: {
      200: { type: 'array', items: definitionSchema }
    }
  },
  get: {
    summary: 'Get a definition by name',
    params: nameParamSchema,
    response: {
      200: definitionSchema,
      404: errorResponseSchema
    }
  },
  register: {
    summary: 'Add or replace a definition from text',
    params: nameParamSchema,
    body: registerDefinitionBodySchema,
    response: {
      200: definitionSchema,
      201: definitionSchema
    }
  },
  define: {
    summary: 'Add or replace a declared type from a schema object',
    body: defineSchemaBodySchema,
    response: {
      200: definitionSchema,
      201: definitionSchema
    }
  },
  declarations: {
    summary: 'Register every declare block of a text',
    body: declarationsBodySchema,
    response: {
      201: {
        type: 'object',
        properties: {
          registered: { type: 'array', items: { type: 'string' } }
        },
        required: ['registered']
      }
    }
  },
  batch: {
    summary: 'Add or replace definitions of any kinds at once',
    body: batchBodySchema,
    response: {
      200: {
        type: 'object',
        properties: {
          registered: { type: 'array', items: { type: 'string' } },
          replaced: { type: 'array', items: { type: 'string' } }
        },
        required: ['registered', 'replaced']
      }
    }
  },
  delete: {
    summary: 'Remove a definition',
    params: nameParamSchema,
    response: {
      204: { type: 'null' },
      404: errorResponseSchema
    }
  },
  export: {
    summary: 'Render all definitions as declarative text',
    querystring: exportQuerySchema
  }
};
