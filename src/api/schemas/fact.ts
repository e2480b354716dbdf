/**
 * JSON schemas of the materialization API.
 */

export const materializeBodySchema = {
  type: 'object',
  properties: {
    schema: { type: 'string', minLength: 1, description: 'Schema of every fact; omitted = read each fact\'s discriminator' },
    facts: { description: 'A JSON object or an array of them' }
  },
  required: ['facts']
} as const;

export const materializedFactSchema = {
  type: 'object',
  properties: {
    index: { type: 'number' },
    factType: { type: 'string' },
    fields: { type: 'object', additionalProperties: true }
  },
  required: ['index', 'factType', 'fields']
} as const;

export const materializeErrorSchema = {
  type: 'object',
  properties: {
    index: { type: 'number' },
    code: { type: 'string' },
    message: { type: 'string' }
  },
  required: ['index', 'code', 'message']
} as const;

export const factsSchemas = {
  materialize: {
    summary: 'Materialize JSON facts',
    body: materializeBodySchema,
    response: {
      200: {
        type: 'object',
        properties: {
          facts: { type: 'array', items: materializedFactSchema },
          errors: { type: 'array', items: materializeErrorSchema }
        },
        required: ['facts', 'errors']
      }
    }
  }
};
