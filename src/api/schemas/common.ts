/**
 * JSON schemas shared by the API routes.
 */

export const errorResponseSchema = {
  type: 'object',
  properties: {
    statusCode: { type: 'number' },
    error: { type: 'string' },
    message: { type: 'string' },
    code: { type: 'string' },
    details: {}
  },
  required: ['error', 'statusCode']
} as const;

export const nameParamSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 }
  },
  required: ['name']
} as const;
