import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

export class NotFoundError extends Error {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';

  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`);
    this.name = 'NotFoundError';
  }
}

const FASTIFY_VALIDATION_CODE = 'FST_ERR_VALIDATION';
const JSON_PARSE_ERROR_CODES = [
  'FST_ERR_CTP_INVALID_CONTENT_LENGTH',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
  'FST_ERR_CTP_BODY_TOO_LARGE',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
  'FST_ERR_CTP_INVALID_JSON_BODY'
];

function isFastifyValidationError(error: FastifyError): boolean {
  return error.code === FASTIFY_VALIDATION_CODE || error.validation !== undefined;
}

function isJsonParseError(error: FastifyError): boolean {
  return error instanceof SyntaxError || JSON_PARSE_ERROR_CODES.includes(error.code ?? '');
}

function extractValidationDetails(error: FastifyError): unknown {
  if (error.validation && Array.isArray(error.validation)) {
    return error.validation.map((v) => ({
      field: v.instancePath || v.params?.['missingProperty'] || 'unknown',
      message: v.message,
      keyword: v.keyword
    }));
  }
  return undefined;
}

function formatValidationMessage(error: FastifyError): string {
  if (!error.validation || !Array.isArray(error.validation)) {
    return 'Request validation failed';
  }

  const messages = error.validation.map((v) => {
    // Convert /path/to/field to path.to.field
    const parentPath = v.instancePath?.replace(/^\//, '').replace(/\//g, '.') || '';
    const field = parentPath || v.params?.['missingProperty'];

    if (v.keyword === 'required' && v.params?.['missingProperty']) {
      const missingField = String(v.params['missingProperty']);
      const fullPath = parentPath ? `${parentPath}.${missingField}` : missingField;
      return `Missing required field: ${fullPath}`;
    }
    if (v.keyword === 'type' || v.keyword === 'enum') {
      return `Field ${field} ${v.message}`;
    }
    if (v.keyword === 'minLength') {
      return `Field ${field} must not be empty`;
    }

    return v.message || 'Validation error';
  });

  return messages.join('; ');
}

/**
 * Maps errors to {@link ApiError} responses. Errors of this package carry
 * `statusCode`, `code` and usually `details`, which are passed through.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  let statusCode = error.statusCode ?? 500;
  let code: string | undefined = error.code;
  let details: unknown = 'details' in error ? error.details : undefined;
  let message = error.message;

  if (isFastifyValidationError(error)) {
    statusCode = 400;
    code = 'VALIDATION_ERROR';
    details = extractValidationDetails(error);
    message = formatValidationMessage(error);
  } else if (isJsonParseError(error)) {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
  }

  const response: ApiError = {
    statusCode,
    error: getErrorName(statusCode),
    message
  };

  if (code) {
    response.code = code;
  }

  if (details !== undefined) {
    response.details = details;
  }

  if (statusCode >= 500) {
    request.log.error({
      err: error,
      method: request.method,
      url: request.url,
      statusCode
    }, 'Internal server error');
  } else if (statusCode >= 400) {
    request.log.warn({
      method: request.method,
      url: request.url,
      statusCode,
      code
    }, error.message);
  }

  void reply.status(statusCode).send(response);
}

function getErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    409: 'Conflict',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
    503: 'Service Unavailable'
  };
  return names[statusCode] ?? 'Error';
}
