/**
 * Body validation middleware.
 * Parses the JSON body, checks it against a schema and hands the handler a
 * request whose body holds only the fields the schema names.
 * Returns 400 with field-level errors if validation fails.
 */

import type { BodySchema, FieldSchema, FieldType } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

const TYPE_CHECKS: Record<FieldType, (value: unknown) => boolean> = {
  string: (value) => typeof value === 'string',
  number: (value) => typeof value === 'number' && Number.isFinite(value),
  boolean: (value) => typeof value === 'boolean',
};

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let parsed: unknown;
      try {
        parsed = await req.json();
      } catch {
        return errorResponse('Request body must be valid JSON');
      }

      if (!isRecord(parsed)) {
        return errorResponse('Request body must be a JSON object');
      }
      const body = parsed;

      const errors = Object.entries(schema).flatMap(([field, fieldSchema]) =>
        checkField(field, body[field], fieldSchema)
      );
      if (errors.length > 0) {
        return errorResponse(errors.join('; '), { fields: errors });
      }

      const known = Object.fromEntries(Object.entries(body).filter(([field]) => field in schema));
      return next(
        new Request(req.url, { method: req.method, headers: req.headers, body: JSON.stringify(known) }),
        ctx
      );
    };
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Null counts as missing; an explicit null reaches the handler for optional fields. */
function checkField(field: string, value: unknown, schema: FieldSchema): string[] {
  if (value === undefined || value === null) {
    return schema.required ? [`${field} is required`] : [];
  }
  if (!TYPE_CHECKS[schema.type](value)) {
    return [`${field} must be a ${schema.type}`];
  }

  const errors: string[] = [];
  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }
  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${field} must be an integer`);
    }
  }
  return errors;
}

function errorResponse(message: string, details?: Record<string, unknown>): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message,
        ...(details && { details }),
      },
    }),
    { status: 400, headers: { 'Content-Type': 'application/json' } }
  );
}
