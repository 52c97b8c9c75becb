// src/endpoints/helpers.ts

import type { z } from 'zod';
import type { HttpMethod, RequestDescriptor } from '../core/http/types';
import { ValidationError } from '../utils/errors';

export const JSON_CONTENT_TYPE = 'application/json';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Descriptor with its body frozen at every depth. */
export function createDescriptor(
  method: HttpMethod,
  path: string,
  extras: { query?: string; body?: unknown } = {}
): RequestDescriptor {
  const body = deepFreeze(extras.body);

  return Object.freeze({
    method,
    path,
    contentType: JSON_CONTENT_TYPE,
    ...(extras.query !== undefined ? { query: extras.query } : {}),
    ...(body !== undefined ? { body } : {}),
  });
}

/**
 * Validate a request payload before anything is sent.
 *
 * @throws {ValidationError} with one `path: message` entry per issue
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function requireId(id: number, what: string): number {
  if (!Number.isInteger(id) || id < 1) {
    throw new ValidationError(`${what} must be a positive integer`, { id });
  }
  return id;
}
