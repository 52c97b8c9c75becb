// src/core/query/QueryBuilder.ts

import { ValidationError } from '../../utils/errors';

export interface ListParams {
  offset?: number;
  /** Filter expression, already escaped (e.g. `name:cn:backup`) */
  filter?: string;
  /** Passed through as is; the server caps the page size */
  limit?: number;
  /** Sort expression, already escaped (e.g. `name:asc`) */
  sort?: string;
}

/**
 * Canonical query string for list endpoints: `offset` always, then `filter`,
 * `limit` and `sort` when given, in that order.
 *
 * @example
 * buildQuery({ offset: 10, filter: 'x', sort: 'name' }) // 'offset=10&filter=x&sort=name'
 */
export function buildQuery(params: ListParams = {}): string {
  const offset = params.offset ?? 0;

  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset must be a non-negative integer', { offset });
  }
  if (params.limit !== undefined && (!Number.isInteger(params.limit) || params.limit < 1)) {
    throw new ValidationError('limit must be a positive integer', { limit: params.limit });
  }

  const parts = [`offset=${offset}`];
  if (params.filter !== undefined) parts.push(`filter=${params.filter}`);
  if (params.limit !== undefined) parts.push(`limit=${params.limit}`);
  if (params.sort !== undefined) parts.push(`sort=${params.sort}`);

  return parts.join('&');
}
