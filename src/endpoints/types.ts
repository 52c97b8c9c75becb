// src/endpoints/types.ts

import { z } from 'zod';
import type { Dispatcher } from '../core/http/types';
import type { Logger } from '../observability/Logger';

export interface EndpointDeps {
  dispatcher: Dispatcher;
  logger: Logger;
}

export const RangeSchema = z
  .object({
    offset: z.number().int(),
    limit: z.number().int(),
    total: z.number().int(),
  })
  .passthrough();

export type Range = z.infer<typeof RangeSchema>;

/**
 * `range` + `items` wrapper returned by every list endpoint. Items keep the
 * server's order.
 */
export function paginatedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    range: RangeSchema,
    items: z.array(item),
  });
}

export interface Paginated<T> {
  range: Range;
  items: T[];
}
