// src/endpoints/BaseEndpoint.ts

import type { z } from 'zod';
import type { DispatchOptions, RequestDescriptor } from '../core/http/types';
import type { EndpointDeps } from './types';
import { ResponseDecodeError } from '../utils/errors';

export abstract class BaseEndpoint {
  constructor(protected deps: EndpointDeps) {}

  /**
   * Dispatch a descriptor and decode the response body with `schema`.
   */
  protected async send<S extends z.ZodTypeAny>(
    descriptor: RequestDescriptor,
    schema: S,
    opts?: DispatchOptions
  ): Promise<z.output<S>> {
    const response = await this.deps.dispatcher.dispatch(descriptor, opts);
    const result = schema.safeParse(response.data);

    if (!result.success) {
      this.deps.logger.error('Unexpected response body', {
        method: descriptor.method,
        path: descriptor.path,
        status: response.status,
        issues: result.error.issues.length,
      });
      throw new ResponseDecodeError(`Unexpected response from ${descriptor.method} ${descriptor.path}`, {
        status: response.status,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return result.data;
  }

  /**
   * Dispatch a descriptor whose response carries no body (e.g. DELETE).
   */
  protected async sendWithoutBody(descriptor: RequestDescriptor, opts?: DispatchOptions): Promise<void> {
    await this.deps.dispatcher.dispatch(descriptor, opts);
  }
}
