// src/endpoints/settings/WebhooksEndpoint.ts

import { BaseEndpoint } from '../BaseEndpoint';
import type { DispatchOptions } from '../../core/http/types';
import type { ListParams } from '../../core/query/QueryBuilder';
import {
  createWebhookRequest,
  deleteWebhookRequest,
  getWebhookRequest,
  listEventTypesRequest,
  listWebhooksRequest,
  updateWebhookRequest,
} from './requests';
import { EventTypeListSchema, WebhookListSchema, WebhookSchema } from './types';
import type { CreateWebhook, EventTypeList, UpdateWebhook, Webhook, WebhookList } from './types';

export interface WebhookOptions {
  name: string;
  eventTypes: string[];
  url: string;
  secret?: string;
  isEnabled?: boolean;
  triggerExample?: boolean;
}

export type WebhookUpdateOptions = Partial<WebhookOptions>;

/**
 * Customer webhooks under `/settings/webhooks`. List calls return at most
 * 500 items per page; page with `offset`.
 */
export class WebhooksEndpoint extends BaseEndpoint {
  async listWebhooks(params: ListParams = {}, opts?: DispatchOptions): Promise<WebhookList> {
    return this.send(listWebhooksRequest(params), WebhookListSchema, opts);
  }

  async getWebhook(hookId: number, opts?: DispatchOptions): Promise<Webhook> {
    return this.send(getWebhookRequest(hookId), WebhookSchema, opts);
  }

  makeWebhook(options: WebhookOptions): CreateWebhook {
    return {
      name: options.name,
      eventTypeNames: options.eventTypes,
      url: options.url,
      ...this.optionalFields(options),
    };
  }

  makeWebhookUpdate(options: WebhookUpdateOptions): UpdateWebhook {
    return {
      ...(options.name !== undefined ? { name: options.name } : {}),
      ...(options.eventTypes !== undefined ? { eventTypeNames: options.eventTypes } : {}),
      ...(options.url !== undefined ? { url: options.url } : {}),
      ...this.optionalFields(options),
    };
  }

  async createWebhook(payload: CreateWebhook, opts?: DispatchOptions): Promise<Webhook> {
    const descriptor = createWebhookRequest(payload);
    this.deps.logger.info('Creating webhook', { name: payload.name });
    return this.send(descriptor, WebhookSchema, opts);
  }

  async updateWebhook(
    hookId: number,
    update: UpdateWebhook,
    opts?: DispatchOptions
  ): Promise<Webhook> {
    return this.send(updateWebhookRequest(hookId, update), WebhookSchema, opts);
  }

  async deleteWebhook(hookId: number, opts?: DispatchOptions): Promise<void> {
    const descriptor = deleteWebhookRequest(hookId);
    await this.sendWithoutBody(descriptor, opts);
    this.deps.logger.info('Webhook deleted', { hookId });
  }

  async listEventTypes(opts?: DispatchOptions): Promise<EventTypeList> {
    return this.send(listEventTypesRequest(), EventTypeListSchema, opts);
  }

  private optionalFields(
    options: WebhookUpdateOptions
  ): Pick<CreateWebhook, 'secret' | 'isEnabled' | 'triggerExampleEvent'> {
    return {
      ...(options.secret !== undefined ? { secret: options.secret } : {}),
      ...(options.isEnabled !== undefined ? { isEnabled: options.isEnabled } : {}),
      ...(options.triggerExample !== undefined ? { triggerExampleEvent: options.triggerExample } : {}),
    };
  }
}
