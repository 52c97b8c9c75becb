// src/endpoints/settings/requests.ts
//
// Request descriptors for the settings and webhook endpoints. Pure: they
// validate their input and describe the call, nothing is sent.

import type { RequestDescriptor } from '../../core/http/types';
import { buildQuery } from '../../core/query/QueryBuilder';
import type { ListParams } from '../../core/query/QueryBuilder';
import { createDescriptor, parsePayload, requireId } from '../helpers';
import {
  CreateWebhookSchema,
  SettingsUpdateSchema,
  UpdateWebhookSchema,
} from './types';
import type { CreateWebhook, SettingsUpdate, UpdateWebhook } from './types';

export function getSettingsRequest(): RequestDescriptor {
  return createDescriptor('GET', '/settings');
}

export function updateSettingsRequest(update: SettingsUpdate): RequestDescriptor {
  const body = parsePayload(SettingsUpdateSchema, update, 'settings update');
  return createDescriptor('PUT', '/settings', { body });
}

export function listWebhooksRequest(params: ListParams = {}): RequestDescriptor {
  return createDescriptor('GET', '/settings/webhooks', { query: buildQuery(params) });
}

export function createWebhookRequest(payload: CreateWebhook): RequestDescriptor {
  const body = parsePayload(CreateWebhookSchema, payload, 'webhook');
  return createDescriptor('POST', '/settings/webhooks', { body });
}

export function getWebhookRequest(hookId: number): RequestDescriptor {
  return createDescriptor('GET', `/settings/webhooks/${requireId(hookId, 'Webhook id')}`);
}

export function updateWebhookRequest(hookId: number, update: UpdateWebhook): RequestDescriptor {
  const id = requireId(hookId, 'Webhook id');
  const body = parsePayload(UpdateWebhookSchema, update, 'webhook update');
  return createDescriptor('PUT', `/settings/webhooks/${id}`, { body });
}

export function deleteWebhookRequest(hookId: number): RequestDescriptor {
  return createDescriptor('DELETE', `/settings/webhooks/${requireId(hookId, 'Webhook id')}`);
}

export function listEventTypesRequest(): RequestDescriptor {
  return createDescriptor('GET', '/settings/webhooks/event_types');
}
