// src/endpoints/settings/types.ts

import { z } from 'zod';
import { paginatedSchema } from '../types';
import { UserInfoSchema } from '../user/types';

export const CustomerSettingsSchema = z
  .object({
    homeRoomsActive: z.boolean(),
    homeRoomParentId: z.number().int().nullish(),
    homeRoomParentName: z.string().nullish(),
    homeRoomQuota: z.number().int().nullish(),
  })
  .passthrough();

export type CustomerSettings = z.infer<typeof CustomerSettingsSchema>;

// PUT /settings; home rooms can be activated but never deactivated
export const SettingsUpdateSchema = z
  .object({
    homeRoomsActive: z.boolean().optional(),
    homeRoomQuota: z.number().int().positive().optional(),
    homeRoomParentName: z.string().min(1).optional(),
  })
  .strict()
  .refine((update) => update.homeRoomsActive !== false, {
    message: 'Home rooms cannot be deactivated',
    path: ['homeRoomsActive'],
  });

export type SettingsUpdate = z.input<typeof SettingsUpdateSchema>;

export const WebhookSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    url: z.string(),
    isEnabled: z.boolean(),
    eventTypeNames: z.array(z.string()),
    expireAt: z.string().nullish(),
    createdAt: z.string().nullish(),
    createdBy: UserInfoSchema.nullish(),
    updatedAt: z.string().nullish(),
    updatedBy: UserInfoSchema.nullish(),
    failStatus: z.number().int().nullish(),
  })
  .passthrough();

export type Webhook = z.infer<typeof WebhookSchema>;

export const WebhookListSchema = paginatedSchema(WebhookSchema);
export type WebhookList = z.infer<typeof WebhookListSchema>;

export const EventTypeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    usableTenantWebhook: z.boolean(),
    usableCustomerAdminWebhook: z.boolean(),
    usableNodeWebhook: z.boolean(),
    usablePushNotification: z.boolean(),
  })
  .passthrough();

export type EventType = z.infer<typeof EventTypeSchema>;

export const EventTypeListSchema = z.object({
  items: z.array(EventTypeSchema),
});

export type EventTypeList = z.infer<typeof EventTypeListSchema>;

// POST /settings/webhooks
const webhookFields = {
  name: z.string().min(1),
  eventTypeNames: z.array(z.string().min(1)).min(1, 'At least one event type is required'),
  url: z.string().url(),
  secret: z.string().min(1).optional(),
  isEnabled: z.boolean().optional(),
  triggerExampleEvent: z.boolean().optional(),
};

export const CreateWebhookSchema = z.object(webhookFields).strict();
export type CreateWebhook = z.input<typeof CreateWebhookSchema>;

// PUT /settings/webhooks/{id}
export const UpdateWebhookSchema = z
  .object(webhookFields)
  .partial()
  .strict()
  .refine((update) => Object.values(update).some((value) => value !== undefined), {
    message: 'At least one field must be set',
  });

export type UpdateWebhook = z.input<typeof UpdateWebhookSchema>;
