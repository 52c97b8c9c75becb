// src/endpoints/user/types.ts

import { z } from 'zod';

export const UserTypeSchema = z.enum(['internal', 'external', 'system', 'deleted']);
export type UserType = z.infer<typeof UserTypeSchema>;

export const UserInfoSchema = z
  .object({
    id: z.number().int(),
    userType: UserTypeSchema,
    avatarUuid: z.string(),
    userName: z.string(),
    firstName: z.string(),
    lastName: z.string(),
    email: z.string().nullish(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof UserInfoSchema>;

export const UserGroupSchema = z
  .object({
    id: z.number().int(),
    isMember: z.boolean(),
    name: z.string(),
  })
  .passthrough();

export type UserGroup = z.infer<typeof UserGroupSchema>;

export const UserAccountSchema = z
  .object({
    id: z.number().int(),
    userName: z.string(),
    firstName: z.string(),
    lastName: z.string(),
    isLocked: z.boolean(),
    hasManageableRooms: z.boolean(),
    language: z.string(),
    // Role and auth structures are kept verbatim
    userRoles: z.unknown().optional(),
    authData: z.unknown().optional(),
    mustSetEmail: z.boolean().nullish(),
    needsToAcceptEULA: z.boolean().nullish(),
    isEncryptionEnabled: z.boolean().nullish(),
    lastLoginSuccessAt: z.string().nullish(),
    lastLoginFailAt: z.string().nullish(),
    email: z.string().nullish(),
    phone: z.string().nullish(),
    homeRoomId: z.number().int().nullish(),
    userGroups: z.array(UserGroupSchema).nullish(),
  })
  .passthrough();

export type UserAccount = z.infer<typeof UserAccountSchema>;

// PUT /user/account
export const AccountUpdateSchema = z
  .object({
    userName: z.string().min(1).optional(),
    acceptEULA: z.boolean().optional(),
    firstName: z.string().min(1).optional(),
    lastName: z.string().min(1).optional(),
    email: z.string().email().optional(),
    phone: z.string().min(1).optional(),
    language: z.string().min(2).optional(),
  })
  .strict()
  .refine((update) => Object.values(update).some((value) => value !== undefined), {
    message: 'At least one field must be set',
  });

export type AccountUpdate = z.input<typeof AccountUpdateSchema>;
