// src/endpoints/user/requests.ts

import type { RequestDescriptor } from '../../core/http/types';
import { createDescriptor, parsePayload } from '../helpers';
import { AccountUpdateSchema } from './types';
import type { AccountUpdate } from './types';

export function getAccountRequest(): RequestDescriptor {
  return createDescriptor('GET', '/user/account');
}

export function updateAccountRequest(update: AccountUpdate): RequestDescriptor {
  const body = parsePayload(AccountUpdateSchema, update, 'account update');
  return createDescriptor('PUT', '/user/account', { body });
}
