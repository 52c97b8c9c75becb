// src/endpoints/user/UserEndpoint.ts

import { BaseEndpoint } from '../BaseEndpoint';
import type { DispatchOptions } from '../../core/http/types';
import { getAccountRequest, updateAccountRequest } from './requests';
import { UserAccountSchema } from './types';
import type { AccountUpdate, UserAccount } from './types';

export class UserEndpoint extends BaseEndpoint {
  async getAccount(opts?: DispatchOptions): Promise<UserAccount> {
    return this.send(getAccountRequest(), UserAccountSchema, opts);
  }

  async updateAccount(update: AccountUpdate, opts?: DispatchOptions): Promise<UserAccount> {
    return this.send(updateAccountRequest(update), UserAccountSchema, opts);
  }
}
