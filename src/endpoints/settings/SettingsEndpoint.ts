// src/endpoints/settings/SettingsEndpoint.ts

import { BaseEndpoint } from '../BaseEndpoint';
import type { DispatchOptions } from '../../core/http/types';
import { ValidationError } from '../../utils/errors';
import { getSettingsRequest, updateSettingsRequest } from './requests';
import { CustomerSettingsSchema } from './types';
import type { CustomerSettings, SettingsUpdate } from './types';

export interface SettingsUpdateOptions {
  homeRoomsActive?: boolean;
  homeRoomQuota?: number;
  homeRoomParentName?: string;
}

/**
 * Customer settings (home rooms). Requires the config manager role.
 */
export class SettingsEndpoint extends BaseEndpoint {
  async getSettings(opts?: DispatchOptions): Promise<CustomerSettings> {
    return this.send(getSettingsRequest(), CustomerSettingsSchema, opts);
  }

  /**
   * Build a settings update carrying only the fields that were given.
   *
   * @throws {ValidationError} when asked to deactivate home rooms
   */
  makeSettingsUpdate(options: SettingsUpdateOptions): SettingsUpdate {
    if (options.homeRoomsActive === false) {
      throw new ValidationError('Home rooms cannot be deactivated', { field: 'homeRoomsActive' });
    }

    return {
      ...(options.homeRoomsActive !== undefined ? { homeRoomsActive: options.homeRoomsActive } : {}),
      ...(options.homeRoomQuota !== undefined ? { homeRoomQuota: options.homeRoomQuota } : {}),
      ...(options.homeRoomParentName !== undefined
        ? { homeRoomParentName: options.homeRoomParentName }
        : {}),
    };
  }

  /**
   * @throws {ValidationError} before any request is built when the update is invalid
   */
  async updateSettings(update: SettingsUpdate, opts?: DispatchOptions): Promise<CustomerSettings> {
    const descriptor = updateSettingsRequest(update);
    this.deps.logger.info('Updating customer settings', { fields: Object.keys(update) });
    return this.send(descriptor, CustomerSettingsSchema, opts);
  }
}
