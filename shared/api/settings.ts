/**
 * Settings API
 */

import type { RequestFn } from './client';
import type { AppConfig, Settings, UpdateSettingsRequest } from '../types';

export interface UpdateSettingsResponse {
  message: string;
  config: AppConfig;
}

export interface SettingsApi {
  /** Get current settings */
  get: () => Promise<Settings>;

  /** Update settings; changing `backend` switches the container engine */
  update: (settings: UpdateSettingsRequest) => Promise<UpdateSettingsResponse>;
}

export function createSettingsApi(request: RequestFn): SettingsApi {
  return {
    get: () => request<Settings>('/settings'),

    update: (settings: UpdateSettingsRequest) =>
      request<UpdateSettingsResponse>('/settings', {
        method: 'PUT',
        body: JSON.stringify(settings),
      }),
  };
}
