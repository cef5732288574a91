/**
 * Settings types
 */

import type { EngineName } from './engine';

export interface AppConfig {
  backend: EngineName;
  executables: Partial<Record<EngineName, string>>;
  catalogUrl: string;
  catalogRefreshIntervalMs: number;   // 0 = refresh on demand only
  catalogTimeoutMs: number;
  catalogMaxRetries: number;
  imageNamespace: string;
  documentationBaseUrl: string;
  autoPull: boolean;
  gracePeriodMs: number;
  logDrainMs: number;
  runTimeoutMs: number;               // 0 = no limit
  allowConcurrentInputRuns: boolean;
  defaultRunArgs: string[];
  maxRetainedLogLines: number;
}

export type UpdateSettingsRequest = Partial<
  Pick<
    AppConfig,
    | 'backend'
    | 'executables'
    | 'catalogUrl'
    | 'catalogRefreshIntervalMs'
    | 'autoPull'
    | 'gracePeriodMs'
    | 'runTimeoutMs'
    | 'allowConcurrentInputRuns'
    | 'defaultRunArgs'
  >
>;

export interface Settings {
  config: AppConfig;
  engines: EngineName[];
}
