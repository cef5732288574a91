import { z } from 'zod';
import type { AppConfig, EngineName, UpdateSettingsRequest } from '@medrun/shared';
import { BackendError } from '../lib/errors';
import logger from '../lib/logger';
import { formatZodIssues } from '../lib/validation';

export const ENGINE_NAMES = ['docker', 'udocker'] as const satisfies readonly EngineName[];

export const DEFAULT_CATALOG_URL = 'https://mhub.ai/api/v2/models/detailed';

const DEFAULTS: AppConfig = {
  backend: 'docker',
  executables: {},
  catalogUrl: DEFAULT_CATALOG_URL,
  catalogRefreshIntervalMs: 0,
  catalogTimeoutMs: 15000,
  catalogMaxRetries: 2,
  imageNamespace: 'mhubai',
  documentationBaseUrl: 'https://mhub.ai/models',
  autoPull: true,
  gracePeriodMs: 10000,
  logDrainMs: 2000,
  runTimeoutMs: 20 * 60 * 1000,
  allowConcurrentInputRuns: true,
  defaultRunArgs: ['--workflow', 'default', '--print'],
  maxRetainedLogLines: 10000,
};

const durationMs = z.number().int().min(0).max(24 * 60 * 60 * 1000);

export const appConfigSchema = z.object({
  backend: z.enum(ENGINE_NAMES),
  executables: z.object({
    docker: z.string().min(1).optional(),
    udocker: z.string().min(1).optional(),
  }),
  catalogUrl: z.string().url(),
  catalogRefreshIntervalMs: durationMs,
  catalogTimeoutMs: durationMs.refine((v) => v > 0, 'Catalog timeout must be positive'),
  catalogMaxRetries: z.number().int().min(0).max(10),
  imageNamespace: z.string().min(1).regex(/^[a-z0-9][a-z0-9._\-/]*$/, 'Invalid image namespace'),
  documentationBaseUrl: z.string().url(),
  autoPull: z.boolean(),
  gracePeriodMs: durationMs,
  logDrainMs: durationMs,
  runTimeoutMs: durationMs,
  allowConcurrentInputRuns: z.boolean(),
  defaultRunArgs: z.array(z.string().max(4096)).max(256),
  maxRetainedLogLines: z.number().int().min(1).max(1000000),
});

export const updateSettingsSchema = appConfigSchema
  .pick({
    backend: true,
    executables: true,
    catalogUrl: true,
    catalogRefreshIntervalMs: true,
    autoPull: true,
    gracePeriodMs: true,
    runTimeoutMs: true,
    allowConcurrentInputRuns: true,
    defaultRunArgs: true,
  })
  .partial()
  .strict();

// ============================================================================
// Environment
// ============================================================================

/** Treat empty variables as unset */
const unsetIfEmpty = (value: unknown) => (value === '' ? undefined : value);

const envInt = (fallback: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).default(fallback));

const envBool = (fallback: boolean) =>
  z.preprocess(
    unsetIfEmpty,
    z
      .enum(['true', 'false', '1', '0'])
      .transform((v) => v === 'true' || v === '1')
      .default(fallback ? 'true' : 'false')
  );

const envString = z.preprocess(unsetIfEmpty, z.string().optional());

const envSchema = z.object({
  ENGINE_BACKEND: z.preprocess(unsetIfEmpty, z.enum(ENGINE_NAMES).default(DEFAULTS.backend)),
  DOCKER_PATH: envString,
  UDOCKER_PATH: envString,
  CATALOG_URL: z.preprocess(unsetIfEmpty, z.string().default(DEFAULTS.catalogUrl)),
  CATALOG_REFRESH_INTERVAL_MS: envInt(DEFAULTS.catalogRefreshIntervalMs),
  CATALOG_TIMEOUT_MS: envInt(DEFAULTS.catalogTimeoutMs),
  CATALOG_MAX_RETRIES: envInt(DEFAULTS.catalogMaxRetries),
  IMAGE_NAMESPACE: z.preprocess(unsetIfEmpty, z.string().default(DEFAULTS.imageNamespace)),
  AUTO_PULL: envBool(DEFAULTS.autoPull),
  GRACE_PERIOD_MS: envInt(DEFAULTS.gracePeriodMs),
  LOG_DRAIN_MS: envInt(DEFAULTS.logDrainMs),
  RUN_TIMEOUT_MS: envInt(DEFAULTS.runTimeoutMs),
  ALLOW_CONCURRENT_INPUT_RUNS: envBool(DEFAULTS.allowConcurrentInputRuns),
  MAX_LOG_LINES: envInt(DEFAULTS.maxRetainedLogLines),
});

/**
 * Build the configuration from environment variables over the defaults
 * @throws Error listing every invalid variable
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid environment: ${formatZodIssues(parsedEnv.error).join('; ')}`);
  }
  const e = parsedEnv.data;

  const candidate: AppConfig = {
    ...DEFAULTS,
    backend: e.ENGINE_BACKEND,
    executables: {
      ...(e.DOCKER_PATH ? { docker: e.DOCKER_PATH } : {}),
      ...(e.UDOCKER_PATH ? { udocker: e.UDOCKER_PATH } : {}),
    },
    catalogUrl: e.CATALOG_URL,
    catalogRefreshIntervalMs: e.CATALOG_REFRESH_INTERVAL_MS,
    catalogTimeoutMs: e.CATALOG_TIMEOUT_MS,
    catalogMaxRetries: e.CATALOG_MAX_RETRIES,
    imageNamespace: e.IMAGE_NAMESPACE,
    autoPull: e.AUTO_PULL,
    gracePeriodMs: e.GRACE_PERIOD_MS,
    logDrainMs: e.LOG_DRAIN_MS,
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    allowConcurrentInputRuns: e.ALLOW_CONCURRENT_INPUT_RUNS,
    maxRetainedLogLines: e.MAX_LOG_LINES > 0 ? e.MAX_LOG_LINES : DEFAULTS.maxRetainedLogLines,
  };

  const result = appConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(result.error).join('; ')}`);
  }
  return result.data;
}

export function defaultConfig(): AppConfig {
  return cloneConfig(DEFAULTS);
}

function cloneConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    executables: { ...config.executables },
    defaultRunArgs: [...config.defaultRunArgs],
  };
}

/**
 * Config Service
 * Holds the process configuration; runtime updates live in memory only
 */
export class ConfigService {
  private config: AppConfig;

  constructor(initial: AppConfig = loadConfigFromEnv()) {
    this.config = cloneConfig(initial);
  }

  /**
   * Get a copy of the current configuration
   */
  getConfig(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate and merge a settings patch; executables are merged per engine
   * @throws BackendError InvalidRequest when the patch or the merged result is invalid
   */
  update(patch: UpdateSettingsRequest): AppConfig {
    const parsedPatch = updateSettingsSchema.safeParse(patch);
    if (!parsedPatch.success) {
      throw new BackendError('InvalidRequest', `Invalid settings: ${formatZodIssues(parsedPatch.error).join('; ')}`);
    }

    const { executables, ...rest } = parsedPatch.data;
    const merged: AppConfig = {
      ...this.config,
      ...rest,
      executables: { ...this.config.executables, ...executables },
    };

    const result = appConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new BackendError('InvalidRequest', `Invalid settings: ${formatZodIssues(result.error).join('; ')}`);
    }

    this.config = cloneConfig(result.data);
    logger.info({ changed: Object.keys(parsedPatch.data) }, 'Configuration updated');
    return this.getConfig();
  }
}
