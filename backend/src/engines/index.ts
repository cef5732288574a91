import type { EngineName } from '@medrun/shared';
import logger from '../lib/logger';
import { resolveExecutable, type CommandRunner } from './cli';
import { DockerEngine } from './docker';
import { UdockerEngine } from './udocker';
import type { EngineClient } from './types';

// Re-export types
export * from './types';

export interface EngineFactoryOptions {
  /** Explicit executable path; resolved per platform when absent */
  executable?: string;
  runner?: CommandRunner;
  gpuRunner?: CommandRunner;
}

export type EngineFactory = (options: EngineFactoryOptions & { executable: string }) => EngineClient;

/**
 * Engine Registry
 * Maps engine names to factories that build a client for that engine
 */
export class EngineRegistry {
  private factories: Map<EngineName, EngineFactory> = new Map();

  constructor() {
    // Register built-in engines
    this.register('docker', (options) => new DockerEngine(options));
    this.register('udocker', (options) => new UdockerEngine(options));
  }

  /**
   * Register an engine factory
   */
  register(name: EngineName, factory: EngineFactory): void {
    if (this.factories.has(name)) {
      logger.warn({ engine: name }, `Engine '${name}' is already registered. Overwriting.`);
    }
    this.factories.set(name, factory);
  }

  /**
   * Check if an engine is registered
   */
  has(name: string): name is EngineName {
    return this.list().some((registered) => registered === name);
  }

  /**
   * List registered engine names
   */
  list(): EngineName[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Create a client for the named engine
   * @throws Error if the engine is not registered
   */
  create(name: EngineName, options: EngineFactoryOptions = {}): EngineClient {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new Error(`Engine '${name}' not found. Available engines: ${this.list().join(', ')}`);
    }
    const executable = resolveExecutable(name, options.executable);
    logger.info({ engine: name, executable }, 'Creating engine client');
    return factory({ ...options, executable });
  }
}

export const engineRegistry = new EngineRegistry();
