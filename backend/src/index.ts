import { serve } from '@hono/node-server';
import { DEFAULT_CORS_ORIGINS, createApp } from './hono-app';
import { Backend } from './services/backend';
import { ConfigService } from './services/config';
import { errorMessage } from './lib/errors';
import logger from './lib/logger';

const PORT = Number.parseInt(process.env.PORT || '3001', 10);
// Loopback only unless HOST says otherwise: the API starts processes on this machine
const HOST = process.env.HOST || '127.0.0.1';
const CORS_ORIGIN = process.env.CORS_ORIGIN
  ? process.env.CORS_ORIGIN.split(',').map((origin) => origin.trim())
  : DEFAULT_CORS_ORIGINS;
const ALLOW_EXECUTABLE_OVERRIDES = process.env.ALLOW_EXECUTABLE_OVERRIDES === 'true';

let config: ConfigService;
try {
  config = new ConfigService();
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, 'Invalid configuration');
  process.exit(1);
}

const backend = new Backend({ config });
backend.start();

const engine = await backend.getEngineInfo();
if (engine.success && engine.data.available) {
  logger.info({ engine: engine.data.name, version: engine.data.version }, 'Container engine available');
} else {
  logger.warn(
    { engine: config.getConfig().backend, error: engine.success ? engine.data.error : engine.error.message },
    'Container engine not available; runs will fail until it is installed or configured'
  );
}

const app = createApp(backend, { corsOrigin: CORS_ORIGIN, allowExecutableOverrides: ALLOW_EXECUTABLE_OVERRIDES });

const server = serve({ fetch: app.fetch, port: PORT, hostname: HOST }, (info) => {
  logger.info({ host: HOST, port: info.port }, `Backend orchestrator running on http://${HOST}:${info.port}`);
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  const result = await backend.shutdown();
  if (result.success) {
    logger.info({ killed: result.data.killed, failed: result.data.failed }, 'Stopped all jobs');
  } else {
    logger.error({ error: result.error.message }, 'Shutdown did not complete cleanly');
  }
  server.close(() => process.exit(0));
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
