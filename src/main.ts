/**
 * Server entry point.
 */

import { loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel } from './logger';

const config = loadConfig();
setLogLevel(config.logLevel);

const context = createAppContext(config);
const app = createApp(context);

app.listen(config.port, () => {
  logger.info('Shipwright listening', { port: config.port, repository: config.repository });
});

// expire artifact slots past their retention
const PURGE_INTERVAL_MS = 60 * 60 * 1000;
setInterval(() => {
  context.artifacts.purgeExpired().then(
    (removed) => {
      if (removed > 0) logger.info('Expired artifacts purged', { removed });
    },
    (err: unknown) => {
      logger.warn('Artifact purge failed', { error: err instanceof Error ? err.message : String(err) });
    },
  );
}, PURGE_INTERVAL_MS).unref();
