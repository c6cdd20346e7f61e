import { existsSync } from 'fs';
import { getConfig } from './config/index.js';
import { createMonitoringContext, readMonitorDefinitions } from './monitoring/index.js';
import { createChildLogger } from './utils/logger.js';

const logger = createChildLogger('main');

async function main() {
  const config = getConfig();
  const context = await createMonitoringContext(config);

  await context.service.loadMonitors();
  if (existsSync(config.monitoring.definitionsFile)) {
    const definitions = await readMonitorDefinitions(config.monitoring.definitionsFile);
    await context.service.syncDefinitions(definitions);
  } else {
    logger.warn({ file: config.monitoring.definitionsFile }, 'No monitor definitions file, using stored monitors');
  }

  logger.info({ monitors: context.registry.size, tickSeconds: config.monitoring.tickSeconds }, 'Starting content monitor');
  context.service.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    await context.close();
    process.exit(0);
  };

  process.on('SIGHUP', () => {
    context
      .reloadTemplates()
      .then((report) => {
        logger.info({ channels: report.channels.length, errors: report.errors.length }, 'Templates reloaded');
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Template reload failed');
      });
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start content monitor');
  process.exit(1);
});
