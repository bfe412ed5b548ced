/**
 * API Server Entry Point
 *
 * Loads configuration, builds the application context, serves the
 * dashboard API and runs the background sync until signalled.
 */

import { Command } from 'commander';
import { createServer } from './server.js';
import { loadConfig, loadEnvFile } from './config/index.js';
import { createApiLogger } from './lib/logger.js';
import { createContext, startContext, stopContext } from './context.js';

interface CliOptions {
  port?: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('seedsync')
  .description('Sync a watched torrent folder through a cloud store into a media library')
  .version('1.0.0')
  .option('-p, --port <port>', 'Port to listen on (overrides API_PORT)')
  .option('-l, --log-level <level>', 'Log level (overrides LOG_LEVEL)');

async function main(options: CliOptions): Promise<void> {
  loadEnvFile();
  const config = loadConfig({
    ...process.env,
    ...(options.port ? { API_PORT: options.port } : {}),
    ...(options.logLevel ? { LOG_LEVEL: options.logLevel } : {}),
  });
  const logger = createApiLogger(config);

  try {
    const context = await createContext(config, logger);
    const server = await createServer(context);

    // Graceful shutdown
    let closing = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      if (closing) {
        return;
      }
      closing = true;
      logger.info({ signal }, 'Received shutdown signal');

      try {
        await server.close();
        await stopContext(context);
        logger.info('Server closed');
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        void shutdown(signal);
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });
    await startContext(context);

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      dataDir: config.dataDir,
    }, 'seedsync started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

program.action(async (options: CliOptions) => {
  await main(options);
});

program.parseAsync().catch((err: unknown) => {
  // Configuration errors land here, before a logger exists
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
