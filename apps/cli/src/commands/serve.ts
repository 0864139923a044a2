import { Command } from 'commander';
import { loadConfig, createRootLogger, startServer } from '@tasklane/server';
import { parseIntArg, $tryAsync } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

interface ServeOptions extends GlobalOptions {
  port?: number;
  host?: string;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on (overrides the config)', parseIntArg)
    .option('--host <host>', 'Address to bind (overrides the config)')
    .action((_opts: unknown, cmd: Command) => $tryAsync(async () => {
      const g = cmd.optsWithGlobals<ServeOptions>();
      const { config, source } = loadConfig({ configPath: g.config });
      const effective = {
        ...config,
        server: { ...config.server, port: g.port ?? config.server.port, host: g.host ?? config.server.host },
        database: { path: g.db ?? config.database.path },
      };

      const logger = createRootLogger(effective);
      logger.info({ config: source }, 'Configuration loaded');
      const running = await startServer(effective, logger);

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down');
        running.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }));
}
