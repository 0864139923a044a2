import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { Logger } from 'pino';
import { createDb, getRawDb } from '@tasklane/core';
import type { TaskDb } from '@tasklane/core';
import type { AppConfig } from './config.js';
import { createApp } from './app.js';

export interface RunningServer {
  server: Server;
  db: TaskDb;
  /** Bound address; the port is the real one when 0 was asked for */
  host: string;
  port: number;
  close(): Promise<void>;
}

export interface StartServerOptions {
  /** Use this database instead of opening `config.database.path` */
  db?: TaskDb;
}

/** Open the database, build the app and listen on the configured address */
export async function startServer(
  config: AppConfig,
  rootLogger: Logger,
  options: StartServerOptions = {},
): Promise<RunningServer> {
  const logger = rootLogger.child({ module: 'server' });
  const ownsDb = options.db === undefined;
  const db = options.db ?? createDb(config.database.path);

  const app = createApp({
    db,
    tokens: new Set(config.auth.tokens),
    logger: rootLogger,
    basePath: config.server.basePath,
  });
  const server = createServer(app);

  try {
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(config.server.port, config.server.host);
    });
  } catch (err) {
    if (ownsDb) getRawDb(db).close();
    throw err;
  }

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.server.port;
  logger.info(
    { host: config.server.host, port, basePath: config.server.basePath, database: config.database.path },
    `Server listening on http://${config.server.host}:${port}`,
  );

  const close = async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    if (ownsDb) getRawDb(db).close();
    logger.info('Server stopped');
  };

  return { server, db, host: config.server.host, port, close };
}
