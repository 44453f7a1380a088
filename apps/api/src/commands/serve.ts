import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { Command } from 'commander';
import { createDb, closeDb, TaskService } from '@todo-list/core';
import { loadConfig, type AppConfig, type ConfigEnv } from '../config.js';
import { configureLogger } from '../logger.js';
import { createApp } from '../server/app.js';
import { loadOpenApiDocument } from '../openapi.js';
import { withErrorHandling } from '../helpers.js';

interface ServeOptions {
  port?: string;
  host?: string;
  db?: string;
  logLevel?: string;
}

export interface RunningServer {
  server: Server;
  /** Actual bound address; differs from the config when port 0 is used */
  address: AddressInfo;
  close(): Promise<void>;
}

export function toOverrides(options: ServeOptions): ConfigEnv {
  return {
    PORT: options.port,
    HOST: options.host,
    DATABASE_PATH: options.db,
    LOG_LEVEL: options.logLevel,
  };
}

function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

/** Open the database and start serving; the database closes with the server */
export async function startServer(config: AppConfig): Promise<RunningServer> {
  const db = createDb(config.dbPath);
  const service = new TaskService(db);
  const app = createApp({ service, openApiDocument: loadOpenApiDocument() });
  const server = createServer(app);

  let address: AddressInfo;
  try {
    address = await listen(server, config.port, config.host);
  } catch (err: unknown) {
    closeDb(db);
    throw err;
  }

  const close = () => new Promise<void>((resolve, reject) => {
    server.close((err) => {
      closeDb(db);
      if (err) reject(err);
      else resolve();
    });
  });

  return { server, address, close };
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on (env PORT)')
    .option('--host <host>', 'Interface to bind (env HOST)')
    .option('--db <path>', 'SQLite database file (env DATABASE_PATH)')
    .option('--log-level <level>', 'Lowest log level (env LOG_LEVEL)')
    .action(withErrorHandling(async (options: ServeOptions) => {
      const config = loadConfig(process.env, toOverrides(options));
      const logger = await configureLogger(config.logLevel);

      const running = await startServer(config);
      logger.info('Listening on http://{host}:{port} (database {dbPath})', {
        host: running.address.address,
        port: running.address.port,
        dbPath: config.dbPath,
      });

      const shutdown = (signal: string) => {
        logger.info('Received {signal}, shutting down', { signal });
        running.close()
          .then(() => logger.info('Server closed'))
          .catch((err: unknown) => {
            logger.error('Error while closing: {error}', { error: err });
            process.exitCode = 1;
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }));
}
