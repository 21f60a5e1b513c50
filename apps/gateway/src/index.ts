import { ResultAsync } from 'neverthrow';

import { config } from './lib/config.js';
import { type GatewayServer, createServer } from './server.js';

let server: GatewayServer | null = null;
let isShuttingDown = false;

const start = async () => {
  const serverResult = await ResultAsync.fromPromise(
    createServer(),
    (error) => `Failed to create server: ${error}`
  );

  const startResult = await serverResult.asyncAndThen((createdServer) => {
    server = createdServer;
    return ResultAsync.fromPromise(
      createdServer.listen({ port: config.port, host: '0.0.0.0' }),
      (error) => `Failed to start server: ${error}`
    );
  });

  startResult.match(
    () => {
      server?.log.info(`Stats counter gateway listening on port ${config.port}`);
    },
    (error) => {
      process.stderr.write(`${error}\n`);
      process.exit(1);
    }
  );
};

const createShutdownHandler = (signal: string) => async () => {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (!server) {
    process.stderr.write('Server not initialized, exiting\n');
    process.exit(1);
  }

  const safeServer = server;
  safeServer.log.info(`${signal} received, shutting down gracefully`);

  await ResultAsync.fromPromise(
    safeServer.close(),
    (error) => `Failed to close server on ${signal}: ${error}`
  ).match(
    () => {
      safeServer.log.info('Server closed successfully');
      process.exit(0);
    },
    (error) => {
      safeServer.log.error(error);
      process.exit(1);
    }
  );
};

process.once('SIGTERM', createShutdownHandler('SIGTERM'));
process.once('SIGINT', createShutdownHandler('SIGINT'));

void start();
