import { serializeError } from '@trawl/search';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { createDispatcher } from './handlers.js';
import { createLogger } from './observability/logger.js';
import { startHttpServer } from './transports/http.js';
import { startStdioTransport } from './transports/stdio.js';

interface RuntimeState {
  closeTransport: (() => Promise<void>) | null;
  stopSweeper: (() => void) | null;
}

const runtimeState: RuntimeState = {
  closeTransport: null,
  stopSweeper: null,
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  state.stopSweeper?.();
  if (state.closeTransport) {
    await state.closeTransport();
  }
}

async function run(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    service: config.serviceName,
    destination: config.transport === 'stdio' ? 'stderr' : 'stdout',
  });
  const { service, store } = createApp(config, logger);
  const dispatch = createDispatcher(service);

  store.startSweeper(config.sessionSweepIntervalMs);
  runtimeState.stopSweeper = () => store.stop();

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', reason }, 'Shutdown requested');
    await cleanupRuntimeState(runtimeState);
    logger.info({ event: 'shutdown_completed', reason }, 'Shutdown completed');
    process.exit(0);
  };

  if (config.transport === 'stdio') {
    const transport = startStdioTransport({ dispatch, logger, input: process.stdin, output: process.stdout });
    runtimeState.closeTransport = transport.close;
    void transport.closed.then(() => shutdown('stdin_closed'));
  } else {
    const server = await startHttpServer({ dispatch, logger, host: config.host, port: config.port });
    runtimeState.closeTransport = server.close;
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    { event: 'server_started', portal: config.portal, transport: config.transport, sessionTtlMs: config.sessionTtlMs },
    'Server started',
  );
}

run().catch(async (error: unknown) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createLogger({ destination: 'stderr' });
  logger.fatal({ event: 'server_fatal_error', error: serializeError(error) }, 'Server fatal error');
  process.exit(1);
});
