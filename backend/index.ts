import { loadDotenv } from './config/dotenvLoader.js';

loadDotenv();
import type { Server } from 'node:http';
import { loadEnv } from './config/env.js';
import { createApp } from './app.js';
import { startupLog, logEvent, getSystemMetrics } from './config/logger.js';
import { logAvailabilityEvent } from './config/appLogs.js';
import { setReady, setShuttingDown, isShuttingDown } from './config/lifecycle.js';

let server: Server | null = null;
const shutdownTimeoutMs = Number(process.env.SHUTDOWN_TIMEOUT_MS) || 10_000;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown()) return;
  setShuttingDown(true);
  setReady(false);

  logAvailabilityEvent('APPLICATION_SHUTDOWN_START', { signal });

  const forceTimer = setTimeout(() => {
    startupLog.error('Force shutdown after timeout', { shutdownTimeoutMs });
    process.exit(1);
  }, shutdownTimeoutMs);
  forceTimer.unref();

  try {
    await new Promise<void>((resolve, reject) => {
      if (!server) return resolve();
      server.close((err) => (err ? reject(err) : resolve()));
    });
  } catch (err) {
    startupLog.error('Error while closing HTTP server', { error: err });
  } finally {
    clearTimeout(forceTimer);
    logAvailabilityEvent('APPLICATION_SHUTDOWN_COMPLETE', { signal });
  }
}

function main(): void {
  logAvailabilityEvent('APPLICATION_STARTING');
  const env = loadEnv();
  const app = createApp(env);

  const httpServer = app.listen(env.PORT, () => {
    // Outlast typical load-balancer idle timeouts (60s) to avoid spurious 502s.
    httpServer.keepAliveTimeout = 65_000;
    httpServer.headersTimeout = 66_000;
    setReady(true);

    logAvailabilityEvent('APPLICATION_READY', {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      pid: process.pid,
    });
  });
  server = httpServer;
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logEvent('error', 'Unhandled promise rejection', {
    domain: 'system',
    eventName: 'UNHANDLED_REJECTION',
    stack: reason instanceof Error ? reason.stack : String(reason),
    metadata: { reason: String(reason), ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('unhandledRejection');
});
process.on('uncaughtException', (err) => {
  logEvent('error', `Uncaught exception: ${err.message}`, {
    domain: 'system',
    eventName: 'UNCAUGHT_EXCEPTION',
    stack: err.stack,
    metadata: { name: err.name, ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('uncaughtException');
});

try {
  main();
} catch (err) {
  logEvent('error', `Fatal startup error: ${err instanceof Error ? err.message : String(err)}`, {
    domain: 'system',
    eventName: 'STARTUP_FATAL',
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exitCode = 1;
}
