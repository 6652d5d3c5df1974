import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const logger = getLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'drain' | 'queues' | 'connections';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'queues', 'connections'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(phase: ShutdownPhase, label: string, hook: ShutdownHook): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered shutdown hook', { phase, label });
}

/**
 * Runs every registered hook phase by phase. A failing hook is logged and the rest still run.
 */
export async function runShutdownHooks(): Promise<void> {
  for (const phase of PHASE_ORDER) {
    for (const { hook, label } of phasedHooks.filter(h => h.phase === phase)) {
      try {
        await hook();
        logger.debug('Shutdown hook completed', { phase, label });
      } catch (error) {
        logger.error('Shutdown hook failed', { phase, label, error: serializeError(error) });
      }
    }
  }
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs?: number): void {
  const timeout = timeoutMs || parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '15000', 10);

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`, { timeoutMs: timeout });

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);
    timer.unref();

    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
      logger.info('HTTP server closed');
    }
    await runShutdownHooks();

    logger.info('Graceful shutdown complete');
    clearTimeout(timer);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
