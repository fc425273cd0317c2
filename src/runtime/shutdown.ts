import { runDetached } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

/**
 * Stops the runtime on SIGINT/SIGTERM. The returned function runs the same
 * sequence on demand, e.g. after a confirmed power-off.
 */
export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Server'),
): () => Promise<void> {
  let shuttingDown = false;

  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    // Force-exit watchdog so Ctrl+C cannot hang forever if a service stop never resolves.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, 8000);

    await runtime.stop();

    clearTimeout(forceExit);
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    log.info('signal received', { signal });
    runDetached(shutdown(), log, 'shutdown failed');
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return shutdown;
}
