import { errorMessage, type ComponentLogger, type LogContext } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  /** How a swallowed failure is reported; nothing is logged without a logger. */
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: LogContext;
  log?: Pick<ComponentLogger, 'debug' | 'warn'>;
};

/**
 * Runs an optional step (artwork, now-on-air text, a state write) and returns
 * `fallback` instead of rejecting.
 */
export async function bestEffort<T>(fn: () => Promise<T>, options: BestEffortOptions<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const { log, onError = 'ignore' } = options;
    if (log && onError !== 'ignore') {
      log[onError](options.label ?? 'best-effort fallback used', {
        ...options.context,
        message: errorMessage(error),
      });
    }
    return options.fallback;
  }
}

export async function safeReadText(
  response: { text: () => Promise<string> },
  fallback = '',
): Promise<string> {
  return bestEffort(() => response.text(), { fallback });
}

/**
 * Runs a promise without awaiting it; a rejection is logged as an error.
 */
export function runDetached(
  task: Promise<unknown>,
  log: Pick<ComponentLogger, 'error'>,
  label: string,
  context?: LogContext,
): void {
  task.catch((error: unknown) => {
    log.error(label, { ...context, message: errorMessage(error) });
  });
}
