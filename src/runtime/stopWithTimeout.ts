import { errorMessage, type ComponentLogger } from '@/shared/logging/logger';

export type StopOutcome = 'stopped' | 'timeout' | 'failed';

export interface StoppableService {
  name: string;
  stop(): void | Promise<void>;
}

type StopLog = Pick<ComponentLogger, 'debug' | 'warn' | 'error'>;

/**
 * Stops one service, giving up after `timeoutMs`. A stop that outlives the
 * bound keeps running and a late failure is still logged.
 */
export async function stopWithTimeout(
  service: StoppableService,
  timeoutMs: number,
  log: StopLog,
): Promise<StopOutcome> {
  const stopping = Promise.resolve()
    .then(() => service.stop())
    .then(
      () => 'stopped' as const,
      (error: unknown) => {
        log.error('service stop failed', { service: service.name, message: errorMessage(error) });
        return 'failed' as const;
      },
    );

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });
  const outcome = await Promise.race([stopping, expired]);
  clearTimeout(timer);

  if (outcome === 'timeout') {
    log.warn('service stop timed out', { service: service.name, timeoutMs });
  } else if (outcome === 'stopped') {
    log.debug('service stopped', { service: service.name });
  }
  return outcome;
}

/**
 * Stops services stage by stage; services within a stage stop concurrently.
 * A stage that fails or times out does not hold back the next one.
 */
export async function stopInStages(
  stages: StoppableService[][],
  timeoutMs: number,
  log: StopLog,
): Promise<Record<string, StopOutcome>> {
  const outcomes: Record<string, StopOutcome> = {};
  for (const stage of stages) {
    const results = await Promise.all(stage.map((service) => stopWithTimeout(service, timeoutMs, log)));
    stage.forEach((service, index) => {
      outcomes[service.name] = results[index];
    });
  }
  return outcomes;
}
