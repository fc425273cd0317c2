import { spawn } from 'node:child_process';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Server', 'Poweroff');

/**
 * Runs the host power-off command. Resolves when it exits; a non-zero exit or a
 * spawn failure rejects.
 */
export function runPoweroff(command: readonly string[]): Promise<void> {
  const [binary, ...args] = command;
  if (!binary) {
    log.info('power-off command disabled');
    return Promise.resolve();
  }
  log.info('powering off', { command: command.join(' ') });
  return new Promise<void>((resolve, reject) => {
    const proc = spawn(binary, args, { stdio: 'ignore' });
    proc.once('error', reject);
    proc.once('exit', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`power-off command exited with code ${code ?? 'null'}`));
      }
    });
  });
}
