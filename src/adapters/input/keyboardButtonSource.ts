import type { ButtonId } from '@/domain/ui/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { ButtonEdgeListener, ButtonSourcePort } from '@/ports/ButtonSourcePort';
import { systemClock } from '@/shared/time/systemClock';
import { createLogger } from '@/shared/logging/logger';

const KEY_BUTTONS: Readonly<Record<string, ButtonId>> = { a: 'A', b: 'B', x: 'X', y: 'Y' };
const CTRL_C = '\u0003';

export function keyToButton(key: string): ButtonId | null {
  return KEY_BUTTONS[key.toLowerCase()] ?? null;
}

/**
 * Maps the keys a, b, x and y on an interactive terminal to button presses.
 * A key reports a press and a release at the same instant.
 */
export class KeyboardButtonSource implements ButtonSourcePort {
  public readonly name = 'keyboard';
  private readonly log = createLogger('Input', 'Keyboard');
  private onData: ((chunk: Buffer) => void) | null = null;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly clock: ClockPort = systemClock,
  ) {}

  public start(listener: ButtonEdgeListener): void {
    if (!this.input.isTTY) {
      this.log.info('stdin is not a terminal; keyboard buttons disabled');
      return;
    }
    this.input.setRawMode(true);
    this.input.resume();
    this.onData = (chunk: Buffer) => {
      for (const key of chunk.toString('utf8')) {
        if (key === CTRL_C) {
          process.kill(process.pid, 'SIGINT');
          continue;
        }
        const button = keyToButton(key);
        if (!button) {
          continue;
        }
        const at = this.clock.now();
        listener({ button, pressed: true, at });
        listener({ button, pressed: false, at });
      }
    };
    this.input.on('data', this.onData);
    this.log.info('keyboard buttons enabled (a/b/x/y)');
  }

  public async stop(): Promise<void> {
    if (!this.onData) {
      return;
    }
    this.input.off('data', this.onData);
    this.onData = null;
    this.input.setRawMode(false);
    this.input.pause();
  }
}
