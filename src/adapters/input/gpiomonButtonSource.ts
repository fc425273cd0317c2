import { spawn, type ChildProcess } from 'node:child_process';
import readline from 'node:readline';
import type { ButtonEdge, ButtonId } from '@/domain/ui/types';
import type { ButtonEdgeListener, ButtonSourcePort } from '@/ports/ButtonSourcePort';
import { createLogger } from '@/shared/logging/logger';

export interface GpiomonButtonSourceOptions {
  binary: string;
  chip: string;
  pins: Record<ButtonId, number>;
  /** Edges of one button closer together than this are contact bounce. */
  debounceMs?: number;
}

/**
 * Parses one `gpiomon -F '%o %e %s %n'` line. Buttons pull the line low, so a
 * falling edge (`0`) is a press.
 */
export function parseGpiomonLine(
  line: string,
  buttonsByPin: ReadonlyMap<number, ButtonId>,
): ButtonEdge | null {
  const match = line.trim().match(/^(\d+)\s+([01])\s+(\d+)\s+(\d+)$/);
  if (!match) {
    return null;
  }
  const button = buttonsByPin.get(Number(match[1]));
  if (!button) {
    return null;
  }
  return {
    button,
    pressed: match[2] === '0',
    at: Number(match[3]) * 1000 + Math.floor(Number(match[4]) / 1_000_000),
  };
}

/**
 * Button edges from a libgpiod `gpiomon` child process. If the tool is missing or
 * exits, the source logs it and stays silent.
 */
export class GpiomonButtonSource implements ButtonSourcePort {
  public readonly name = 'gpiomon';
  private readonly log = createLogger('Input', 'Gpiomon');
  private readonly buttonsByPin: ReadonlyMap<number, ButtonId>;
  private readonly lastEdgeAt = new Map<ButtonId, number>();
  private proc: ChildProcess | null = null;
  private stopping = false;

  constructor(private readonly options: GpiomonButtonSourceOptions) {
    const entries = Object.entries(options.pins).flatMap(([button, pin]) =>
      isButtonId(button) ? [[pin, button] as const] : [],
    );
    this.buttonsByPin = new Map(entries);
  }

  public start(listener: ButtonEdgeListener): void {
    const pins = [...this.buttonsByPin.keys()].map(String);
    const args = ['-F', '%o %e %s %n', this.options.chip, ...pins];
    this.log.info('starting gpiomon', { chip: this.options.chip, pins: pins.join(',') });
    this.stopping = false;
    const proc = spawn(this.options.binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.proc = proc;

    proc.on('error', (error) => {
      this.log.warn('gpiomon unavailable; buttons disabled', { message: error.message });
      this.proc = null;
    });
    proc.on('exit', (code, signal) => {
      if (!this.stopping) {
        this.log.warn('gpiomon exited; buttons disabled', { code, signal });
      }
      this.proc = null;
    });
    proc.stderr?.on('data', (data: Buffer) => {
      const message = data.toString().trim();
      if (message) {
        this.log.debug(`[gpiomon] ${message}`);
      }
    });
    if (proc.stdout) {
      readline.createInterface({ input: proc.stdout }).on('line', (line) => {
        const edge = parseGpiomonLine(line, this.buttonsByPin);
        if (edge && !this.isBounce(edge)) {
          listener(edge);
        }
      });
    }
  }

  public async stop(): Promise<void> {
    this.stopping = true;
    this.proc?.kill('SIGTERM');
    this.proc = null;
  }

  private isBounce(edge: ButtonEdge): boolean {
    if (!edge.pressed) {
      return false;
    }
    const previous = this.lastEdgeAt.get(edge.button);
    this.lastEdgeAt.set(edge.button, edge.at);
    return previous !== undefined && edge.at - previous < (this.options.debounceMs ?? 30);
  }
}

function isButtonId(value: string): value is ButtonId {
  return value === 'A' || value === 'B' || value === 'X' || value === 'Y';
}
