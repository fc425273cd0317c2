import type { ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/logging/logger';

export type MailboxHandler<T> = (message: T) => Promise<void> | void;

/**
 * Delivers posted messages to one handler, one at a time, in posting order.
 * A handler failure is logged and the next message still runs.
 */
export class SerialMailbox<T> {
  private readonly queue: T[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly handler: MailboxHandler<T>,
    private readonly log: ComponentLogger,
  ) {}

  public post(message: T): void {
    if (this.closed) {
      this.log.debug('message dropped after close');
      return;
    }
    this.queue.push(message);
    this.kick();
  }

  public get size(): number {
    return this.queue.length;
  }

  /** Resolves once the queue is empty. */
  public async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  public close(): void {
    this.closed = true;
    this.queue.length = 0;
  }

  private kick(): void {
    if (this.draining || this.queue.length === 0) {
      return;
    }
    this.draining = Promise.resolve()
      .then(() => this.drain())
      .finally(() => {
        this.draining = null;
        this.kick();
      });
  }

  private async drain(): Promise<void> {
    let message = this.queue.shift();
    while (message !== undefined) {
      try {
        await this.handler(message);
      } catch (error) {
        this.log.error('mailbox handler failed', { message: errorMessage(error) });
      }
      message = this.queue.shift();
    }
  }
}
