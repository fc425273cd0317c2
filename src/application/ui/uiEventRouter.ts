import type { ButtonEvent, UiCommand, UiState } from '@/domain/ui/types';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export type UiCommandListener = (command: UiCommand) => void;

/** Schedules `fn` after `ms`; the returned function cancels it. */
export type ScheduleTimeout = (fn: () => void, ms: number) => () => void;

export const scheduleTimeout: ScheduleTimeout = (fn, ms) => {
  const timer = setTimeout(fn, ms);
  timer.unref();
  return () => clearTimeout(timer);
};

export interface UiEventRouterOptions {
  shutdownConfirmMs: number;
  schedule?: ScheduleTimeout;
}

export class UiEventRouter {
  private readonly log = createLogger('UI', 'Router');
  private readonly listeners = new Set<UiCommandListener>();
  private readonly schedule: ScheduleTimeout;
  private state: UiState = 'Idle';
  private cancelPromptTimeout: (() => void) | null = null;

  constructor(private readonly options: UiEventRouterOptions) {
    this.schedule = options.schedule ?? scheduleTimeout;
  }

  public getState(): UiState {
    return this.state;
  }

  public onCommand(listener: UiCommandListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public handle(event: ButtonEvent): void {
    switch (this.state) {
      case 'Idle':
        this.handleIdle(event);
        return;
      case 'ShutdownConfirm':
        if (event.button === 'X' && event.click === 'single') {
          this.clearPromptTimeout();
          this.state = 'Shutdown';
          this.emit('ConfirmShutdown');
        } else {
          this.dismissPrompt();
        }
        return;
      case 'Shutdown':
        this.log.debug('button ignored after shutdown', { button: event.button });
        return;
    }
  }

  public dispose(): void {
    this.clearPromptTimeout();
    this.listeners.clear();
  }

  private handleIdle(event: ButtonEvent): void {
    if (event.button === 'A') {
      this.emit('SelectPrevious');
    } else if (event.button === 'B') {
      this.emit('SelectNext');
    } else if (event.button === 'X' && event.click === 'single') {
      this.emit('ToggleMode');
    } else if (event.button === 'Y' && event.click === 'double') {
      this.state = 'ShutdownConfirm';
      this.cancelPromptTimeout = this.schedule(() => {
        this.cancelPromptTimeout = null;
        if (this.state === 'ShutdownConfirm') {
          this.log.info('shutdown prompt timed out');
          this.dismissPrompt();
        }
      }, this.options.shutdownConfirmMs);
      this.emit('ShowShutdownPrompt');
    }
  }

  private dismissPrompt(): void {
    this.clearPromptTimeout();
    this.state = 'Idle';
    this.emit('DismissShutdownPrompt');
  }

  private clearPromptTimeout(): void {
    this.cancelPromptTimeout?.();
    this.cancelPromptTimeout = null;
  }

  private emit(command: UiCommand): void {
    this.log.debug('ui command', { command, state: this.state });
    for (const listener of this.listeners) {
      try {
        listener(command);
      } catch (error) {
        this.log.warn('ui listener error', { command, message: errorMessage(error) });
      }
    }
  }
}
