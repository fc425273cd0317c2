import type { ButtonEdge, ButtonEvent, ButtonId } from '@/domain/ui/types';

export interface ClickClassifierOptions {
  windowMs: number;
  /** Buttons that report double clicks; every other button only reports singles. */
  doubleClickButtons?: readonly ButtonId[];
}

/**
 * Turns press edges into click events. A press is reported as a single click at
 * once; a second press of a double-click button within the window is reported as a
 * double click, and presses right after a double click are swallowed for one window.
 */
export class ClickClassifier {
  private readonly doubleClickButtons: ReadonlySet<ButtonId>;
  private readonly lastPress = new Map<ButtonId, number>();
  private readonly quietUntil = new Map<ButtonId, number>();

  constructor(private readonly options: ClickClassifierOptions) {
    this.doubleClickButtons = new Set(options.doubleClickButtons ?? ['Y']);
  }

  public classify(edge: ButtonEdge): ButtonEvent | null {
    if (!edge.pressed) {
      return null;
    }
    const { button, at } = edge;
    if (!this.doubleClickButtons.has(button)) {
      return { button, click: 'single', at };
    }
    const quietUntil = this.quietUntil.get(button);
    if (quietUntil !== undefined && at <= quietUntil) {
      return null;
    }
    const previous = this.lastPress.get(button);
    if (previous !== undefined && at - previous <= this.options.windowMs) {
      this.lastPress.delete(button);
      this.quietUntil.set(button, at + this.options.windowMs);
      return { button, click: 'double', at };
    }
    this.lastPress.set(button, at);
    return { button, click: 'single', at };
  }

  public reset(): void {
    this.lastPress.clear();
    this.quietUntil.clear();
  }
}
