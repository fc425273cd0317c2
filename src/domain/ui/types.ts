export type ButtonId = 'A' | 'B' | 'X' | 'Y';

export const BUTTON_IDS: readonly ButtonId[] = ['A', 'B', 'X', 'Y'];

/** Raw edge reported by an input source. */
export interface ButtonEdge {
  button: ButtonId;
  pressed: boolean;
  at: number;
}

export type ClickKind = 'single' | 'double';

export interface ButtonEvent {
  button: ButtonId;
  click: ClickKind;
  at: number;
}

export type UiCommand =
  | 'SelectPrevious'
  | 'SelectNext'
  | 'ToggleMode'
  | 'ShowShutdownPrompt'
  | 'ConfirmShutdown'
  | 'DismissShutdownPrompt';

export type UiState = 'Idle' | 'ShutdownConfirm' | 'Shutdown';
