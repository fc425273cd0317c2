export interface DisplayFrame {
  stationName: string;
  title: string;
  artwork: Buffer | null;
  statusLine: string;
}

/**
 * Replaces every visible field at once. Presenters own truncation and layout.
 */
export interface DisplayPort {
  publish(frame: DisplayFrame): Promise<void>;
  close(): Promise<void>;
}
