import type { DisplayFrame, DisplayPort } from '@/ports/DisplayPort';

export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Prints frames as one line each. Repeated identical frames are printed once.
 */
export class ConsoleDisplay implements DisplayPort {
  private lastLine: string | null = null;

  constructor(private readonly sink: LineSink = process.stdout) {}

  public async publish(frame: DisplayFrame): Promise<void> {
    const parts = [frame.stationName, frame.title, frame.statusLine].filter((part) => part.length > 0);
    if (frame.artwork) {
      parts.push(`[artwork ${frame.artwork.length} bytes]`);
    }
    const line = `[display] ${parts.join(' | ')}`;
    if (line === this.lastLine) {
      return;
    }
    this.lastLine = line;
    this.sink.write(`${line}\n`);
  }

  public async close(): Promise<void> {
    this.lastLine = null;
  }
}
