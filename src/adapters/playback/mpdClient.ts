import net from 'node:net';
import { createLogger } from '@/shared/logging/logger';

export class MpdCommandError extends Error {
  public readonly name = 'MpdCommandError';
}

export interface MpdClientOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

export type MpdResponse = Array<[string, string]>;

/** Quotes an argument for the MPD command line. */
export function mpdQuote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Parses one complete response. Returns null while the terminating `OK` / `ACK`
 * line has not arrived yet.
 */
export function parseMpdResponse(buffer: string): MpdResponse | null {
  const lines = buffer.split('\n');
  lines.pop();
  const pairs: MpdResponse = [];
  for (const line of lines) {
    if (line === 'OK') {
      return pairs;
    }
    if (line.startsWith('ACK ')) {
      throw new MpdCommandError(line.slice(4));
    }
    const idx = line.indexOf(': ');
    if (idx > 0) {
      pairs.push([line.slice(0, idx), line.slice(idx + 2)]);
    }
  }
  return null;
}

export function responseValue(response: MpdResponse, key: string): string | null {
  const lower = key.toLowerCase();
  return response.find(([name]) => name.toLowerCase() === lower)?.[1] ?? null;
}

/**
 * Minimal MPD protocol client: one connection per command list.
 */
export class MpdClient {
  private readonly log = createLogger('Playback', 'MpdClient');

  constructor(private readonly options: MpdClientOptions) {}

  public async run(commands: string[]): Promise<MpdResponse> {
    const payload =
      commands.length === 1
        ? `${commands[0]}\n`
        : ['command_list_begin', ...commands, 'command_list_end', ''].join('\n');
    return new Promise<MpdResponse>((resolve, reject) => {
      const socket = net.createConnection({ host: this.options.host, port: this.options.port });
      socket.setEncoding('utf8');
      socket.setTimeout(this.options.timeoutMs ?? 3000);
      let greeted = false;
      let buffer = '';
      let settled = false;
      const finish = (error: Error | null, response?: MpdResponse) => {
        if (settled) {
          return;
        }
        settled = true;
        socket.end();
        if (error) {
          reject(error);
        } else {
          resolve(response ?? []);
        }
      };
      socket.on('data', (chunk: string) => {
        buffer += chunk;
        if (!greeted) {
          const newline = buffer.indexOf('\n');
          if (newline < 0) {
            return;
          }
          const greeting = buffer.slice(0, newline);
          if (!greeting.startsWith('OK MPD')) {
            finish(new MpdCommandError(`unexpected greeting: ${greeting}`));
            return;
          }
          greeted = true;
          buffer = buffer.slice(newline + 1);
          this.log.spam('mpd command', { commands });
          socket.write(payload);
          return;
        }
        try {
          const response = parseMpdResponse(buffer);
          if (response) {
            finish(null, response);
          }
        } catch (error) {
          finish(error instanceof Error ? error : new MpdCommandError(String(error)));
        }
      });
      socket.on('timeout', () => finish(new MpdCommandError('mpd timed out')));
      socket.on('error', (error) => finish(error));
      socket.on('close', () => finish(new MpdCommandError('mpd closed the connection')));
    });
  }
}
