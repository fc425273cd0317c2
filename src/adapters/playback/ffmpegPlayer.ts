import { spawn, type ChildProcess } from 'node:child_process';
import { PlaybackBackendError } from '@/domain/errors';
import type { StreamRef } from '@/domain/session/types';
import type {
  BackendStatus,
  PlaybackBackendPort,
  UnexpectedStopListener,
} from '@/ports/PlaybackBackendPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface FfmpegPlayerOptions {
  binary: string;
  alsaDevice: string;
  /** ffmpeg `-loglevel`; `info` keeps ICY titles visible on stderr. */
  logLevel?: 'warning' | 'info';
  /** A process exiting within this window counts as a failed start. */
  startGraceMs?: number;
  stopTimeoutMs?: number;
}

export function buildFfmpegArgs(
  stream: Pick<StreamRef, 'url' | 'headers'>,
  options: Pick<FfmpegPlayerOptions, 'alsaDevice' | 'logLevel'>,
): string[] {
  const args = ['-loglevel', options.logLevel ?? 'info'];
  const headers = Object.entries(stream.headers);
  if (headers.length > 0) {
    args.push('-headers', headers.map(([key, value]) => `${key}: ${value}\r\n`).join(''));
  }
  args.push('-i', stream.url, '-f', 'alsa', '-ac', '2', '-ar', '48000', options.alsaDevice);
  return args;
}

/** Last `StreamTitle` announced in ffmpeg's metadata dump. */
export function parseIcyTitle(chunk: string): string | null {
  let title: string | null = null;
  for (const match of chunk.matchAll(/StreamTitle\s*:\s*(.*)$/gm)) {
    title = match[1].trim() || null;
  }
  return title;
}

interface RunningProcess {
  proc: ChildProcess;
  stationId: string;
  stopping: boolean;
  exited: Promise<void>;
}

/**
 * Plays one stream through an ffmpeg process writing to ALSA. This is the backend
 * that can attach request headers.
 */
export class FfmpegPlayer implements PlaybackBackendPort {
  private readonly log = createLogger('Playback', 'Ffmpeg');
  private readonly listeners = new Set<UnexpectedStopListener>();
  private current: RunningProcess | null = null;
  private title: string | null = null;

  constructor(private readonly options: FfmpegPlayerOptions) {}

  public async start(stream: StreamRef): Promise<void> {
    await this.stop();
    const args = buildFfmpegArgs(stream, this.options);
    this.log.info('starting ffmpeg', {
      stationId: stream.stationId,
      url: stream.url,
      headers: Object.keys(stream.headers),
    });
    let proc: ChildProcess;
    try {
      proc = spawn(this.options.binary, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    } catch (error) {
      throw new PlaybackBackendError(`ffmpeg could not be spawned: ${errorMessage(error)}`, error);
    }
    const running: RunningProcess = {
      proc,
      stationId: stream.stationId,
      stopping: false,
      exited: new Promise<void>((resolve) => {
        proc.once('exit', () => resolve());
        proc.once('error', () => resolve());
      }),
    };
    this.current = running;
    this.title = null;

    proc.on('error', (error) => {
      this.log.debug('ffmpeg process error', { stationId: stream.stationId, message: error.message });
    });
    proc.stderr?.on('data', (data: Buffer) => {
      const text = data.toString();
      const title = parseIcyTitle(text);
      if (title) {
        this.title = title;
      }
      const line = text.trim();
      if (line) {
        this.log.spam(`[ffmpeg] ${line}`);
      }
    });

    await this.awaitStartup(running);

    proc.once('exit', (code, signal) => {
      if (this.current === running) {
        this.current = null;
      }
      if (running.stopping) {
        return;
      }
      const reason = `ffmpeg exited (code ${code ?? 'null'}, signal ${signal ?? 'none'})`;
      this.log.warn('ffmpeg stopped unexpectedly', { stationId: running.stationId, code, signal });
      for (const listener of this.listeners) {
        listener(reason);
      }
    });
  }

  public async stop(): Promise<void> {
    const running = this.current;
    if (!running) {
      return;
    }
    this.current = null;
    this.title = null;
    running.stopping = true;
    running.proc.kill('SIGTERM');
    const timeoutMs = this.options.stopTimeoutMs ?? 3000;
    let timer: NodeJS.Timeout | undefined;
    const killed = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const outcome = await Promise.race([running.exited.then(() => 'exited' as const), killed]);
    clearTimeout(timer);
    if (outcome === 'timeout') {
      this.log.warn('ffmpeg ignored SIGTERM; killing', { stationId: running.stationId });
      running.proc.kill('SIGKILL');
    }
    this.log.info('ffmpeg stopped', { stationId: running.stationId });
  }

  public async status(): Promise<BackendStatus> {
    return this.current ? 'running' : 'stopped';
  }

  public async currentTitle(): Promise<string | null> {
    return this.title;
  }

  public onUnexpectedStop(listener: UnexpectedStopListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private awaitStartup(running: RunningProcess): Promise<void> {
    const graceMs = this.options.startGraceMs ?? 1000;
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        resolve();
      }, graceMs);
      const onError = (error: Error) => {
        cleanup();
        this.current = null;
        reject(new PlaybackBackendError(`ffmpeg failed to start: ${error.message}`, error));
      };
      const onExit = (code: number | null) => {
        cleanup();
        this.current = null;
        reject(new PlaybackBackendError(`ffmpeg exited during startup (code ${code ?? 'null'})`));
      };
      const cleanup = () => {
        clearTimeout(timer);
        running.proc.off('error', onError);
        running.proc.off('exit', onExit);
      };
      running.proc.once('error', onError);
      running.proc.once('exit', onExit);
    });
  }
}
