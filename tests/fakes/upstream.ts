import type { AuthChallenge, AuthConfirmation, AuthHandshakePort } from '../../src/ports/AuthHandshakePort';
import type { ProgramEntry, ProgramGuidePort } from '../../src/ports/ProgramGuidePort';
import type { StationDescriptor } from '../../src/domain/station/types';
import type { StationDirectoryPort } from '../../src/ports/StationDirectoryPort';

/** Handshake stand-in; fails the first `failures` challenges. */
export class FakeHandshake implements AuthHandshakePort {
  public challenges = 0;
  public confirmations: string[] = [];
  public failures = 0;
  public areaId: string | null = 'JP13';
  public gate: Promise<void> | null = null;

  public async requestChallenge(): Promise<AuthChallenge> {
    this.challenges += 1;
    if (this.gate) {
      await this.gate;
    }
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('auth1 rejected: HTTP 503');
    }
    return { token: `token-${this.challenges}`, keyOffset: 4, keyLength: 8 };
  }

  public async confirm(_challenge: AuthChallenge, partialKey: string): Promise<AuthConfirmation> {
    this.confirmations.push(partialKey);
    return { areaId: this.areaId };
  }
}

export class FakeProgramGuide implements ProgramGuidePort {
  public schedules = new Map<string, ProgramEntry[]>();
  public nowOnAir = new Map<string, string>();
  public scheduleCalls: string[] = [];
  public failSchedule = false;

  public async fetchSchedule(stationId: string): Promise<ProgramEntry[]> {
    this.scheduleCalls.push(stationId);
    if (this.failSchedule) {
      throw new Error('HTTP 500');
    }
    return this.schedules.get(stationId) ?? [];
  }

  public async fetchNowOnAir(stationId: string): Promise<string | null> {
    return this.nowOnAir.get(stationId) ?? null;
  }
}

export class FakeDirectory implements StationDirectoryPort {
  public lookups = 0;
  public error: Error | null = null;

  constructor(public stations: StationDescriptor[] = []) {}

  public async lookup(): Promise<StationDescriptor[]> {
    this.lookups += 1;
    if (this.error) {
      throw this.error;
    }
    return this.stations;
  }
}
