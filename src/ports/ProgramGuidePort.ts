export interface ProgramEntry {
  title: string;
  imageUrl: string | null;
  startsAt: number;
  endsAt: number;
}

export interface ProgramGuidePort {
  /** Schedule of the broadcast day containing `at`. */
  fetchSchedule(stationId: string, at: number): Promise<ProgramEntry[]>;
  /** Currently announced title (track or segment), when the feed has one. */
  fetchNowOnAir(stationId: string): Promise<string | null>;
}

export interface StationListPort {
  fetchStationList(areaId: string): Promise<Array<{ id: string; name: string }>>;
}

export function findProgramAt(programs: readonly ProgramEntry[], now: number): ProgramEntry | null {
  return programs.find((program) => program.startsAt <= now && now < program.endsAt) ?? null;
}
