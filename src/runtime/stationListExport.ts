import type { AuthToken } from '@/application/auth/authTokenManager';
import type { StationListPort } from '@/ports/ProgramGuidePort';
import { createLogger } from '@/shared/logging/logger';
import { writeJsonAtomic } from '@/shared/utils/file';

const log = createLogger('Stations', 'Export');

/**
 * Regenerates the station file from the upstream list for the area the token
 * was issued for. Returns the number of stations written.
 */
export async function exportStationList(args: {
  tokens: { getValidToken(): Promise<AuthToken> };
  stationList: StationListPort;
  stationsFile: string;
}): Promise<number> {
  const token = await args.tokens.getValidToken();
  if (!token.areaId) {
    throw new Error('area id unknown; the token handshake did not report one');
  }
  const stations = await args.stationList.fetchStationList(token.areaId);
  if (stations.length === 0) {
    throw new Error(`no stations listed for area ${token.areaId}`);
  }
  await writeJsonAtomic(
    args.stationsFile,
    stations.map((station) => ({ id: station.id, name: station.name })),
  );
  log.info('station list written', {
    areaId: token.areaId,
    count: stations.length,
    file: args.stationsFile,
  });
  return stations.length;
}
