import { loadConfig } from '@/config';
import { createTokenManager, createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';
import { exportStationList } from '@/runtime/stationListExport';
import { RadikoProgramClient } from '@/adapters/content/radiko/radikoProgramClient';
import { runDetached } from '@/shared/bestEffort';
import { createLogger, errorMessage, logManager } from '@/shared/logging/logger';

const log = createLogger('Server');

async function main(): Promise<void> {
  const config = loadConfig();

  if (config.exportStations) {
    logManager.configure({ level: config.logLevel, json: config.logJson });
    await exportStationList({
      tokens: createTokenManager(config),
      stationList: new RadikoProgramClient(),
      stationsFile: config.stationsFile,
    });
    return;
  }

  let shutdown: (() => Promise<void>) | null = null;
  const runtime = createRuntime(config, {
    onShutdownComplete: () => {
      if (shutdown) {
        runDetached(shutdown(), log, 'shutdown failed');
      }
    },
  });
  await runtime.start();
  shutdown = registerShutdownHandlers(runtime, log);
}

main().catch((error: unknown) => {
  log.error('fatal bootstrap error', { message: errorMessage(error) });
  process.exit(1);
});
