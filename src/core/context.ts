import type { Logger } from '../utils/logger.js';
import type { SetupConfig } from './config.js';
import { createHostProbe } from './probe.js';
import type { CapabilityProbe } from './probe.js';
import { createSystemActions, resolveElevation } from './system.js';
import type { SystemActions } from './system.js';

/** Everything a command needs, built once per run. */
export type SetupContext = {
  config: SetupConfig;
  logger: Logger;
  probe: CapabilityProbe;
  system: SystemActions;
};

export function createContext(
  config: SetupConfig,
  opts: { logger: Logger; uid: number | undefined; probe?: CapabilityProbe; system?: SystemActions },
): SetupContext {
  return {
    config,
    logger: opts.logger,
    probe: opts.probe ?? createHostProbe(config.host.searchPath),
    system: opts.system ?? createSystemActions({
      dryRun: config.dryRun,
      elevation: resolveElevation(opts.uid),
      logger: opts.logger,
    }),
  };
}
