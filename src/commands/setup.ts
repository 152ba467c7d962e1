import { buildStowPackages } from '../core/apps.js';
import type { SetupContext } from '../core/context.js';
import { syncDotfiles } from '../core/dotfiles.js';
import { createLinkBackend, reconcile } from '../core/stow/index.js';
import type { ProvisionReport, StowReport } from '../core/types.js';
import { SetupError, SetupErrorCode } from '../utils/errors.js';
import { runBootstrap } from './bootstrap.js';
import type { HostInputs } from './bootstrap.js';

export type SetupOptions = {
  apps: readonly string[];
  bootstrap: boolean;
  stow: boolean;
};

export type SetupResult = {
  provision: ProvisionReport | null;
  stow: StowReport | null;
  exitCode: number;
};

export async function runSetup(ctx: SetupContext, opts: SetupOptions, inputs: HostInputs = {}): Promise<SetupResult> {
  const { config, logger, probe, system } = ctx;

  await syncDotfiles({ dir: config.paths.dotfilesDir, repoUrl: config.dotfilesRepoUrl, probe, system, logger });

  let provision: ProvisionReport | null = null;
  if (opts.bootstrap) {
    provision = await runBootstrap(ctx, inputs);
    if (provision.aborted) {
      throw new SetupError(SetupErrorCode.INSTALL_FAILED, 'Provisioning stopped at a failed step; dotfiles were not linked.');
    }
  } else {
    logger.info('Skipping bootstrap (--skip-bootstrap)');
  }

  if (!opts.stow) {
    logger.info('Skipping stow (--skip-stow)');
    return { provision, stow: null, exitCode: 0 };
  }

  const backend = createLinkBackend(config.stowBackend, { probe, system });
  await backend.preflight();
  logger.info(`Stow apps: ${opts.apps.join(' ')}`);
  const packages = buildStowPackages({
    apps: opts.apps,
    dotfilesDir: config.paths.dotfilesDir,
    homeDir: config.paths.homeDir,
    probe,
  });
  const stow = await reconcile(packages, {
    backend,
    force: config.forceStow,
    restow: config.restow,
    probe,
    system,
    logger,
  });
  return { provision, stow, exitCode: stow.failed ? 1 : 0 };
}
