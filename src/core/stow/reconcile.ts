import path from 'path';
import { errorMessage } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { CapabilityProbe } from '../probe.js';
import type { SystemActions } from '../system.js';
import type { StowOutcome, StowPackage, StowReport } from '../types.js';
import type { LinkBackend } from './backend.js';

export type ReconcileOptions = {
  backend: LinkBackend;
  force: boolean;
  restow: boolean;
  probe: CapabilityProbe;
  system: SystemActions;
  logger: Logger;
};

async function isEligible(pkg: StowPackage, opts: ReconcileOptions): Promise<StowOutcome | null> {
  if (!await opts.probe.isDirectory(pkg.sourceDir)) {
    opts.logger.warn(`Dotfiles package not found: ${pkg.sourceDir} (skipping)`);
    return { package: pkg.name, outcome: 'skipped-missing-source' };
  }
  if (pkg.detect === null) {
    opts.logger.warn(`Unknown app '${pkg.name}' (no detection mapping). Stowing anyway.`);
    return null;
  }
  if (!await pkg.detect()) {
    opts.logger.warn(`App '${pkg.name}' not installed, skipping stow`);
    return { package: pkg.name, outcome: 'skipped-not-installed' };
  }
  return null;
}

async function createExtraLinks(pkg: StowPackage, opts: ReconcileOptions): Promise<void> {
  for (const extra of pkg.extraLinks) {
    const target = path.join(pkg.targetDir, extra.target);
    const link = path.join(pkg.targetDir, extra.link);
    if (!await opts.probe.exists(target) || await opts.probe.exists(link)) continue;
    opts.logger.info(`Creating symlink: ${link} -> ${target}`);
    await opts.system.symlink(target, link);
  }
}

async function reconcilePackage(pkg: StowPackage, opts: ReconcileOptions): Promise<StowOutcome> {
  const skip = await isEligible(pkg, opts);
  if (skip) return skip;

  opts.logger.info(`Stow dry-run: ${pkg.name}`);
  let conflicts: string[];
  try {
    ({ conflicts } = await opts.backend.trial(pkg, { restow: opts.restow }));
  } catch (err) {
    opts.logger.error(`Stow dry-run failed for '${pkg.name}': ${errorMessage(err)}`);
    return { package: pkg.name, outcome: 'failed', detail: errorMessage(err) };
  }

  const adopt = conflicts.length > 0;
  if (adopt) {
    opts.logger.warn(`Conflicts detected for '${pkg.name}'.`);
    for (const line of conflicts) opts.logger.warn(`  ${line}`);
    if (!opts.force) {
      opts.logger.error(`Refusing to stow '${pkg.name}' due to conflicts.`);
      opts.logger.error('Resolve conflicts manually or re-run with FORCE_STOW=1 (be careful).');
      return { package: pkg.name, outcome: 'conflict-refused', conflicts };
    }
    opts.logger.warn('FORCE_STOW=1: using adopt mode (moves existing files into the stow package).');
  }

  opts.logger.info(`Stowing: ${pkg.name}`);
  try {
    await opts.backend.link(pkg, { restow: opts.restow, adopt });
    await createExtraLinks(pkg, opts);
  } catch (err) {
    opts.logger.error(`Stow failed for '${pkg.name}': ${errorMessage(err)}`);
    return { package: pkg.name, outcome: 'failed', conflicts: adopt ? conflicts : undefined, detail: errorMessage(err) };
  }

  if (adopt) return { package: pkg.name, outcome: 'conflict-adopted', conflicts };
  return { package: pkg.name, outcome: 'linked' };
}

/** Link every package independently; one failure never stops the rest. */
export async function reconcile(packages: StowPackage[], opts: ReconcileOptions): Promise<StowReport> {
  const outcomes: StowOutcome[] = [];
  for (const pkg of packages) {
    outcomes.push(await reconcilePackage(pkg, opts));
  }
  const failed = outcomes.some((o) => o.outcome === 'conflict-refused' || o.outcome === 'failed');
  return { outcomes, failed };
}
