import type { Catalog } from '../core/catalog.js';
import { loadCatalog } from '../core/catalog.js';
import type { SetupContext } from '../core/context.js';
import { detectHost, readOsRelease } from '../core/detect.js';
import { createInstaller } from '../core/installers/index.js';
import { planProvisioning, supportedOs } from '../core/plan.js';
import { runProvisioning } from '../core/provision.js';
import type { HostProfile, ProvisionReport } from '../core/types.js';

/** Inputs normally read from disk; tests pass them in. */
export type HostInputs = {
  osRelease?: string | null;
  catalog?: Catalog;
};

export async function detect(ctx: SetupContext, inputs: HostInputs = {}): Promise<HostProfile> {
  const osRelease = inputs.osRelease !== undefined ? inputs.osRelease : await readOsRelease();
  return detectHost({
    platform: ctx.config.host.platform,
    osRelease,
    env: { DISPLAY: ctx.config.host.display, WAYLAND_DISPLAY: ctx.config.host.waylandDisplay },
    override: ctx.config.profileOverride,
  });
}

export async function runBootstrap(ctx: SetupContext, inputs: HostInputs = {}): Promise<ProvisionReport> {
  const { config, logger } = ctx;
  const host = await detect(ctx, inputs);
  logger.info(`Detected OS: ${host.os}`);
  logger.info(`Profile: ${host.profile} (set PROFILE=server|desktop to override)`);

  const os = supportedOs(host);
  const catalog = inputs.catalog ?? await loadCatalog();
  const installer = createInstaller(os, ctx);
  await installer.preflight();

  const actions = planProvisioning(host, {
    catalog,
    paths: config.paths,
    elevation: ctx.system.elevation,
    urls: { zinit: config.zinitUrl, lazyvimStarter: config.lazyvimStarterUrl, ezpodman: config.ezpodmanUrl },
  });
  const report = await runProvisioning(actions, {
    installer,
    probe: ctx.probe,
    system: ctx.system,
    logger,
    loginShell: config.host.shell,
    etcShells: config.paths.etcShells,
  });
  if (!report.aborted) logger.info('Done.');
  return report;
}
