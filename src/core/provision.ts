import path from 'path';
import type { Logger } from '../utils/logger.js';
import type { Installer } from './installers/index.js';
import type { CapabilityProbe } from './probe.js';
import type { SystemActions } from './system.js';
import { describeAction } from './plan.js';
import { assertNever } from './types.js';
import type { ProvisionAction, ProvisionReport, StepOutcome } from './types.js';

export type ProvisionDeps = {
  installer: Installer;
  probe: CapabilityProbe;
  system: SystemActions;
  logger: Logger;
  /** The invoking user's login shell (`$SHELL`). */
  loginShell?: string;
  etcShells: string;
};

type StepResult = Omit<StepOutcome, 'label'>;

const ok = (detail?: string): StepResult => ({ status: 'ok', detail });
const skipped = (detail: string): StepResult => ({ status: 'skipped', detail });
const failed = (detail: string): StepResult => ({ status: 'failed', detail });

async function registerShell(shell: string, deps: ProvisionDeps): Promise<StepResult> {
  if (!await deps.probe.isExecutable(shell)) return skipped(`${shell} is not executable`);
  const registry = await deps.probe.readFile(deps.etcShells);
  if (registry === null) return skipped(`${deps.etcShells} not found`);
  if (registry.split('\n').some((line) => line.trim() === shell)) return skipped('already registered');

  deps.logger.info(`Adding ${shell} to ${deps.etcShells}`);
  const done = await deps.system.run(
    { program: 'tee', args: ['-a', deps.etcShells], input: `${shell}\n`, silent: true },
    { elevate: true },
  );
  return done ? ok() : failed(`could not append to ${deps.etcShells}`);
}

async function setDefaultShell(shell: string, deps: ProvisionDeps): Promise<StepResult> {
  if (!deps.loginShell) {
    deps.logger.warn('SHELL env var not set; skipping default shell change');
    return skipped('SHELL not set');
  }
  if (deps.loginShell === shell) {
    deps.logger.info(`Default shell already set to ${shell}`);
    return skipped('already the default shell');
  }
  if (!await deps.probe.isExecutable(shell)) {
    deps.logger.warn(`Shell not executable: ${shell} (skipping)`);
    return skipped(`${shell} is not executable`);
  }
  if (!await deps.probe.hasCommand('chsh')) {
    deps.logger.warn('chsh not found; skipping default shell change');
    return skipped('chsh not found');
  }
  deps.logger.info(`Setting default shell to ${shell} (may prompt for password)`);
  const done = await deps.system.run({ program: 'chsh', args: ['-s', shell] });
  return done ? ok() : failed('chsh failed');
}

async function cloneRepo(
  action: Extract<ProvisionAction, { type: 'clone' }>,
  deps: ProvisionDeps,
): Promise<StepResult> {
  if (await deps.probe.isDirectory(action.dest)) {
    deps.logger.info(`${action.name} already present at ${action.dest}`);
    return skipped('already present');
  }
  deps.logger.info(`Installing ${action.name} (git clone) -> ${action.dest}`);
  await deps.system.makeDir(path.dirname(action.dest));
  if (!await deps.system.run({ program: 'git', args: ['clone', action.url, action.dest] })) {
    return failed(`git clone ${action.url} failed`);
  }
  // Starter templates become the user's own config, not a checkout.
  if (action.detach) await deps.system.remove(path.join(action.dest, '.git'));
  return ok();
}

async function download(
  action: Extract<ProvisionAction, { type: 'download' }>,
  deps: ProvisionDeps,
): Promise<StepResult> {
  if (await deps.probe.isExecutable(action.dest)) {
    deps.logger.info(`${action.name} already installed at ${action.dest}`);
    return skipped('already present');
  }
  deps.logger.info(`Installing ${action.name} -> ${action.dest}`);
  await deps.system.makeDir(path.dirname(action.dest));
  if (!await deps.system.run({ program: 'curl', args: ['-fsSL', action.url, '-o', action.dest] })) {
    return failed(`download of ${action.url} failed`);
  }
  await deps.system.chmod(action.dest, 0o755);
  return ok();
}

async function runStep(action: ProvisionAction, deps: ProvisionDeps): Promise<StepResult> {
  switch (action.type) {
    case 'package': {
      const result = await deps.installer.ensure(action.spec);
      switch (result.outcome) {
        case 'already-present':
          return skipped('already present');
        case 'installed':
          return ok('installed');
        case 'failed':
          return failed(result.detail ?? 'install failed');
        default:
          return assertNever(result.outcome);
      }
    }
    case 'refresh-index': {
      const refreshed = await deps.installer.refreshIndex();
      if (refreshed === null) return skipped(`${deps.installer.name} has no index to refresh`);
      return refreshed ? ok() : failed('index refresh failed');
    }
    case 'register-shell':
      return registerShell(action.shell, deps);
    case 'default-shell':
      return setDefaultShell(action.shell, deps);
    case 'clone':
      return cloneRepo(action, deps);
    case 'download':
      return download(action, deps);
    case 'note':
      deps.logger.info(action.message);
      return ok();
    default:
      return assertNever(action);
  }
}

/**
 * Run the plan in order. A failing step whose policy is `abort` ends the run;
 * one whose policy is `continue` is reported and the run goes on.
 */
export async function runProvisioning(actions: ProvisionAction[], deps: ProvisionDeps): Promise<ProvisionReport> {
  const steps: StepOutcome[] = [];
  for (const action of actions) {
    const label = describeAction(action);
    const result = await runStep(action, deps);
    steps.push({ label, ...result });
    if (result.status !== 'failed') continue;
    if (action.onFailure === 'abort') {
      deps.logger.error(`${label} failed: ${result.detail ?? 'unknown error'}`);
      return { steps, aborted: true };
    }
    deps.logger.warn(`${label} failed: ${result.detail ?? 'unknown error'} (continuing)`);
  }
  return { steps, aborted: false };
}
