import fs from 'fs';
import { formatInvocation, passthrough } from '../utils/exec.js';
import type { CommandSpec } from '../utils/exec.js';
import { ensureDir, removePath } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';

/** Prefix put in front of commands that need root. Empty when already root. */
export type Elevation = readonly string[];

export function resolveElevation(uid: number | undefined): Elevation {
  if (uid === undefined || uid === 0) return [];
  return ['sudo'];
}

export type RunOptions = { elevate?: boolean };

/**
 * Every mutating operation goes through here. Under dry-run each one is
 * logged and reported as successful without touching the host.
 */
export type SystemActions = {
  readonly dryRun: boolean;
  readonly elevation: Elevation;
  run(cmd: CommandSpec, opts?: RunOptions): Promise<boolean>;
  makeDir(dir: string): Promise<void>;
  symlink(target: string, linkPath: string): Promise<void>;
  move(from: string, to: string): Promise<void>;
  remove(p: string): Promise<void>;
  chmod(p: string, mode: number): Promise<void>;
};

export function elevate(cmd: CommandSpec, elevation: Elevation): CommandSpec {
  const [program, ...prefix] = elevation;
  if (program === undefined) return cmd;
  return { ...cmd, program, args: [...prefix, cmd.program, ...cmd.args] };
}

export function createSystemActions(opts: {
  dryRun: boolean;
  elevation: Elevation;
  logger: Logger;
}): SystemActions {
  const { dryRun, elevation, logger } = opts;
  const perform = async (description: string, action: () => Promise<void>): Promise<void> => {
    if (dryRun) {
      logger.dryRun(description);
      return;
    }
    await action();
  };

  return {
    dryRun,
    elevation,
    async run(cmd, runOpts) {
      const effective = runOpts?.elevate ? elevate(cmd, elevation) : cmd;
      if (dryRun) {
        logger.dryRun(formatInvocation(effective));
        return true;
      }
      return (await passthrough(effective)) === 0;
    },
    makeDir: (dir) => perform(`mkdir -p ${dir}`, () => ensureDir(dir)),
    symlink: (target, linkPath) => perform(`ln -s ${target} ${linkPath}`, () => fs.promises.symlink(target, linkPath)),
    move: (from, to) => perform(`mv ${from} ${to}`, () => fs.promises.rename(from, to)),
    remove: (p) => perform(`rm -rf ${p}`, () => removePath(p)),
    chmod: (p, mode) => perform(`chmod ${mode.toString(8)} ${p}`, () => fs.promises.chmod(p, mode)),
  };
}
