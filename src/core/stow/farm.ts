import fs from 'fs';
import path from 'path';
import { pathExists, readLinkAbsolute } from '../../utils/fs.js';
import type { SystemActions } from '../system.js';
import type { StowPackage } from '../types.js';
import type { LinkBackend, LinkOptions, TrialResult } from './backend.js';

export type FarmTask =
  | { type: 'mkdir'; source: string; target: string }
  | { type: 'link'; source: string; target: string; replaceSymlink?: boolean }
  | { type: 'noop'; source: string; target: string }
  | { type: 'conflict'; source: string; target: string; reason: string; adoptable: boolean };

export type FarmConflict = Extract<FarmTask, { type: 'conflict' }>;

export type FarmPlan = {
  tasks: FarmTask[];
  changes: FarmTask[];
  conflicts: FarmConflict[];
};

const IGNORED_ANYWHERE = new Set(['.git', '.gitignore', '.gitmodules']);
const IGNORED_AT_ROOT = [/^README.*/, /^LICENSE.*/, /^COPYING$/];

function isIgnored(name: string, atRoot: boolean): boolean {
  if (IGNORED_ANYWHERE.has(name)) return true;
  return atRoot && IGNORED_AT_ROOT.some((re) => re.test(name));
}

function isInside(p: string, dir: string): boolean {
  const rel = path.relative(dir, p);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

function describeKind(stat: fs.Stats): string {
  return stat.isDirectory() ? 'directory' : stat.isFile() ? 'file' : 'path';
}

async function analyzeEntry(
  pkgRoot: string,
  targetRoot: string,
  rel: string,
  restow: boolean,
  tasks: FarmTask[],
): Promise<void> {
  const source = path.join(pkgRoot, rel);
  const target = path.join(targetRoot, rel);
  const sourceStat = await fs.promises.lstat(source);
  if (!await pathExists(target)) {
    // Never folded: several packages share directories such as ~/.config.
    if (sourceStat.isDirectory()) {
      tasks.push({ type: 'mkdir', source, target });
      await analyzeDir(pkgRoot, targetRoot, rel, restow, tasks);
    } else {
      tasks.push({ type: 'link', source, target });
    }
    return;
  }

  const targetStat = await fs.promises.lstat(target);
  if (targetStat.isSymbolicLink()) {
    const resolved = await readLinkAbsolute(target);
    if (resolved && path.resolve(resolved) === path.resolve(source)) {
      tasks.push({ type: 'noop', source, target });
      return;
    }
    // A stale link left by an earlier layout of the same package.
    if (resolved && restow && isInside(path.resolve(resolved), pkgRoot)) {
      tasks.push({ type: 'link', source, target, replaceSymlink: true });
      return;
    }
    const reason = resolved ? `Symlink points elsewhere: ${resolved}` : 'Symlink points elsewhere';
    tasks.push({ type: 'conflict', source, target, reason, adoptable: false });
    return;
  }

  if (targetStat.isDirectory() && sourceStat.isDirectory()) {
    await analyzeDir(pkgRoot, targetRoot, rel, restow, tasks);
    return;
  }

  tasks.push({
    type: 'conflict',
    source,
    target,
    reason: `Target exists and is not a symlink (${describeKind(targetStat)})`,
    adoptable: targetStat.isFile() && sourceStat.isFile(),
  });
}

async function analyzeDir(
  pkgRoot: string,
  targetRoot: string,
  rel: string,
  restow: boolean,
  tasks: FarmTask[],
): Promise<void> {
  const entries = await fs.promises.readdir(path.join(pkgRoot, rel));
  for (const name of entries.sort()) {
    if (isIgnored(name, rel === '')) continue;
    await analyzeEntry(pkgRoot, targetRoot, path.join(rel, name), restow, tasks);
  }
}

/** Work out which links a package needs. Missing directories are created; only files are linked. */
export async function buildFarmPlan(pkg: StowPackage, opts: { restow: boolean }): Promise<FarmPlan> {
  const tasks: FarmTask[] = [];
  await analyzeDir(pkg.sourceDir, pkg.targetDir, '', opts.restow, tasks);
  const conflicts = tasks.filter((t): t is FarmConflict => t.type === 'conflict');
  const changes = tasks.filter((t) => t.type === 'link' || t.type === 'mkdir');
  return { tasks, changes, conflicts };
}

function conflictLine(conflict: FarmConflict, targetRoot: string): string {
  return `${path.relative(targetRoot, conflict.target)}: ${conflict.reason}`;
}

/** Symlink farm built in-process, for hosts without GNU stow. */
export class FarmLinkBackend implements LinkBackend {
  readonly name = 'native';

  constructor(private readonly system: SystemActions) {}

  async preflight(): Promise<void> {}

  async trial(pkg: StowPackage, opts: { restow: boolean }): Promise<TrialResult> {
    const plan = await buildFarmPlan(pkg, opts);
    return { conflicts: plan.conflicts.map((c) => conflictLine(c, pkg.targetDir)) };
  }

  async link(pkg: StowPackage, opts: LinkOptions): Promise<void> {
    const plan = await buildFarmPlan(pkg, opts);
    // Refuse before touching anything when a conflict cannot be resolved.
    for (const conflict of plan.conflicts) {
      if (!opts.adopt) throw new Error(`conflict at ${conflictLine(conflict, pkg.targetDir)}`);
      if (!conflict.adoptable) throw new Error(`cannot adopt ${conflictLine(conflict, pkg.targetDir)}`);
    }

    for (const task of plan.tasks) {
      if (task.type === 'noop') continue;
      if (task.type === 'mkdir') {
        await this.system.makeDir(task.target);
        continue;
      }
      if (task.type === 'conflict') {
        await this.system.move(task.target, task.source);
      } else if (task.replaceSymlink) {
        await this.system.remove(task.target);
      }
      await this.createLink(task.source, task.target);
    }
  }

  // Parents exist already or come from an earlier mkdir task. Relative links, the way stow writes them.
  private async createLink(source: string, target: string): Promise<void> {
    await this.system.symlink(path.relative(path.dirname(target), source), target);
  }
}
