import path from 'path';
import { SetupError, SetupErrorCode } from '../../utils/errors.js';
import type { CapabilityProbe } from '../probe.js';
import type { SystemActions } from '../system.js';
import type { StowPackage } from '../types.js';
import type { LinkBackend, LinkOptions, TrialResult } from './backend.js';

/**
 * Pull the conflict lines out of stow's stderr:
 *
 *   WARNING! stowing zsh would cause conflicts:
 *     * existing target is neither a link nor a directory: .zshrc
 *   All operations aborted.
 */
export function parseStowConflicts(stderr: string): string[] {
  const conflicts: string[] = [];
  for (const line of stderr.split('\n')) {
    const match = /^\s*\*\s+(.+?)\s*$/.exec(line);
    if (match?.[1]) conflicts.push(match[1]);
  }
  return conflicts;
}

function stowArgs(pkg: StowPackage, flags: string[]): string[] {
  return ['-d', path.dirname(pkg.sourceDir), '-t', pkg.targetDir, ...flags, path.basename(pkg.sourceDir)];
}

/** Links through the GNU stow binary. */
export class GnuStowBackend implements LinkBackend {
  readonly name = 'gnu';

  constructor(private readonly deps: { probe: CapabilityProbe; system: SystemActions }) {}

  async preflight(): Promise<void> {
    if (await this.deps.probe.hasCommand('stow')) return;
    throw new SetupError(
      SetupErrorCode.MISSING_PRECONDITION,
      'stow is not installed. Run bootstrap first (or install stow manually), then re-run.',
      { hints: ['STOW_BACKEND=native links without GNU stow.'] },
    );
  }

  async trial(pkg: StowPackage, opts: { restow: boolean }): Promise<TrialResult> {
    const flags = opts.restow ? ['-n', '--restow'] : ['-n'];
    const result = await this.deps.probe.query({ program: 'stow', args: stowArgs(pkg, flags) });
    if (result.exitCode === 0) return { conflicts: [] };
    const conflicts = parseStowConflicts(result.stderr);
    if (conflicts.length > 0) return { conflicts };
    const firstLine = result.stderr.split('\n').find((line) => line.trim() !== '');
    return { conflicts: [firstLine?.trim() ?? `stow exited with ${result.exitCode}`] };
  }

  async link(pkg: StowPackage, opts: LinkOptions): Promise<void> {
    const flags: string[] = [];
    if (opts.restow) flags.push('--restow');
    if (opts.adopt) flags.push('--adopt');
    if (!await this.deps.system.run({ program: 'stow', args: stowArgs(pkg, flags) })) {
      throw new Error(`stow failed for '${pkg.name}'`);
    }
  }
}
