import path from 'path';
import { SetupError, SetupErrorCode } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CapabilityProbe } from './probe.js';
import type { SystemActions } from './system.js';

export type DotfilesOptions = {
  dir: string;
  repoUrl: string | null;
  probe: CapabilityProbe;
  system: SystemActions;
  logger: Logger;
};

export type DotfilesResult = 'updated' | 'cloned';

export async function syncDotfiles(opts: DotfilesOptions): Promise<DotfilesResult> {
  const { dir, probe, system, logger } = opts;
  if (!await probe.hasCommand('git')) {
    throw new SetupError(SetupErrorCode.MISSING_PRECONDITION, 'git not found. Install git, then re-run.');
  }

  if (await probe.isDirectory(path.join(dir, '.git'))) {
    logger.info(`dotfiles already cloned: ${dir} (pulling latest)`);
    if (!await system.run({ program: 'git', args: ['-C', dir, 'pull', '--ff-only'] })) {
      throw new SetupError(SetupErrorCode.VCS_FAILED, `git pull failed in ${dir}`, {
        hints: ['Resolve the local changes or diverged history, then re-run.'],
      });
    }
    return 'updated';
  }

  if (await probe.exists(dir)) {
    throw new SetupError(SetupErrorCode.MISSING_PRECONDITION, `${dir} exists but is not a git repo.`, {
      hints: ['Move it aside (or delete it) then re-run.'],
    });
  }

  if (!opts.repoUrl) {
    throw new SetupError(SetupErrorCode.INVALID_CONFIG, 'DOTFILES_REPO_URL is not set.', {
      hints: [`Set DOTFILES_REPO_URL to the dotfiles repository to clone into ${dir}.`],
    });
  }

  logger.info(`Cloning dotfiles -> ${dir}`);
  if (!await system.run({ program: 'git', args: ['clone', opts.repoUrl, dir] })) {
    throw new SetupError(SetupErrorCode.VCS_FAILED, 'Failed to clone dotfiles repo.', {
      hints: ['If private: prefer SSH URL and ensure your GitHub SSH key is set up.'],
    });
  }
  return 'cloned';
}
