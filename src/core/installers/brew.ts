import type { CommandSpec } from '../../utils/exec.js';
import { SetupError, SetupErrorCode } from '../../utils/errors.js';
import type { Channel, InstallResult, PackageSpec } from '../types.js';
import { BaseInstaller, describeChannel } from './base.js';

export class BrewInstaller extends BaseInstaller {
  readonly name = 'brew';
  protected readonly elevated = false;

  async preflight(): Promise<void> {
    if (await this.deps.probe.hasCommand('brew')) return;
    throw new SetupError(SetupErrorCode.MISSING_PRECONDITION, 'Homebrew not found. Install it first, then re-run.', {
      hints: ['Homebrew install docs: https://docs.brew.sh/Installation'],
    });
  }

  protected presenceQuery(spec: PackageSpec): CommandSpec {
    const kind = spec.source.kind === 'cask' ? '--cask' : '--formula';
    return { program: 'brew', args: ['list', kind, spec.name] };
  }

  protected installCommand(name: string): CommandSpec {
    return { program: 'brew', args: ['install', name] };
  }

  protected async installCask(name: string): Promise<InstallResult> {
    this.deps.logger.info(`brew: installing cask ${name}`);
    if (await this.run({ program: 'brew', args: ['install', '--cask', name] })) {
      return { package: name, outcome: 'installed' };
    }
    return { package: name, outcome: 'failed', detail: `brew could not install cask ${name}` };
  }

  protected async enableChannel(channel: Channel): Promise<boolean> {
    if (channel.type !== 'tap') {
      this.deps.logger.warn(`brew cannot enable ${describeChannel(channel)}`);
      return false;
    }
    this.deps.logger.info(`brew: tapping ${channel.name}`);
    return this.run({ program: 'brew', args: ['tap', channel.name] });
  }
}
