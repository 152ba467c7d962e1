import type { CommandSpec } from '../../utils/exec.js';
import { querySucceeds } from '../probe.js';
import { assertNever } from '../types.js';
import type { Channel, PackageSpec } from '../types.js';
import { BaseInstaller, describeChannel } from './base.js';

export class DnfInstaller extends BaseInstaller {
  readonly name = 'dnf';
  protected readonly elevated = true;

  protected presenceQuery(spec: PackageSpec): CommandSpec {
    return { program: 'rpm', args: ['-q', spec.name] };
  }

  protected installCommand(name: string): CommandSpec {
    return { program: 'dnf', args: ['install', '-y', name] };
  }

  protected async enableChannel(channel: Channel): Promise<boolean> {
    switch (channel.type) {
      case 'copr':
        return this.enableCopr(channel.name);
      case 'repo-file':
        return this.addRepoFile(channel.url);
      case 'tap':
        this.deps.logger.warn(`dnf cannot enable ${describeChannel(channel)}`);
        return false;
      default:
        return assertNever(channel);
    }
  }

  private async enableCopr(name: string): Promise<boolean> {
    const hasCopr = await querySucceeds(this.deps.probe, { program: 'dnf', args: ['copr', '--help'] });
    if (!hasCopr) {
      this.deps.logger.warn('dnf copr not available; trying to install dnf plugins');
      // Enabling below fails loudly if the plugins are still missing.
      if (!await this.run(this.installCommand('dnf-plugins-core'))) {
        this.deps.logger.warn('could not install dnf-plugins-core');
      }
    }
    this.deps.logger.info(`dnf: enabling COPR ${name}`);
    return this.run({ program: 'dnf', args: ['-y', 'copr', 'enable', name] });
  }

  private async addRepoFile(url: string): Promise<boolean> {
    const haveConfigManager = await this.run(this.installCommand('dnf-command(config-manager)'))
      || await this.run(this.installCommand('dnf-plugins-core'));
    if (!haveConfigManager) return false;

    // dnf4 takes --add-repo, dnf5 has an addrepo subcommand.
    const help = await this.deps.probe.query({ program: 'dnf', args: ['config-manager', '--help'] });
    const args = `${help.stdout}\n${help.stderr}`.includes('--add-repo')
      ? ['config-manager', '--add-repo', url]
      : ['config-manager', 'addrepo', `--from-repofile=${url}`];
    this.deps.logger.info(`dnf: adding repository ${url}`);
    return this.run({ program: 'dnf', args });
  }
}
