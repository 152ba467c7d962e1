import type { CommandSpec } from '../../utils/exec.js';
import type { Channel, PackageSpec } from '../types.js';
import { BaseInstaller, describeChannel } from './base.js';

export class PacmanInstaller extends BaseInstaller {
  readonly name = 'pacman';
  protected readonly elevated = true;

  async refreshIndex(): Promise<boolean | null> {
    this.deps.logger.info('pacman: refreshing package database');
    return this.run({ program: 'pacman', args: ['-Sy', '--noconfirm'] });
  }

  protected presenceQuery(spec: PackageSpec): CommandSpec {
    return { program: 'pacman', args: ['-Qi', spec.name] };
  }

  protected installCommand(name: string): CommandSpec {
    return { program: 'pacman', args: ['-S', '--noconfirm', name] };
  }

  // The official repositories carry everything the catalog asks for; AUR helpers are out of scope.
  protected async enableChannel(channel: Channel): Promise<boolean> {
    this.deps.logger.warn(`pacman cannot enable ${describeChannel(channel)}`);
    return false;
  }
}
