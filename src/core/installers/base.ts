import type { CommandSpec } from '../../utils/exec.js';
import type { Logger } from '../../utils/logger.js';
import { querySucceeds } from '../probe.js';
import type { CapabilityProbe } from '../probe.js';
import type { SystemActions } from '../system.js';
import { assertNever } from '../types.js';
import type { Channel, InstallResult, PackageSpec } from '../types.js';

export type InstallerName = 'brew' | 'dnf' | 'pacman';

export type InstallerDeps = {
  probe: CapabilityProbe;
  system: SystemActions;
  logger: Logger;
};

export type Installer = {
  readonly name: InstallerName;
  /** Throws when the package manager itself is unusable. */
  preflight(): Promise<void>;
  ensure(pkg: string | PackageSpec): Promise<InstallResult>;
  /** Refresh the package index. `null` when the manager has nothing to refresh. */
  refreshIndex(): Promise<boolean | null>;
};

export function nativePackage(name: string): PackageSpec {
  return { name, source: { kind: 'native' }, applicability: () => true };
}

export function describeChannel(channel: Channel): string {
  switch (channel.type) {
    case 'copr':
      return `COPR ${channel.name}`;
    case 'repo-file':
      return `repository ${channel.url}`;
    case 'tap':
      return `tap ${channel.name}`;
    default:
      return assertNever(channel);
  }
}

export abstract class BaseInstaller implements Installer {
  abstract readonly name: InstallerName;
  /** Whether install commands need the elevation prefix. */
  protected abstract readonly elevated: boolean;
  private readonly ensured = new Set<string>();

  constructor(protected readonly deps: InstallerDeps) {}

  async preflight(): Promise<void> {}

  async refreshIndex(): Promise<boolean | null> {
    return null;
  }

  async ensure(pkg: string | PackageSpec): Promise<InstallResult> {
    const spec = typeof pkg === 'string' ? nativePackage(pkg) : pkg;
    if (this.ensured.has(spec.name)) {
      return { package: spec.name, outcome: 'already-present' };
    }
    if (await this.isPresent(spec)) {
      this.deps.logger.info(`${this.name}: ${spec.name} already installed`);
      this.ensured.add(spec.name);
      return { package: spec.name, outcome: 'already-present' };
    }
    const result = await this.installFrom(spec);
    if (result.outcome !== 'failed') this.ensured.add(spec.name);
    return result;
  }

  protected abstract presenceQuery(spec: PackageSpec): CommandSpec;
  protected abstract installCommand(name: string): CommandSpec;
  /** Make a channel's packages installable. Resolves false when it could not. */
  protected abstract enableChannel(channel: Channel): Promise<boolean>;

  protected async installCask(name: string): Promise<InstallResult> {
    return { package: name, outcome: 'failed', detail: `${this.name} has no GUI casks` };
  }

  protected async run(cmd: CommandSpec): Promise<boolean> {
    return this.deps.system.run(cmd, { elevate: this.elevated });
  }

  private async isPresent(spec: PackageSpec): Promise<boolean> {
    if (spec.command) return this.deps.probe.hasCommand(spec.command);
    return querySucceeds(this.deps.probe, this.presenceQuery(spec));
  }

  private async installNative(name: string): Promise<InstallResult> {
    this.deps.logger.info(`${this.name}: installing ${name}`);
    if (await this.run(this.installCommand(name))) {
      return { package: name, outcome: 'installed' };
    }
    return { package: name, outcome: 'failed', detail: `${this.name} could not install ${name}` };
  }

  private async installFrom(spec: PackageSpec): Promise<InstallResult> {
    const source = spec.source;
    const failed = (detail: string): InstallResult => ({ package: spec.name, outcome: 'failed', detail });

    switch (source.kind) {
      case 'native':
        return this.installNative(spec.name);
      case 'cask':
        return this.installCask(spec.name);
      case 'repository-plugin':
        if (!await this.enableChannel(source.channel)) {
          return failed(`could not enable ${describeChannel(source.channel)}`);
        }
        return this.installNative(spec.name);
      case 'try-then-fallback': {
        const first = await this.installNative(spec.name);
        if (first.outcome !== 'failed') return first;
        this.deps.logger.warn(`${spec.name} not available from the default repositories; enabling ${describeChannel(source.channel)}`);
        if (!await this.enableChannel(source.channel)) {
          return failed(`could not enable ${describeChannel(source.channel)}`);
        }
        return this.installNative(spec.name);
      }
      case 'build-from-source': {
        const [program, ...args] = source.build;
        if (program === undefined) return failed('empty build command');
        this.deps.logger.info(`${this.name}: building ${spec.name} from source`);
        for (const tool of source.toolchain) {
          const toolResult = await this.ensure(tool);
          if (toolResult.outcome === 'failed') return failed(`toolchain package ${tool} could not be installed`);
        }
        if (!await this.deps.system.run({ program, args })) {
          return failed(`build failed: ${source.build.join(' ')}`);
        }
        return { package: spec.name, outcome: 'installed' };
      }
      default:
        return assertNever(source);
    }
  }
}
