import { SetupError, SetupErrorCode } from '../utils/errors.js';
import type { Catalog, CatalogStep } from './catalog.js';
import type { ResolvedPaths } from './paths.js';
import type { Elevation } from './system.js';
import { assertNever } from './types.js';
import type { HostProfile, ProvisionAction, SupportedOs } from './types.js';

export type PlanOptions = {
  catalog: Catalog;
  paths: ResolvedPaths;
  elevation: Elevation;
  urls: { zinit: string; lazyvimStarter: string; ezpodman: string };
};

export function supportedOs(host: HostProfile): SupportedOs {
  switch (host.os) {
    case 'macos':
    case 'fedora':
    case 'arch':
      return host.os;
    case 'linux-unknown':
    case 'unknown':
      throw new SetupError(SetupErrorCode.UNSUPPORTED_PLATFORM, `Unsupported OS: ${host.os}`, {
        hints: ['Supported: macOS (Homebrew), Fedora (dnf), Arch Linux (pacman).'],
      });
    default:
      return assertNever(host.os);
  }
}

function expandStep(step: CatalogStep, host: HostProfile, opts: PlanOptions): ProvisionAction[] {
  switch (step.step) {
    case 'package': {
      const profiles = step.profiles;
      const applicability = (h: HostProfile) => !profiles || profiles.includes(h.profile);
      if (!applicability(host)) return [];
      return [{
        type: 'package',
        spec: { name: step.name, source: step.source, command: step.command, applicability },
        onFailure: step.onFailure,
      }];
    }
    // A failed shell change must not block the tool installs that follow.
    case 'shell':
      return [
        { type: 'register-shell', shell: step.path, onFailure: 'continue' },
        { type: 'default-shell', shell: step.path, onFailure: 'continue' },
      ];
    case 'refresh-index':
      return [{ type: 'refresh-index', onFailure: 'abort' }];
    case 'zinit':
      return [{
        type: 'clone',
        name: 'zinit',
        url: opts.urls.zinit,
        dest: opts.paths.zinitHome,
        detach: false,
        onFailure: 'abort',
      }];
    case 'lazyvim':
      return [{
        type: 'clone',
        name: 'LazyVim starter',
        url: opts.urls.lazyvimStarter,
        dest: opts.paths.nvimConfigDir,
        detach: true,
        onFailure: 'abort',
      }];
    case 'ezpodman':
      return [{
        type: 'download',
        name: 'ezpodman',
        url: opts.urls.ezpodman,
        dest: opts.paths.ezpodmanBin,
        onFailure: 'abort',
      }];
    case 'note': {
      const sudo = opts.elevation.length > 0 ? `${opts.elevation.join(' ')} ` : '';
      return [{ type: 'note', message: step.message.replaceAll('{sudo}', sudo), onFailure: 'continue' }];
    }
    default:
      return assertNever(step);
  }
}

/** The ordered actions that provision `host`. Throws for hosts without a catalog. */
export function planProvisioning(host: HostProfile, opts: PlanOptions): ProvisionAction[] {
  const steps = opts.catalog[supportedOs(host)];
  return steps.flatMap((step) => expandStep(step, host, opts));
}

export function describeAction(action: ProvisionAction): string {
  switch (action.type) {
    case 'package':
      return `install ${action.spec.name}`;
    case 'refresh-index':
      return 'refresh package index';
    case 'register-shell':
      return `register ${action.shell} in /etc/shells`;
    case 'default-shell':
      return `set default shell to ${action.shell}`;
    case 'clone':
      return `clone ${action.name} -> ${action.dest}`;
    case 'download':
      return `download ${action.name} -> ${action.dest}`;
    case 'note':
      return `note: ${action.message}`;
    default:
      return assertNever(action);
  }
}
