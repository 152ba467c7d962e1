import { assertNever } from '../types.js';
import type { SupportedOs } from '../types.js';
import type { Installer, InstallerDeps } from './base.js';
import { BrewInstaller } from './brew.js';
import { DnfInstaller } from './dnf.js';
import { PacmanInstaller } from './pacman.js';

export type { Installer, InstallerDeps, InstallerName } from './base.js';
export { nativePackage } from './base.js';

export function createInstaller(os: SupportedOs, deps: InstallerDeps): Installer {
  switch (os) {
    case 'macos':
      return new BrewInstaller(deps);
    case 'fedora':
      return new DnfInstaller(deps);
    case 'arch':
      return new PacmanInstaller(deps);
    default:
      return assertNever(os);
  }
}
