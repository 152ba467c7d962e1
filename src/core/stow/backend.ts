import type { StowBackendName } from '../config.js';
import type { StowPackage } from '../types.js';

export type TrialResult = {
  /** One line per conflicting target. Empty when linking would succeed. */
  conflicts: string[];
};

export type LinkOptions = {
  restow: boolean;
  /** Absorb conflicting real files into the package before linking. */
  adopt: boolean;
};

export type LinkBackend = {
  readonly name: StowBackendName;
  /** Throws when the backend cannot run on this host. */
  preflight(): Promise<void>;
  /** Work out what linking would do without touching the filesystem. */
  trial(pkg: StowPackage, opts: { restow: boolean }): Promise<TrialResult>;
  /** Throws when the package could not be linked. */
  link(pkg: StowPackage, opts: LinkOptions): Promise<void>;
};
