import type { StowBackendName } from '../config.js';
import type { CapabilityProbe } from '../probe.js';
import type { SystemActions } from '../system.js';
import { assertNever } from '../types.js';
import type { LinkBackend } from './backend.js';
import { FarmLinkBackend } from './farm.js';
import { GnuStowBackend } from './gnu.js';

export type { LinkBackend, LinkOptions, TrialResult } from './backend.js';
export { reconcile } from './reconcile.js';
export type { ReconcileOptions } from './reconcile.js';

export function createLinkBackend(
  name: StowBackendName,
  deps: { probe: CapabilityProbe; system: SystemActions },
): LinkBackend {
  switch (name) {
    case 'gnu':
      return new GnuStowBackend(deps);
    case 'native':
      return new FarmLinkBackend(deps.system);
    default:
      return assertNever(name);
  }
}
