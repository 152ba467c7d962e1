import { readTextFile } from '../utils/fs.js';
import type { HostProfile, OsId, Profile } from './types.js';

export const OS_RELEASE_PATH = '/etc/os-release';

export type DetectInput = {
  /** `process.platform` or any Darwin-family marker such as `darwin23`. */
  platform: string;
  /** Contents of the release file, `null` when it could not be read. */
  osRelease: string | null;
  env: { DISPLAY?: string; WAYLAND_DISPLAY?: string };
  override: Profile | null;
};

export function parseOsRelease(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    let value = line.slice(eq + 1).trim();
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
      value = value.slice(1, -1);
    }
    fields[line.slice(0, eq).trim()] = value;
  }
  return fields;
}

function detectOs(platform: string, osRelease: string | null): OsId {
  if (platform.startsWith('darwin')) return 'macos';
  if (osRelease === null) return 'unknown';
  switch (parseOsRelease(osRelease)['ID']) {
    case 'fedora':
      return 'fedora';
    case 'arch':
      return 'arch';
    default:
      return 'linux-unknown';
  }
}

// Coarse on purpose: no display variables means no graphical session.
function isHeadless(env: DetectInput['env']): boolean {
  return !env.DISPLAY && !env.WAYLAND_DISPLAY;
}

export function detectHost(input: DetectInput): HostProfile {
  const os = detectOs(input.platform, input.osRelease);
  let profile: Profile;
  if (input.override) {
    profile = input.override;
  } else if (os === 'macos') {
    profile = 'desktop';
  } else {
    profile = isHeadless(input.env) ? 'server' : 'desktop';
  }
  return Object.freeze({ os, profile });
}

export async function readOsRelease(file: string = OS_RELEASE_PATH): Promise<string | null> {
  return readTextFile(file);
}
