import path from 'path';
import type { CapabilityProbe } from './probe.js';
import type { ExtraLink, StowPackage } from './types.js';

export const DEFAULT_APPS = ['zsh', 'nvim', 'starship', 'bat', 'eza', 'yazi', 'karabiner'] as const;

/** How to tell whether the app a dotfile package configures is installed. */
export type AppDetection =
  | { type: 'command'; name: string }
  | { type: 'path'; path: string };

type AppEntry = {
  detection: AppDetection;
  extraLinks?: ExtraLink[];
};

const APP_TABLE: Record<string, AppEntry> = {
  zsh: {
    detection: { type: 'command', name: 'zsh' },
    // The zsh package keeps its rc under ~/.config/zsh; zsh itself still reads ~/.zshrc.
    extraLinks: [{ link: '.zshrc', target: path.join('.config', 'zsh', '.zshrc') }],
  },
  nvim: { detection: { type: 'command', name: 'nvim' } },
  starship: { detection: { type: 'command', name: 'starship' } },
  bat: { detection: { type: 'command', name: 'bat' } },
  eza: { detection: { type: 'command', name: 'eza' } },
  yazi: { detection: { type: 'command', name: 'yazi' } },
  karabiner: { detection: { type: 'path', path: '/Applications/Karabiner-Elements.app' } },
};

export function lookupApp(name: string): AppEntry | null {
  return Object.prototype.hasOwnProperty.call(APP_TABLE, name) ? APP_TABLE[name] ?? null : null;
}

export function describeDetection(detection: AppDetection): string {
  return detection.type === 'command' ? `'${detection.name}'` : detection.path;
}

function detector(detection: AppDetection, probe: CapabilityProbe): () => Promise<boolean> {
  if (detection.type === 'command') return () => probe.hasCommand(detection.name);
  return () => probe.isDirectory(detection.path);
}

export type StowPackageOptions = {
  apps: readonly string[];
  dotfilesDir: string;
  homeDir: string;
  probe: CapabilityProbe;
};

export function buildStowPackages(opts: StowPackageOptions): StowPackage[] {
  return opts.apps.map((name) => {
    const entry = lookupApp(name);
    return {
      name,
      detect: entry ? detector(entry.detection, opts.probe) : null,
      sourceDir: path.join(opts.dotfilesDir, name),
      targetDir: opts.homeDir,
      extraLinks: entry?.extraLinks ?? [],
    };
  });
}

/** Split a `--apps "zsh nvim"` value; repeated names are kept once. */
export function parseAppList(value: string): string[] {
  return [...new Set(value.split(/\s+/).filter(Boolean))];
}

function lastFlagIndex(argv: readonly string[], flag: string): number {
  let index = -1;
  argv.forEach((arg, i) => {
    if (arg === flag || arg.startsWith(`${flag}=`)) index = i;
  });
  return index;
}

/**
 * Apps named by `--all` and `--apps`. When both are given the one later on the
 * command line wins; neither (or an empty list) means the default apps.
 */
export function selectApps(flags: { all?: boolean; apps?: string }, argv: readonly string[]): string[] {
  const listed = flags.apps === undefined ? [] : parseAppList(flags.apps);
  if (listed.length === 0) return [...DEFAULT_APPS];
  if (flags.all && lastFlagIndex(argv, '--all') > lastFlagIndex(argv, '--apps')) return [...DEFAULT_APPS];
  return listed;
}
