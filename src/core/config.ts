import os from 'os';
import { z } from 'zod';
import { SetupError, SetupErrorCode } from '../utils/errors.js';
import { resolvePaths } from './paths.js';
import type { ResolvedPaths } from './paths.js';
import type { Profile } from './types.js';

export type StowBackendName = 'gnu' | 'native';

export type SetupConfig = {
  readonly profileOverride: Profile | null;
  readonly dryRun: boolean;
  readonly forceStow: boolean;
  readonly restow: boolean;
  readonly stowBackend: StowBackendName;
  readonly dotfilesRepoUrl: string | null;
  readonly zinitUrl: string;
  readonly lazyvimStarterUrl: string;
  readonly ezpodmanUrl: string;
  readonly paths: Readonly<ResolvedPaths>;
  /** Environment facts the detector and shell steps need. */
  readonly host: {
    /** `process.platform` at startup. */
    readonly platform: string;
    readonly display?: string;
    readonly waylandDisplay?: string;
    readonly shell?: string;
    readonly searchPath: string;
  };
};

export type CliOverrides = {
  dryRun?: boolean;
  force?: boolean;
};

const flag = (fallback: '0' | '1') => z.enum(['0', '1']).default(fallback).transform((v) => v === '1');
const optionalString = z.string().optional();

const EnvSchema = z.object({
  PROFILE: z.enum(['auto', 'desktop', 'server']).default('auto'),
  DRY_RUN: flag('0'),
  FORCE_STOW: flag('0'),
  RESTOW: flag('1'),
  STOW_BACKEND: z.enum(['gnu', 'native']).default('gnu'),
  DOTFILES_REPO_URL: optionalString,
  XDG_DATA_HOME: optionalString,
  ZINIT_HOME: optionalString,
  EZPODMAN_BIN: optionalString,
  EZPODMAN_URL: z.string().url().default('https://raw.githubusercontent.com/alfonsosanchez12/ezpodman/main/ezpodman'),
  HOME: optionalString,
  DISPLAY: optionalString,
  WAYLAND_DISPLAY: optionalString,
  SHELL: optionalString,
  PATH: z.string().default(''),
});

/** Empty strings count as unset. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: CliOverrides = {},
  platform: string = process.platform,
): SetupConfig {
  const parsed = EnvSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SetupError(SetupErrorCode.INVALID_CONFIG, 'Invalid environment configuration.', { hints: issues });
  }
  const vars = parsed.data;
  const paths = resolvePaths({
    homeDir: vars.HOME ?? os.homedir(),
    xdgDataHome: vars.XDG_DATA_HOME,
    zinitHome: vars.ZINIT_HOME,
    ezpodmanBin: vars.EZPODMAN_BIN,
  });

  return Object.freeze({
    profileOverride: vars.PROFILE === 'auto' ? null : vars.PROFILE,
    dryRun: overrides.dryRun ?? vars.DRY_RUN,
    forceStow: overrides.force ?? vars.FORCE_STOW,
    restow: vars.RESTOW,
    stowBackend: vars.STOW_BACKEND,
    dotfilesRepoUrl: vars.DOTFILES_REPO_URL ?? null,
    zinitUrl: 'https://github.com/zdharma-continuum/zinit.git',
    lazyvimStarterUrl: 'https://github.com/LazyVim/starter',
    ezpodmanUrl: vars.EZPODMAN_URL,
    paths: Object.freeze(paths),
    host: Object.freeze({
      platform,
      display: vars.DISPLAY,
      waylandDisplay: vars.WAYLAND_DISPLAY,
      shell: vars.SHELL,
      searchPath: vars.PATH,
    }),
  });
}
