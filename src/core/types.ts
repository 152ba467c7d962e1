export type OsId = 'macos' | 'fedora' | 'arch' | 'linux-unknown' | 'unknown';
export type SupportedOs = Extract<OsId, 'macos' | 'fedora' | 'arch'>;
export type Profile = 'desktop' | 'server';

export type HostProfile = {
  readonly os: OsId;
  readonly profile: Profile;
};

export type Channel =
  | { type: 'copr'; name: string }
  | { type: 'repo-file'; url: string }
  | { type: 'tap'; name: string };

export type PackageSource =
  | { kind: 'native' }
  | { kind: 'cask' }
  | { kind: 'repository-plugin'; channel: Channel }
  | { kind: 'try-then-fallback'; channel: Channel }
  | { kind: 'build-from-source'; toolchain: string[]; build: string[] };

export type PackageSpec = {
  name: string;
  source: PackageSource;
  /** Binary whose presence on PATH means the package is installed. */
  command?: string;
  applicability: (host: HostProfile) => boolean;
};

export type InstallOutcome = 'already-present' | 'installed' | 'failed';

export type InstallResult = {
  package: string;
  outcome: InstallOutcome;
  detail?: string;
};

export type FailurePolicy = 'abort' | 'continue';

export type ProvisionAction =
  | { type: 'package'; spec: PackageSpec; onFailure: FailurePolicy }
  | { type: 'refresh-index'; onFailure: FailurePolicy }
  | { type: 'register-shell'; shell: string; onFailure: FailurePolicy }
  | { type: 'default-shell'; shell: string; onFailure: FailurePolicy }
  | { type: 'clone'; name: string; url: string; dest: string; detach: boolean; onFailure: FailurePolicy }
  | { type: 'download'; name: string; url: string; dest: string; onFailure: FailurePolicy }
  | { type: 'note'; message: string; onFailure: FailurePolicy };

export type StepStatus = 'ok' | 'skipped' | 'failed';

export type StepOutcome = {
  label: string;
  status: StepStatus;
  detail?: string;
};

export type ProvisionReport = {
  steps: StepOutcome[];
  aborted: boolean;
};

export type ExtraLink = {
  /** Home-relative path of the convenience symlink. */
  link: string;
  /** Home-relative path it points at. */
  target: string;
};

export type StowPackage = {
  name: string;
  /** `null` marks an app missing from the detection table; such packages are always linked. */
  detect: (() => Promise<boolean>) | null;
  sourceDir: string;
  targetDir: string;
  extraLinks: ExtraLink[];
};

export type StowOutcomeKind =
  | 'linked'
  | 'skipped-not-installed'
  | 'skipped-missing-source'
  | 'conflict-refused'
  | 'conflict-adopted'
  | 'failed';

export type StowOutcome = {
  package: string;
  outcome: StowOutcomeKind;
  conflicts?: string[];
  detail?: string;
};

export type StowReport = {
  outcomes: StowOutcome[];
  failed: boolean;
};

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
