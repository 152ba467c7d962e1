export enum SetupErrorCode {
  MISSING_PRECONDITION = 'MISSING_PRECONDITION',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  INVALID_CONFIG = 'INVALID_CONFIG',
  CATALOG_INVALID = 'CATALOG_INVALID',
  INSTALL_FAILED = 'INSTALL_FAILED',
  VCS_FAILED = 'VCS_FAILED',
}

export class SetupError extends Error {
  readonly code: SetupErrorCode;
  /** Extra lines printed under the message, e.g. how to fix the problem. */
  readonly hints: string[];
  readonly context?: Record<string, unknown>;

  constructor(
    code: SetupErrorCode,
    message: string,
    opts?: { hints?: string[]; context?: Record<string, unknown> },
  ) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.hints = opts?.hints ?? [];
    this.context = opts?.context;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
