import { formatCommand } from '../src/utils/exec.js';
import type { CommandSpec, ExecResult } from '../src/utils/exec.js';
import type { Logger } from '../src/utils/logger.js';
import type { CapabilityProbe } from '../src/core/probe.js';
import { elevate } from '../src/core/system.js';
import type { Elevation, RunOptions, SystemActions } from '../src/core/system.js';

export type LogLevel = 'info' | 'warn' | 'error' | 'dry-run';

export type MemoryLogger = Logger & {
  lines: { level: LogLevel; message: string }[];
  messages(level: LogLevel): string[];
};

export function createMemoryLogger(): MemoryLogger {
  const lines: { level: LogLevel; message: string }[] = [];
  return {
    lines,
    messages: (level) => lines.filter((l) => l.level === level).map((l) => l.message),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
    dryRun: (message) => lines.push({ level: 'dry-run', message }),
  };
}

/** In-memory host: tests declare which commands, paths and query results exist. */
export class FakeProbe implements CapabilityProbe {
  readonly commands = new Set<string>();
  readonly dirs = new Set<string>();
  readonly executables = new Set<string>();
  readonly files = new Map<string, string>();
  readonly queries: string[] = [];
  private readonly results = new Map<string, ExecResult>();

  /** Make the query `cmdline` (as printed by formatCommand) exit 0. */
  succeed(cmdline: string, stdout = ''): this {
    this.results.set(cmdline, { stdout, stderr: '', exitCode: 0 });
    return this;
  }

  respond(cmdline: string, result: ExecResult): this {
    this.results.set(cmdline, result);
    return this;
  }

  async hasCommand(name: string): Promise<boolean> {
    return this.commands.has(name);
  }

  async exists(p: string): Promise<boolean> {
    return this.dirs.has(p) || this.files.has(p) || this.executables.has(p);
  }

  async isDirectory(p: string): Promise<boolean> {
    return this.dirs.has(p);
  }

  async isExecutable(p: string): Promise<boolean> {
    return this.executables.has(p);
  }

  async readFile(p: string): Promise<string | null> {
    return this.files.get(p) ?? null;
  }

  async query(cmd: CommandSpec): Promise<ExecResult> {
    const line = formatCommand(cmd);
    this.queries.push(line);
    return this.results.get(line) ?? { stdout: '', stderr: '', exitCode: 1 };
  }
}

/** Records every mutating action instead of performing it. */
export class RecordingSystem implements SystemActions {
  readonly dryRun = false;
  /** Command lines passed to run(), elevation applied. */
  readonly commands: string[] = [];
  /** Every action in order, commands and filesystem operations alike. */
  readonly ops: string[] = [];
  readonly inputs = new Map<string, string>();
  /** Command lines run with their stdout discarded. */
  readonly silenced = new Set<string>();
  private readonly failures = new Map<string, number>();

  constructor(readonly elevation: Elevation = ['sudo']) {}

  /** Make `cmdline` fail the next `times` runs (every run by default). */
  fail(cmdline: string, times = Number.POSITIVE_INFINITY): this {
    this.failures.set(cmdline, times);
    return this;
  }

  async run(cmd: CommandSpec, opts?: RunOptions): Promise<boolean> {
    const line = formatCommand(opts?.elevate ? elevate(cmd, this.elevation) : cmd);
    this.commands.push(line);
    this.ops.push(line);
    if (cmd.input !== undefined) this.inputs.set(line, cmd.input);
    if (cmd.silent) this.silenced.add(line);
    const remaining = this.failures.get(line) ?? 0;
    if (remaining > 0) {
      this.failures.set(line, remaining - 1);
      return false;
    }
    return true;
  }

  async makeDir(dir: string): Promise<void> {
    this.ops.push(`mkdir ${dir}`);
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    this.ops.push(`ln -s ${target} ${linkPath}`);
  }

  async move(from: string, to: string): Promise<void> {
    this.ops.push(`mv ${from} ${to}`);
  }

  async remove(p: string): Promise<void> {
    this.ops.push(`rm ${p}`);
  }

  async chmod(p: string, mode: number): Promise<void> {
    this.ops.push(`chmod ${mode.toString(8)} ${p}`);
  }
}
