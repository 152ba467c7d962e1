import { execa } from 'execa';

/** A program and its arguments, run without a shell in between. */
export type CommandSpec = {
  program: string;
  args: string[];
  /** Written to the child's stdin. */
  input?: string;
  /** Discard the child's stdout instead of showing it on the terminal. */
  silent?: boolean;
};

export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

// Exit code reported when the program could not be spawned at all.
const SPAWN_FAILED = 127;

export function formatCommand(cmd: CommandSpec): string {
  return [cmd.program, ...cmd.args].map(quoteArg).join(' ');
}

/** Like formatCommand, with any stdin shown as a here-string. */
export function formatInvocation(cmd: CommandSpec): string {
  const line = formatCommand(cmd);
  if (cmd.input === undefined) return line;
  return `${line} <<< ${quoteArg(cmd.input.replace(/\n$/, ''))}`;
}

function quoteArg(arg: string): string {
  if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Run and collect output. Used for read-only queries. */
export async function capture(cmd: CommandSpec): Promise<ExecResult> {
  const result = await execa(cmd.program, cmd.args, { reject: false, input: cmd.input });
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: result.exitCode ?? (result.failed ? SPAWN_FAILED : 0),
  };
}

/** Run attached to the terminal so package managers, sudo and chsh can prompt. */
export async function passthrough(cmd: CommandSpec): Promise<number> {
  const stdout = cmd.silent ? 'ignore' : 'inherit';
  const result = cmd.input === undefined
    ? await execa(cmd.program, cmd.args, { reject: false, stdin: 'inherit', stdout, stderr: 'inherit' })
    : await execa(cmd.program, cmd.args, {
      reject: false,
      input: cmd.input,
      stdout,
      stderr: 'inherit',
    });
  return result.exitCode ?? (result.failed ? SPAWN_FAILED : 0);
}
