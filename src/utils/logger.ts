import chalk, { Chalk } from 'chalk';

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A mutating action that was printed instead of performed. */
  dryRun(message: string): void;
};

type Writer = (line: string) => void;

export type LoggerOptions = {
  tag: string;
  stdout?: Writer;
  stderr?: Writer;
  color?: boolean;
};

export function createLogger(opts: LoggerOptions): Logger {
  const paint = new Chalk({ level: opts.color === false ? 0 : chalk.level });
  const out: Writer = opts.stdout ?? ((line) => process.stdout.write(`${line}\n`));
  const err: Writer = opts.stderr ?? ((line) => process.stderr.write(`${line}\n`));
  return {
    info: (message) => out(`${paint.bold.blue(`[${opts.tag}]`)} ${message}`),
    warn: (message) => out(`${paint.bold.yellow('[warn]')} ${message}`),
    error: (message) => err(`${paint.bold.red('[err]')} ${message}`),
    dryRun: (message) => out(`[dry-run] ${message}`),
  };
}
