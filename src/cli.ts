#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { cancel, intro, isCancel, multiselect, note, outro } from '@clack/prompts';
import { DEFAULT_APPS, selectApps } from './core/apps.js';
import { loadConfig } from './core/config.js';
import type { CliOverrides } from './core/config.js';
import { createContext } from './core/context.js';
import type { SetupContext } from './core/context.js';
import { detect, runBootstrap } from './commands/bootstrap.js';
import { runSetup } from './commands/setup.js';
import { formatProvisionSummary, formatStowTable } from './commands/summary.js';
import { SetupError, errorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

const appTitle = 'hostprep';

const ENV_HELP = `
Env overrides:
  PROFILE=auto|desktop|server   profile detection override
  DRY_RUN=1                     print actions only
  FORCE_STOW=1                  adopt conflicting files into the stow package (risky)
  RESTOW=0                      do not pass --restow
  STOW_BACKEND=gnu|native       link with GNU stow (default) or in-process
  DOTFILES_REPO_URL=...         dotfiles repository, cloned into ~/dotfiles
  ZINIT_HOME, EZPODMAN_BIN      install locations`;

type SetupFlags = {
  all?: boolean;
  apps?: string;
  pick?: boolean;
  skipBootstrap?: boolean;
  skipStow?: boolean;
  dryRun?: boolean;
  force?: boolean;
};

function exitCancelled(): never {
  cancel('Cancelled');
  process.exit(0);
}

function reportError(err: unknown, logger: Logger): void {
  logger.error(errorMessage(err));
  if (err instanceof SetupError) {
    for (const hint of err.hints) logger.error(hint);
  }
}

async function withContext(
  tag: string,
  overrides: CliOverrides,
  body: (ctx: SetupContext) => Promise<number>,
): Promise<void> {
  const logger = createLogger({ tag });
  try {
    const config = loadConfig(process.env, overrides);
    const ctx = createContext(config, { logger, uid: process.getuid?.() });
    process.exitCode = await body(ctx);
  } catch (err) {
    reportError(err, logger);
    process.exitCode = 1;
  }
}

async function pickApps(): Promise<string[]> {
  const choices: string[] = [...DEFAULT_APPS];
  const selected = await multiselect({
    message: 'Select dotfile packages to link',
    options: choices.map((app) => ({ label: app, value: app })),
    initialValues: choices,
    required: true,
  });
  if (isCancel(selected)) exitCancelled();
  return selected;
}

async function resolveApps(flags: SetupFlags): Promise<string[]> {
  if (flags.pick) return pickApps();
  return selectApps(flags, process.argv);
}

async function setupAction(flags: SetupFlags): Promise<void> {
  intro(chalk.cyan(appTitle));
  const apps = await resolveApps(flags);
  await withContext('setup', { dryRun: flags.dryRun, force: flags.force }, async (ctx) => {
    const result = await runSetup(ctx, {
      apps,
      bootstrap: !flags.skipBootstrap,
      stow: !flags.skipStow,
    });
    if (result.provision) note(formatProvisionSummary(result.provision), 'Provisioning');
    if (result.stow) note(formatStowTable(result.stow.outcomes).join('\n'), 'Stow summary');
    return result.exitCode;
  });
  outro(process.exitCode ? 'Finished with failures' : 'Done');
}

async function bootstrapAction(flags: { dryRun?: boolean }): Promise<void> {
  await withContext('bootstrap', { dryRun: flags.dryRun }, async (ctx) => {
    const report = await runBootstrap(ctx);
    ctx.logger.info(formatProvisionSummary(report));
    return report.aborted ? 1 : 0;
  });
}

async function detectAction(): Promise<void> {
  await withContext('detect', {}, async (ctx) => {
    const host = await detect(ctx);
    ctx.logger.info(`OS: ${host.os}`);
    ctx.logger.info(`Profile: ${host.profile}`);
    return 0;
  });
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name(appTitle)
    .description('Provision this machine, clone dotfiles into ~/dotfiles and link app configs')
    .showHelpAfterError()
    .addHelpText('after', ENV_HELP);

  program
    .command('setup', { isDefault: true })
    .description('Clone/update dotfiles, run bootstrap, then stow installed apps')
    .option('--all', 'link every default app')
    .option('--apps <list>', 'space-separated apps to link, e.g. "zsh nvim starship"')
    .option('--pick', 'choose apps interactively')
    .option('--skip-bootstrap', 'do not install packages')
    .option('--skip-stow', 'do not link dotfiles')
    .option('--dry-run', 'print actions only (same as DRY_RUN=1)')
    .option('--force', 'adopt conflicting files (same as FORCE_STOW=1)')
    .action(setupAction);

  program
    .command('bootstrap')
    .description('Install the tool set for this OS and profile')
    .option('--dry-run', 'print actions only (same as DRY_RUN=1)')
    .action(bootstrapAction);

  program
    .command('detect')
    .description('Print the detected OS and profile')
    .action(detectAction);

  return program;
}

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`${chalk.bold.red('[err]')} ${errorMessage(err)}\n`);
  process.exit(1);
});
