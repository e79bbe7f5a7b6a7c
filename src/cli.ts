#!/usr/bin/env node
import path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { intro, outro, note, spinner, confirm, isCancel, cancel } from '@clack/prompts';
import { loadConfig, prepareLinkConfig } from './core/config.js';
import type { DotsyncConfig, LinkOverrides } from './core/config.js';
import { buildLinkPlan } from './core/plan.js';
import { synchronize } from './core/sync.js';
import { isDotsyncError } from './core/errors.js';
import { createLogger } from './utils/logger.js';
import type { LinkConfig, LinkPlan, LinkTask, SyncSummary } from './core/types.js';

const appTitle = 'dotsync';

type DirOptions = {
  from?: string;
  to?: string;
  backup?: string;
  config?: string;
  exclude?: string[];
  verbose?: boolean;
};

type LinkOptions = DirOptions & {
  dryRun?: boolean;
  yes?: boolean;
};

function exitCancelled(): never {
  cancel('Cancelled');
  process.exit(0);
}

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural || `${singular}s`);
}

function formatCount(count: number, singular: string, plural?: string): string {
  return `${count} ${pluralize(count, singular, plural)}`;
}

function logLevel(opts: DirOptions): string {
  return opts.verbose ? 'debug' : process.env.DOTSYNC_LOG_LEVEL ?? 'warn';
}

type Prepared = {
  config: DotsyncConfig;
  link: LinkConfig;
  env: Record<string, string>;
  backupRoot: string;
};

async function prepare(opts: DirOptions): Promise<Prepared> {
  const { config } = await loadConfig({ configPath: opts.config });
  const overrides: LinkOverrides = { fromDir: opts.from, toDir: opts.to, backupDir: opts.backup };
  const logger = createLogger('env', { level: logLevel(opts) });
  const { env, link } = prepareLinkConfig(config, overrides, { logger });
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return { config, env, link: { ...link, backupDir: path.join(link.backupDir, timestamp) }, backupRoot: link.backupDir };
}

function describeTask(task: LinkTask): string {
  switch (task.type) {
    case 'noop':
      return `${chalk.green('✓')} ${task.target}`;
    case 'link':
      return `${chalk.yellow('•')} ${task.target}${chalk.dim(' — new link')}`;
    case 'relink':
      return `${chalk.yellow('•')} ${task.target}${chalk.dim(` — points at ${task.currentTarget}`)}`;
    case 'replace-broken':
      return `${chalk.yellow('•')} ${task.target}${chalk.dim(` — broken link to ${task.currentTarget}`)}`;
    case 'backup':
      return `${chalk.red('⚠')} ${task.target}${chalk.dim(` — existing ${task.existingKind} moves to ${task.backupPath}`)}`;
    case 'clear-parent':
      return `${chalk.red('⚠')} ${task.target}${chalk.dim(` — ${task.ancestorKind} at ${task.ancestor} is in the way`)}`;
  }
}

function summarizePlan(plan: LinkPlan): string {
  const unchanged = plan.tasks.length - plan.changes.length;
  return [
    `From: ${plan.config.fromDir}`,
    `To: ${plan.config.toDir}`,
    `Backup: ${plan.config.backupDir}`,
    `Entries: ${plan.tasks.length} · Linked: ${unchanged} · Changes: ${plan.changes.length} · Backups: ${plan.backups.length}`,
  ].join('\n');
}

function summarizeSync(summary: SyncSummary): string {
  const pieces = [
    `Linked ${formatCount(summary.linked, 'path')}`,
    `${summary.unchanged} unchanged`,
  ];
  if (summary.relinked > 0) pieces.push(`relinked ${summary.relinked}`);
  if (summary.removedLinks > 0) pieces.push(`removed ${formatCount(summary.removedLinks, 'blocking symlink')}`);
  if (summary.backedUp > 0) pieces.push(`backed up ${formatCount(summary.backedUp, 'item')}`);
  const backup = summary.backupKept ? ` Backup: ${summary.backupDir}` : '';
  return `${pieces.join(' · ')}.${backup}`;
}

async function runLink(opts: LinkOptions): Promise<void> {
  intro(chalk.cyan(appTitle));
  const { config, link, backupRoot } = await prepare(opts);
  const exclude = opts.exclude ?? config.exclude;

  const spin = spinner();
  spin.start('Scanning source tree...');
  const plan = await buildLinkPlan(link, { exclude });
  spin.stop('Scan complete');
  note(summarizePlan(plan), 'Plan summary');

  if (opts.dryRun) {
    if (plan.changes.length > 0) note(plan.changes.map(describeTask).join('\n'), 'Pending changes');
    outro('Dry run, nothing changed');
    return;
  }

  if (plan.backups.length > 0 && !opts.yes && process.stdout.isTTY) {
    note(plan.backups.map(describeTask).join('\n'), 'Will move to backup');
    const ok = await confirm({ message: 'Apply changes now?' });
    if (isCancel(ok) || !ok) exitCancelled();
  }

  const summary = await synchronize(link, {
    exclude,
    backupRoot,
    logger: createLogger('sync', { level: logLevel(opts) }),
  });
  note(summarizeSync(summary), 'Done');
  outro('Bye');
}

async function runStatus(opts: DirOptions): Promise<void> {
  intro(chalk.cyan(appTitle));
  const { config, link } = await prepare(opts);
  const plan = await buildLinkPlan(link, { exclude: opts.exclude ?? config.exclude });
  const lines = plan.tasks.length > 0 ? plan.tasks.map(describeTask) : ['No source entries.'];
  note(lines.join('\n'), `Status · ${plan.config.fromDir} → ${plan.config.toDir}`);
  outro(plan.changes.length > 0 ? `${formatCount(plan.changes.length, 'change')} pending` : 'Everything linked');
}

async function runEnv(opts: DirOptions): Promise<void> {
  const { env } = await prepare(opts);
  for (const key of Object.keys(env).sort()) {
    process.stdout.write(`${key}=${env[key]}\n`);
  }
}

function withDirOptions(command: Command): Command {
  return command
    .option('--from <dir>', 'Source directory (your dotfiles checkout)')
    .option('--to <dir>', 'Target directory to link into')
    .option('--backup <dir>', 'Directory to move displaced files into')
    .option('-c, --config <path>', 'Path to config file')
    .option('--exclude <name...>', 'Path segments to skip, e.g. .git')
    .option('-v, --verbose', 'Log every step');
}

function reportError(err: unknown): never {
  if (isDotsyncError(err)) {
    note(err.message, `Error · ${err.kind}`);
  } else {
    note(String(err instanceof Error ? err.message : err), 'Fatal error');
  }
  process.exit(1);
}

const program = new Command();

program
  .name(appTitle)
  .version('0.1.0')
  .description('Link a dotfiles tree into place, backing up whatever is in the way');

withDirOptions(program.command('link').description('Symlink every file of the source tree into the target tree'))
  .option('--dry-run', 'Show what would change without touching anything')
  .option('-y, --yes', 'Do not ask before moving files to the backup dir')
  .action((opts: LinkOptions) => runLink(opts).catch(reportError));

withDirOptions(program.command('status').description('Show how each source entry is linked'))
  .action((opts: DirOptions) => runStatus(opts).catch(reportError));

withDirOptions(program.command('env').description('Print the resolved config env'))
  .action((opts: DirOptions) => runEnv(opts).catch(reportError));

program.parseAsync().catch(reportError);
