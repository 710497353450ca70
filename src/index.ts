import { basename, relative } from 'path';
import { Command } from 'commander';
import { cleanMergedBranches } from './clean.js';
import { loadConfig, resolveCleanConfig, resolveScanConfig, resolveSyncConfig } from './config.js';
import type { Config } from './config.js';
import { handleCommandError } from './errors.js';
import { createGitRunner, discoverRepos } from './git.js';
import { confirmDeletion } from './prompts.js';
import { collectStatuses, formatStatusLine } from './status.js';
import { parseSyncAction, syncRepositories } from './sync.js';
import { ui, padNames } from './ui.js';
import { buildInfo } from './version.js';
import type { CleanReport, RepoStatus, RepositoryPath, SyncSummary } from './types.js';

/**
 * Name shown for a repository: its path relative to the scanned directory,
 * or the directory's own name when the repository is the directory itself.
 */
export function displayName(root: string, repoPath: RepositoryPath): string {
  return relative(root, repoPath) || basename(root);
}

function displayNames(root: string, repos: readonly RepositoryPath[]): Map<RepositoryPath, string> {
  const padded = padNames(repos.map(repo => displayName(root, repo)));
  return new Map(repos.map((repo, index) => [repo, padded[index]]));
}

export async function runClean(options: unknown, base: Config = loadConfig()): Promise<CleanReport> {
  const config = resolveCleanConfig(options, base);
  const run = createGitRunner(config, config.cwd);

  return cleanMergedBranches(run, {
    mainBranch: config.mainBranch,
    delete: config.delete,
    dryRun: config.dryRun,
    confirm: config.interactive ? confirmDeletion : undefined
  });
}

export async function runStatus(options: unknown, base: Config = loadConfig()): Promise<RepoStatus[]> {
  const config = await resolveScanConfig(options, base);
  ui.scanning(config.directory);

  const repos = await discoverRepos(config.directory);
  if (repos.length === 0) {
    ui.noReposFound();
    return [];
  }
  ui.foundRepos(repos.length);

  const names = displayNames(config.directory, repos);
  const run = createGitRunner(config);

  return collectStatuses(run, repos, status => {
    const clean = !status.dirty && status.upstreamState === 'synced';
    ui.statusRow(names.get(status.path) ?? status.path, formatStatusLine(status), clean);
  });
}

export async function runSync(options: unknown, base: Config = loadConfig()): Promise<SyncSummary> {
  const config = await resolveSyncConfig(options, base);
  const action = parseSyncAction(config.action);
  ui.scanning(config.directory, action);

  const repos = await discoverRepos(config.directory);
  if (repos.length === 0) {
    ui.noReposFound();
    return { action, outcomes: [], succeeded: 0, failed: 0 };
  }
  ui.title('\n--- Synchronizing Repositories ---');

  const names = displayNames(config.directory, repos);
  const run = createGitRunner(config);

  const summary = await syncRepositories(run, repos, action, outcome => {
    const name = names.get(outcome.path) ?? outcome.path;
    ui.syncRow(name, action, outcome.succeeded);
    if (!outcome.succeeded) {
      ui.syncFailureDetail(name.trim(), outcome.error ?? 'unknown error', outcome.output);
    }
  });

  ui.syncSummary(summary.action, summary.succeeded, summary.failed);
  return summary;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('git-util')
    .enablePositionalOptions()
    .description('A utility tool for common Git operations: clean up merged branches, check and sync many repositories.')
    .version(buildInfo().version, '-v, --version')
    .option('-m, --main <branch>', "Branch to check merges against (default: 'main', then 'master')")
    .option('-d, --delete', 'Delete the merged branches', false)
    .option('--dry-run', 'Show which branches would be deleted without deleting them', false)
    .option('-i, --interactive', 'Ask for confirmation before deleting', false)
    .configureOutput({
      outputError: (str) => ui.error(str.replace(/^error: /, '').trimEnd())
    })
    .action(async (options) => {
      await runClean(options);
    });

  program
    .command('status')
    .description('Check the status of multiple Git repositories within a directory')
    .option('-D, --directory <dir>', 'Directory to scan for Git repositories (defaults to current directory)')
    .action(async (options) => {
      await runStatus(options);
    });

  program
    .command('sync')
    .description("Synchronize multiple Git repositories ('git fetch --prune' or 'git pull --ff-only')")
    .option('-D, --directory <dir>', 'Directory to scan for Git repositories (defaults to current directory)')
    .option('-a, --action <action>', "Sync action to perform: 'fetch' or 'pull'", 'fetch')
    .action(async (options) => {
      await runSync(options);
    });

  program
    .command('version')
    .description('Print the version number, commit hash, and build date')
    .action(() => {
      const info = buildInfo();
      ui.version(info.version, info.commit, info.date);
    });

  return program;
}

/**
 * Parses the command line and runs the selected command. Any top-level
 * failure is reported and ends the process with a non-zero exit code.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    handleCommandError(error);
  }
}
