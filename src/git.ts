import { execa, ExecaError } from 'execa';
import { resolve, join } from 'path';
import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { GitCommandError, NoDefaultBranchError, DirectoryError, ErrorUtils } from './errors.js';
import { ui } from './ui.js';
import type { GitRunner, RepositoryPath } from './types.js';

/** Name of the metadata directory that marks a repository root */
export const GIT_DIR = '.git';

/** Dependency and build output directories the locator never descends into */
export const EXCLUDED_DIRS: ReadonlySet<string> = new Set(['vendor', 'node_modules', 'target', 'build']);

/** Probed in order when no target branch is given */
export const DEFAULT_BRANCH_CANDIDATES = ['main', 'master'] as const;

export type RunGitOptions = {
  /** Executable to run instead of `git` from the search path */
  binary?: string;
  cwd?: string;
};

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function describeFailure(error: ExecaError): string {
  if (error.exitCode !== undefined) {
    return `exit status ${error.exitCode}`;
  }
  if (error.signal) {
    return `signal: ${error.signal}`;
  }
  return error.cause instanceof Error ? error.cause.message : error.shortMessage;
}

/**
 * Runs git and returns its trimmed stdout.
 *
 * stdout and stderr are captured separately. When the process exits non-zero
 * or cannot be launched, a {@link GitCommandError} is thrown carrying the
 * arguments, the process failure, the full stderr and any partial stdout.
 *
 * @example
 * ```typescript
 * const branches = await runGit(['branch', '--merged', 'main']);
 * const status = await runGit(['-C', '/path/to/repo', 'status', '--porcelain=v1']);
 * ```
 */
export async function runGit(args: readonly string[], options: RunGitOptions = {}): Promise<string> {
  try {
    const { stdout } = await execa(options.binary ?? 'git', [...args], {
      cwd: options.cwd,
      stdin: 'ignore',
      shell: false // Explicitly disable shell interpretation
    });
    return stdout.trim();
  } catch (error) {
    if (error instanceof ExecaError) {
      throw new GitCommandError(args, {
        reason: describeFailure(error),
        stderr: asText(error.stderr),
        stdout: asText(error.stdout).trim(),
        exitCode: error.exitCode,
        cause: error
      });
    }
    throw new GitCommandError(args, {
      reason: ErrorUtils.extractErrorMessage(error),
      stderr: '',
      stdout: '',
      cause: error
    });
  }
}

/**
 * Binds {@link runGit} to a configured binary and working directory.
 */
export function createGitRunner(config: { gitBinary: string }, cwd?: string): GitRunner {
  return (args) => runGit(args, { binary: config.gitBinary, cwd });
}

/**
 * Reports whether a local branch exists. A failed probe counts as missing.
 */
export async function branchExists(run: GitRunner, branch: string): Promise<boolean> {
  return run(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`]).then(
    () => true,
    () => false
  );
}

/**
 * Picks the repository's main branch: `main` if it exists, else `master`.
 *
 * @throws {NoDefaultBranchError} When neither branch exists
 */
export async function detectDefaultBranch(run: GitRunner): Promise<string> {
  for (const candidate of DEFAULT_BRANCH_CANDIDATES) {
    if (await branchExists(run, candidate)) {
      return candidate;
    }
  }
  throw new NoDefaultBranchError();
}

/**
 * Finds every repository root below `rootDir`.
 *
 * The tree is walked depth first with entries in name order. A `.git`
 * directory marks its parent as a repository and is not entered; its sibling
 * directories are still walked, so repositories nested in another working
 * tree are returned as separate entries. {@link EXCLUDED_DIRS} are skipped.
 * Symbolic links and `.git` files are ignored.
 *
 * A directory below the root that cannot be read produces a warning and is
 * skipped.
 *
 * @throws {DirectoryError} When the root itself cannot be read
 */
export async function discoverRepos(rootDir: string): Promise<RepositoryPath[]> {
  const root = resolve(rootDir);
  const repos: RepositoryPath[] = [];

  async function scanDir(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root) {
        throw new DirectoryError(
          `failed to scan ${root}: ${ErrorUtils.extractErrorMessage(error)}`,
          { cause: error }
        );
      }
      ui.accessWarning(dir, ErrorUtils.extractErrorMessage(error));
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      if (entry.name === GIT_DIR) {
        repos.push(dir);
        continue;
      }
      if (EXCLUDED_DIRS.has(entry.name)) continue;
      await scanDir(join(dir, entry.name));
    }
  }

  await scanDir(root);
  return repos;
}
