import { detectDefaultBranch } from './git.js';
import {
  BranchNotFoundError,
  CleanError,
  ErrorUtils,
  GitCommandError,
  UserCancelledError
} from './errors.js';
import { ui } from './ui.js';
import type { CleanMode, CleanOptions, CleanReport, GitRunner } from './types.js';

/** git's stderr when the ref given to `branch --merged` cannot be resolved */
const UNKNOWN_REF_PATTERNS = ['malformed object name', 'no such commit', 'not a valid object name'];

/**
 * Marker prefixes `git branch` puts in front of branches that cannot be
 * deleted: `*` for the current branch, `+` for one checked out in another
 * worktree.
 */
const CHECKED_OUT_MARKERS = ['* ', '+ '];

function isUnknownRefError(error: unknown): boolean {
  return error instanceof GitCommandError
    && UNKNOWN_REF_PATTERNS.some(pattern => error.stderr.includes(pattern));
}

/**
 * Turns `git branch --merged` output into deletion candidates.
 *
 * Lines are trimmed; empty lines, the checked-out branch and the target
 * branch itself are dropped. Listing order is kept.
 *
 * @example
 * ```typescript
 * filterMergedBranches('* main\n  feature-a\n  feature-b\n  main\n', 'main');
 * // => ['feature-a', 'feature-b']
 * ```
 */
export function filterMergedBranches(listing: string, target: string): string[] {
  return listing
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '')
    .filter(line => !CHECKED_OUT_MARKERS.some(marker => line.startsWith(marker)))
    .filter(line => line !== target);
}

/**
 * Resolves the branch to compare against: the configured one, or the
 * detected default.
 */
export async function resolveTargetBranch(run: GitRunner, mainBranch?: string): Promise<string> {
  if (mainBranch) {
    return mainBranch;
  }
  try {
    return await detectDefaultBranch(run);
  } catch (error) {
    throw new CleanError(
      `could not determine main branch: ${ErrorUtils.extractErrorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Lists local branches merged into `target`, unfiltered.
 *
 * @throws {BranchNotFoundError} When `target` does not exist
 * @throws {CleanError} When the listing fails for any other reason
 */
export async function listMergedBranches(run: GitRunner, target: string): Promise<string> {
  try {
    return await run(['branch', '--merged', target]);
  } catch (error) {
    if (isUnknownRefError(error)) {
      throw new BranchNotFoundError(target, { cause: error });
    }
    throw new CleanError(
      `failed to list merged branches: ${ErrorUtils.extractErrorMessage(error)}`,
      { cause: error }
    );
  }
}

function modeFor(options: CleanOptions): CleanMode {
  if (!options.delete) return 'list';
  return options.dryRun ? 'dry-run' : 'delete';
}

/**
 * Finds local branches merged into the main branch and optionally deletes them.
 *
 * Without `delete` the candidates are only reported. With `delete` and
 * `dryRun` each candidate is reported as "would delete" and git is never
 * asked to change anything. With `delete` alone each candidate is removed
 * with `git branch -d`, which refuses branches that are not fully merged;
 * one failed deletion does not stop the others.
 *
 * @throws {CleanError} When no target branch can be determined or listed
 * @throws {BranchNotFoundError} When the target branch does not exist
 * @throws {UserCancelledError} When the `confirm` hook declines
 */
export async function cleanMergedBranches(run: GitRunner, options: CleanOptions): Promise<CleanReport> {
  const target = await resolveTargetBranch(run, options.mainBranch);
  ui.targetBranch(target);

  const listing = await listMergedBranches(run, target);
  const candidates = filterMergedBranches(listing, target);
  const report: CleanReport = { target, candidates, mode: modeFor(options), deleted: [], failed: [] };

  if (candidates.length === 0) {
    ui.noMergedBranches(target);
    return report;
  }

  if (report.mode === 'list') {
    ui.mergedBranches(target, candidates);
    ui.deleteHint();
    return report;
  }

  if (report.mode === 'dry-run') {
    candidates.forEach(branch => ui.wouldDelete(branch));
    ui.dryRunSummary(candidates.length);
    return report;
  }

  if (options.confirm && !(await options.confirm(candidates))) {
    throw new UserCancelledError('Branch deletion cancelled by user');
  }

  for (const branch of candidates) {
    try {
      await run(['branch', '-d', branch]);
      report.deleted.push(branch);
      ui.deleted(branch);
    } catch (error) {
      const message = error instanceof GitCommandError
        ? error.stderr.trim() || error.message
        : ErrorUtils.extractErrorMessage(error);
      report.failed.push({ branch, error: message });
      ui.deleteFailed(branch, message);
    }
  }

  ui.cleanSummary(report.deleted.length, report.failed.length);
  return report;
}
