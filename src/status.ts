import { ErrorUtils, GitCommandError } from './errors.js';
import { ui } from './ui.js';
import type { GitRunner, RepoStatus, RepositoryPath, UpstreamState } from './types.js';

/**
 * Fragments of git's stderr meaning the branch has no upstream configured.
 * These are English messages; other locales will be reported as `error`.
 */
const NO_UPSTREAM_PATTERNS = ['no upstream configured', 'no upstream branch'];

/**
 * Decides whether a failed divergence query means "no upstream" rather than
 * a real failure.
 */
export function isNoUpstreamError(error: unknown): boolean {
  const text = error instanceof GitCommandError
    ? error.stderr
    : ErrorUtils.extractErrorMessage(error);
  return NO_UPSTREAM_PATTERNS.some(pattern => text.includes(pattern));
}

/**
 * Parses `rev-list --left-right --count` output (`"<ahead>\t<behind>"`).
 * Returns null unless there are exactly two non-negative integers.
 */
export function parseDivergence(output: string): { ahead: number; behind: number } | null {
  const fields = output.trim().split(/\s+/);
  if (fields.length !== 2 || !fields.every(field => /^\d+$/.test(field))) {
    return null;
  }
  return { ahead: Number(fields[0]), behind: Number(fields[1]) };
}

export function classifyDivergence(ahead: number, behind: number): UpstreamState {
  if (ahead > 0 && behind > 0) return 'diverged';
  if (ahead > 0) return 'ahead';
  if (behind > 0) return 'behind';
  return 'synced';
}

async function checkDirty(run: GitRunner, repoPath: RepositoryPath): Promise<boolean> {
  try {
    const output = await run(['-C', repoPath, 'status', '--porcelain=v1']);
    return output !== '';
  } catch (error) {
    ui.warning(`Warning: could not read working tree status of ${repoPath}: ${ErrorUtils.extractErrorMessage(error)}`);
    return true;
  }
}

async function checkUpstream(
  run: GitRunner,
  repoPath: RepositoryPath
): Promise<Pick<RepoStatus, 'aheadCount' | 'behindCount' | 'upstreamState' | 'error'>> {
  let output: string;
  try {
    output = await run(['-C', repoPath, 'rev-list', '--left-right', '--count', 'HEAD...@{u}']);
  } catch (error) {
    if (isNoUpstreamError(error)) {
      return { aheadCount: 0, behindCount: 0, upstreamState: 'no-upstream' };
    }
    const message = ErrorUtils.extractErrorMessage(error);
    ui.warning(`Warning: could not compare ${repoPath} with its upstream: ${message}`);
    return { aheadCount: 0, behindCount: 0, upstreamState: 'error', error: message };
  }

  const counts = parseDivergence(output);
  if (!counts) {
    return {
      aheadCount: 0,
      behindCount: 0,
      upstreamState: 'error',
      error: `could not parse ahead/behind counts from '${output}'`
    };
  }

  return {
    aheadCount: counts.ahead,
    behindCount: counts.behind,
    upstreamState: classifyDivergence(counts.ahead, counts.behind)
  };
}

/**
 * Computes dirtiness and upstream divergence for one repository.
 *
 * Never throws: a failed status query counts as dirty, a failed divergence
 * query becomes the `no-upstream` or `error` state.
 */
export async function getRepoStatus(run: GitRunner, repoPath: RepositoryPath): Promise<RepoStatus> {
  const dirty = await checkDirty(run, repoPath);
  const upstream = await checkUpstream(run, repoPath);
  return { path: repoPath, dirty, ...upstream };
}

/**
 * Collects one status per repository, in input order, one repository at a
 * time. `onStatus` is called with each record as soon as it is ready.
 */
export async function collectStatuses(
  run: GitRunner,
  repos: readonly RepositoryPath[],
  onStatus?: (status: RepoStatus) => void
): Promise<RepoStatus[]> {
  const statuses: RepoStatus[] = [];
  for (const repoPath of repos) {
    const status = await getRepoStatus(run, repoPath);
    statuses.push(status);
    onStatus?.(status);
  }
  return statuses;
}

function upstreamSuffix(status: RepoStatus): string {
  switch (status.upstreamState) {
    case 'synced':
      return 'up to date';
    case 'ahead':
      return `ahead ${status.aheadCount}`;
    case 'behind':
      return `behind ${status.behindCount}`;
    case 'diverged':
      return `diverged (ahead ${status.aheadCount}, behind ${status.behindCount})`;
    case 'no-upstream':
      return 'no upstream';
    case 'error':
      return 'upstream check failed';
  }
}

/**
 * One-line summary such as `Dirty, ahead 2` or `Clean, no upstream`.
 */
export function formatStatusLine(status: RepoStatus): string {
  return `${status.dirty ? 'Dirty' : 'Clean'}, ${upstreamSuffix(status)}`;
}
