import { z } from 'zod';
import { ErrorUtils, GitCommandError, InvalidActionError } from './errors.js';
import type { GitRunner, RepositoryPath, SyncAction, SyncOutcome, SyncSummary } from './types.js';

const syncActionSchema = z.enum(['fetch', 'pull']);

const SYNC_ARGS: Record<SyncAction, readonly string[]> = {
  fetch: ['fetch', '--prune'],
  pull: ['pull', '--ff-only']
};

/**
 * Validates a user-supplied action, case-insensitively.
 *
 * @throws {InvalidActionError} For anything other than `fetch` or `pull`
 */
export function parseSyncAction(raw: string): SyncAction {
  const result = syncActionSchema.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    throw new InvalidActionError(raw);
  }
  return result.data;
}

export function syncArgs(repoPath: RepositoryPath, action: SyncAction): string[] {
  return ['-C', repoPath, ...SYNC_ARGS[action]];
}

async function syncRepository(run: GitRunner, repoPath: RepositoryPath, action: SyncAction): Promise<SyncOutcome> {
  try {
    const output = await run(syncArgs(repoPath, action));
    return { path: repoPath, succeeded: true, output };
  } catch (error) {
    return {
      path: repoPath,
      succeeded: false,
      output: error instanceof GitCommandError ? error.stdout : '',
      error: ErrorUtils.extractErrorMessage(error)
    };
  }
}

/**
 * Fetches (`fetch --prune`) or fast-forward pulls (`pull --ff-only`) every
 * repository, one after another.
 *
 * The action is validated before any repository is touched. A failing
 * repository is recorded and the loop moves on. `onOutcome` is called with
 * each result as soon as it is ready.
 *
 * @throws {InvalidActionError} When `action` is not `fetch` or `pull`
 *
 * @example
 * ```typescript
 * const summary = await syncRepositories(run, repos, 'pull');
 * console.log(`${summary.succeeded} ok, ${summary.failed} failed`);
 * ```
 */
export async function syncRepositories(
  run: GitRunner,
  repos: readonly RepositoryPath[],
  action: string,
  onOutcome?: (outcome: SyncOutcome) => void
): Promise<SyncSummary> {
  const validAction = parseSyncAction(action);
  const summary: SyncSummary = { action: validAction, outcomes: [], succeeded: 0, failed: 0 };

  for (const repoPath of repos) {
    const outcome = await syncRepository(run, repoPath, validAction);
    summary.outcomes.push(outcome);
    if (outcome.succeeded) {
      summary.succeeded++;
    } else {
      summary.failed++;
    }
    onOutcome?.(outcome);
  }

  return summary;
}
