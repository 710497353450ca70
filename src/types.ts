/**
 * Absolute filesystem path of a repository root (the parent of its `.git`
 * directory), as produced by {@link discoverRepos}.
 */
export type RepositoryPath = string;

/**
 * Runs git with the given arguments and resolves to its trimmed stdout.
 *
 * Rejects with a `GitCommandError` when git exits non-zero or cannot be
 * launched. Every component above the command runner talks to git only
 * through this signature.
 */
export type GitRunner = (args: readonly string[]) => Promise<string>;

/**
 * Relationship between a local branch and its configured upstream.
 *
 * `no-upstream` and `error` are sentinel states; the ahead/behind counts of a
 * status carrying them are always 0.
 */
export type UpstreamState =
  | 'synced'
  | 'ahead'
  | 'behind'
  | 'diverged'
  | 'no-upstream'
  | 'error';

/**
 * Per-repository result of a status scan.
 *
 * Dirtiness and upstream state are independent: a repository can be dirty
 * and diverged at the same time.
 *
 * @example
 * ```typescript
 * const status: RepoStatus = {
 *   path: '/Users/dev/projects/api',
 *   dirty: true,
 *   aheadCount: 2,
 *   behindCount: 0,
 *   upstreamState: 'ahead'
 * };
 * ```
 */
export type RepoStatus = {
  path: RepositoryPath;
  /** Working tree has uncommitted or untracked changes (or could not be queried) */
  dirty: boolean;
  /** Commits on HEAD that are not on the upstream */
  aheadCount: number;
  /** Commits on the upstream that are not on HEAD */
  behindCount: number;
  upstreamState: UpstreamState;
  /** Diagnostic for the `error` state */
  error?: string;
};

export type SyncAction = 'fetch' | 'pull';

/**
 * Result of running one sync action against one repository.
 */
export type SyncOutcome = {
  path: RepositoryPath;
  succeeded: boolean;
  /** Trimmed stdout of the git command, partial when it failed */
  output: string;
  /** Failure message including git's stderr */
  error?: string;
};

export type SyncSummary = {
  action: SyncAction;
  outcomes: SyncOutcome[];
  succeeded: number;
  failed: number;
};

/**
 * What the branch cleaner does with the merged branches it finds:
 * - `list`: report them only
 * - `dry-run`: report each as "would delete", run nothing mutating
 * - `delete`: run a safe delete for each
 */
export type CleanMode = 'list' | 'dry-run' | 'delete';

export type CleanOptions = {
  /** Branch to compare against; detected (main, then master) when omitted */
  mainBranch?: string;
  delete: boolean;
  dryRun: boolean;
  /**
   * Called with the candidate list before anything is deleted. Resolving to
   * `false` cancels the deletion.
   */
  confirm?: (branches: string[]) => Promise<boolean>;
};

export type CleanReport = {
  target: string;
  candidates: string[];
  mode: CleanMode;
  deleted: string[];
  failed: Array<{ branch: string; error: string }>;
};
