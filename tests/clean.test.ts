import { describe, test, expect, vi, beforeEach } from 'vitest';
import {
  cleanMergedBranches,
  filterMergedBranches,
  listMergedBranches,
  resolveTargetBranch
} from '../src/clean.js';
import { BranchNotFoundError, CleanError, UserCancelledError } from '../src/errors.js';
import * as ui from '../src/ui.js';
import { captureRejection, createFakeGit, gitFailure } from './utils/index.js';
import type { FakeResponse } from './utils/index.js';

vi.mock('../src/ui.js');

const MERGED_LISTING = '* main\n  feature-a\n  feature-b\n  main\n';

/**
 * Fake repository where `main` exists and `branch --merged` prints
 * `listing`. Deleting a branch listed in `undeletable` fails.
 */
function repoResponder(listing: string, undeletable: string[] = []) {
  return (args: readonly string[]): FakeResponse => {
    if (args[0] === 'show-ref') return '';
    if (args[0] === 'branch' && args[1] === '--merged') return listing;
    if (args[0] === 'branch' && args[1] === '-d') {
      const branch = args[2];
      return undeletable.includes(branch)
        ? gitFailure(`error: the branch '${branch}' is not fully merged.\n`)
        : `Deleted branch ${branch} (was abc1234).`;
    }
    return gitFailure(`unexpected command: git ${args.join(' ')}`);
  };
}

function deleteCalls(calls: string[][]): string[][] {
  return calls.filter(args => args[0] === 'branch' && args[1] === '-d');
}

describe('Branch Cleanup', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('filterMergedBranches', () => {
    test('drops the current branch and the target branch, keeping order', () => {
      expect(filterMergedBranches(MERGED_LISTING, 'main')).toEqual(['feature-a', 'feature-b']);
    });

    test('drops blank lines and surrounding whitespace', () => {
      expect(filterMergedBranches('\n   zeta  \n\n  alpha\n\t\n', 'main')).toEqual(['zeta', 'alpha']);
    });

    test('drops branches checked out in other worktrees', () => {
      expect(filterMergedBranches('  fix-1\n+ hotfix\n* release\n', 'main')).toEqual(['fix-1']);
    });

    test('drops the target branch when it is not the current branch', () => {
      expect(filterMergedBranches('  master\n* feature\n  old-work\n', 'master')).toEqual(['old-work']);
    });
  });

  describe('resolveTargetBranch', () => {
    test('uses the configured branch without probing', async () => {
      const git = createFakeGit();
      await expect(resolveTargetBranch(git.run, 'develop')).resolves.toBe('develop');
      expect(git.calls).toEqual([]);
    });

    test('wraps a failed detection in a descriptive error', async () => {
      const git = createFakeGit(() => gitFailure(''));
      const error = await captureRejection(resolveTargetBranch(git.run));

      expect(error).toBeInstanceOf(CleanError);
      expect(error).toMatchObject({
        message: "could not determine main branch: neither 'main' nor 'master' branch found. Please specify with --main flag"
      });
    });
  });

  describe('listMergedBranches', () => {
    test('reports a missing target branch specifically', async () => {
      const git = createFakeGit(() => gitFailure('error: malformed object name develop\n', { exitCode: 129 }));
      const error = await captureRejection(listMergedBranches(git.run, 'develop'));

      expect(error).toBeInstanceOf(BranchNotFoundError);
      expect(error).toMatchObject({ branch: 'develop', message: "branch 'develop' not found" });
      expect(git.calls).toEqual([['branch', '--merged', 'develop']]);
    });

    test('reports other failures as listing failures', async () => {
      const git = createFakeGit(() => gitFailure('fatal: not a git repository (or any of the parent directories): .git\n', { exitCode: 128 }));
      const error = await captureRejection(listMergedBranches(git.run, 'main'));

      expect(error).toBeInstanceOf(CleanError);
      expect(error).toMatchObject({
        message: expect.stringMatching(/^failed to list merged branches: command 'git branch --merged main' failed: exit status 128/)
      });
    });
  });

  describe('cleanMergedBranches', () => {
    test('only lists candidates when deletion is not requested', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));

      const report = await cleanMergedBranches(git.run, { delete: false, dryRun: false });

      expect(report).toEqual({
        target: 'main',
        candidates: ['feature-a', 'feature-b'],
        mode: 'list',
        deleted: [],
        failed: []
      });
      expect(git.calls).toEqual([
        ['show-ref', '--verify', '--quiet', 'refs/heads/main'],
        ['branch', '--merged', 'main']
      ]);
      expect(ui.ui.mergedBranches).toHaveBeenCalledWith('main', ['feature-a', 'feature-b']);
    });

    test('dry run reports each candidate and never deletes', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));

      const report = await cleanMergedBranches(git.run, { delete: true, dryRun: true });

      expect(report.mode).toBe('dry-run');
      expect(report.deleted).toEqual([]);
      expect(report.failed).toEqual([]);
      expect(deleteCalls(git.calls)).toEqual([]);
      expect(ui.ui.wouldDelete).toHaveBeenCalledTimes(2);
      expect(ui.ui.wouldDelete).toHaveBeenNthCalledWith(1, 'feature-a');
      expect(ui.ui.wouldDelete).toHaveBeenNthCalledWith(2, 'feature-b');
      expect(ui.ui.dryRunSummary).toHaveBeenCalledWith(2);
    });

    test('deletes every candidate with a safe delete', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));

      const report = await cleanMergedBranches(git.run, { mainBranch: 'main', delete: true, dryRun: false });

      expect(report.deleted).toEqual(['feature-a', 'feature-b']);
      expect(git.calls).toEqual([
        ['branch', '--merged', 'main'],
        ['branch', '-d', 'feature-a'],
        ['branch', '-d', 'feature-b']
      ]);
      expect(ui.ui.cleanSummary).toHaveBeenCalledWith(2, 0);
    });

    test('keeps deleting after one branch fails', async () => {
      const listing = '* main\n  alpha\n  beta\n  gamma\n';
      const git = createFakeGit(repoResponder(listing, ['beta']));

      const report = await cleanMergedBranches(git.run, { delete: true, dryRun: false });

      expect(deleteCalls(git.calls)).toEqual([
        ['branch', '-d', 'alpha'],
        ['branch', '-d', 'beta'],
        ['branch', '-d', 'gamma']
      ]);
      expect(report.deleted).toEqual(['alpha', 'gamma']);
      expect(report.failed).toEqual([
        { branch: 'beta', error: "error: the branch 'beta' is not fully merged." }
      ]);
      expect(ui.ui.deleteFailed).toHaveBeenCalledWith('beta', "error: the branch 'beta' is not fully merged.");
      expect(ui.ui.cleanSummary).toHaveBeenCalledWith(2, 1);
    });

    test('reports when nothing is merged', async () => {
      const git = createFakeGit(repoResponder('* main\n'));

      const report = await cleanMergedBranches(git.run, { delete: true, dryRun: false });

      expect(report.candidates).toEqual([]);
      expect(deleteCalls(git.calls)).toEqual([]);
      expect(ui.ui.noMergedBranches).toHaveBeenCalledWith('main');
    });

    test('stops before deleting when confirmation is declined', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));
      const confirm = vi.fn().mockResolvedValue(false);

      await expect(
        cleanMergedBranches(git.run, { delete: true, dryRun: false, confirm })
      ).rejects.toBeInstanceOf(UserCancelledError);

      expect(confirm).toHaveBeenCalledWith(['feature-a', 'feature-b']);
      expect(deleteCalls(git.calls)).toEqual([]);
    });

    test('deletes after confirmation is given', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));
      const confirm = vi.fn().mockResolvedValue(true);

      const report = await cleanMergedBranches(git.run, { delete: true, dryRun: false, confirm });

      expect(confirm).toHaveBeenCalledOnce();
      expect(report.deleted).toEqual(['feature-a', 'feature-b']);
    });

    test('does not ask for confirmation in dry-run mode', async () => {
      const git = createFakeGit(repoResponder(MERGED_LISTING));
      const confirm = vi.fn().mockResolvedValue(true);

      await cleanMergedBranches(git.run, { delete: true, dryRun: true, confirm });

      expect(confirm).not.toHaveBeenCalled();
    });

    test('fails when the configured branch does not exist', async () => {
      const git = createFakeGit(() => gitFailure('error: malformed object name release\n', { exitCode: 129 }));

      await expect(
        cleanMergedBranches(git.run, { mainBranch: 'release', delete: true, dryRun: false })
      ).rejects.toBeInstanceOf(BranchNotFoundError);
      expect(deleteCalls(git.calls)).toEqual([]);
    });
  });
});
