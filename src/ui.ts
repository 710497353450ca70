import pc from 'picocolors';
import type { SyncAction } from './types.js';

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Headers and titles
  title: (message: string) => console.log(pc.blue(message)),

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.error(pc.red(message)),
  warning: (message: string) => console.error(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),

  // Repository scans
  scanning: (directory: string, action?: SyncAction) =>
    console.log(pc.gray(`Scanning directory: ${directory}${action ? ` (Action: ${action})` : ''}\n`)),

  foundRepos: (count: number) =>
    console.log(pc.green(`Found ${count} Git repository(ies)\n`)),

  noReposFound: () =>
    ui.warning('No Git repositories found in the specified directory.'),

  accessWarning: (path: string, message: string) =>
    ui.warning(`Warning: Error accessing path "${path}": ${message}`),

  statusRow: (name: string, line: string, clean: boolean) =>
    console.log(`${name} : ${clean ? pc.green(line) : pc.yellow(line)}`),

  syncRow: (name: string, action: SyncAction, ok: boolean) =>
    console.log(`${name} : Syncing (${action})... ${ok ? pc.green('OK') : pc.red('FAILED')}`),

  syncFailureDetail: (name: string, error: string, output: string) =>
    ui.error(`  Error for ${name}: ${error}\n  Output: ${output}`),

  syncSummary: (action: SyncAction, succeeded: number, failed: number) => {
    console.log(pc.cyan('\n--- Summary ---'));
    console.log(`Action '${action}' completed.`);
    console.log(`  Successfully synced: ${pc.green(String(succeeded))}`);
    console.log(`  Failed to sync:      ${failed > 0 ? pc.red(String(failed)) : String(failed)}`);
  },

  // Branch cleanup
  targetBranch: (branch: string) =>
    console.log(pc.gray(`Using '${branch}' as the target branch`)),

  noMergedBranches: (target: string) =>
    ui.success(`No branches merged into '${target}' to clean up.`),

  mergedBranches: (target: string, branches: string[]) => {
    console.log(pc.cyan(`Branches merged into '${target}':`));
    branches.forEach(branch => console.log(`  ${branch}`));
  },

  deleteHint: () =>
    ui.info('\nRun again with --delete to remove them (add --dry-run to preview).'),

  wouldDelete: (branch: string) =>
    console.log(`  ${pc.yellow('[dry-run]')} would delete ${branch}`),

  deleted: (branch: string) =>
    console.log(`  ${pc.green('✓')} deleted ${branch}`),

  deleteFailed: (branch: string, error: string) =>
    ui.error(`  ✗ failed to delete ${branch}: ${error}`),

  cleanSummary: (deleted: number, failed: number) => {
    console.log(pc.cyan('\n--- Summary ---'));
    console.log(`  Deleted: ${pc.green(String(deleted))}`);
    console.log(`  Failed:  ${failed > 0 ? pc.red(String(failed)) : String(failed)}`);
  },

  dryRunSummary: (count: number) =>
    ui.info(`\nDry run: ${count} branch(es) would be deleted.`),

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  },

  version: (version: string, commit: string, date: string) => {
    console.log(`git-util version ${version}`);
    console.log(`commit: ${commit}`);
    console.log(`built at: ${date}`);
  }
} as const;

/**
 * Pads display names to the longest one so status and sync rows line up.
 */
export function padNames(names: string[]): string[] {
  const width = names.reduce((max, name) => Math.max(max, name.length), 0);
  return names.map(name => name.padEnd(width));
}
