import { ui } from './ui.js';

/**
 * Raised when a git subprocess exits non-zero or cannot be launched.
 *
 * Carries everything needed to diagnose the failure without re-running the
 * command: the arguments, the process failure, git's complete stderr and
 * whatever stdout was produced before it failed.
 *
 * @example
 * ```typescript
 * try {
 *   await runGit(['-C', repo, 'pull', '--ff-only']);
 * } catch (error) {
 *   if (error instanceof GitCommandError) {
 *     console.error(error.stderr);
 *   }
 * }
 * ```
 */
export class GitCommandError extends Error {
  readonly args: readonly string[];
  /** `git` followed by the arguments joined with spaces */
  readonly command: string;
  /** Process-level failure, e.g. `exit status 128` or a spawn error */
  readonly reason: string;
  readonly stderr: string;
  readonly stdout: string;
  readonly exitCode?: number;

  constructor(
    args: readonly string[],
    details: { reason: string; stderr: string; stdout: string; exitCode?: number; cause?: unknown }
  ) {
    const command = `git ${args.join(' ')}`;
    super(`command '${command}' failed: ${details.reason}\nStderr: ${details.stderr}`, { cause: details.cause });
    this.name = 'GitCommandError';
    this.args = args;
    this.command = command;
    this.reason = details.reason;
    this.stderr = details.stderr;
    this.stdout = details.stdout;
    this.exitCode = details.exitCode;
  }
}

export class NoDefaultBranchError extends Error {
  constructor(message = "neither 'main' nor 'master' branch found. Please specify with --main flag") {
    super(message);
    this.name = 'NoDefaultBranchError';
  }
}

export class BranchNotFoundError extends Error {
  readonly branch: string;

  constructor(branch: string, options?: { cause?: unknown }) {
    super(`branch '${branch}' not found`, options);
    this.name = 'BranchNotFoundError';
    this.branch = branch;
  }
}

/** Any other failure of the branch cleaner that aborts the command. */
export class CleanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CleanError';
  }
}

export class InvalidActionError extends Error {
  readonly action: string;

  constructor(action: string) {
    super(`invalid action '${action}': must be 'fetch' or 'pull'`);
    this.name = 'InvalidActionError';
    this.action = action;
  }
}

export class DirectoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DirectoryError';
  }
}

/**
 * Thrown when the user declines a confirmation prompt or presses Ctrl+C.
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Reports a top-level command failure and terminates the process.
 *
 * User cancellation exits with code 0; every other failure exits with 1.
 */
export function handleCommandError(error: unknown): never {
  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    return process.exit(0);
  }

  ui.error(`Error: ${ErrorUtils.extractErrorMessage(error)}`);
  return process.exit(1);
}
