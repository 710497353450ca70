import { resolve } from 'path';
import fs from 'fs-extra';
import { DirectoryError } from '../errors.js';

/**
 * Validation of user-supplied values before they reach the filesystem or a
 * git command line.
 */
export class SecurityValidator {
  /**
   * Resolves a directory argument to an absolute path and checks that it
   * exists and is a directory.
   *
   * @throws {DirectoryError} When the path is missing or not a directory
   */
  static async validateDirectory(path: string): Promise<string> {
    const resolved = resolve(path);

    if (!(await fs.pathExists(resolved))) {
      throw new DirectoryError(`directory does not exist: ${resolved}`);
    }

    const stat = await fs.stat(resolved);
    if (!stat.isDirectory()) {
      throw new DirectoryError(`not a directory: ${resolved}`);
    }

    return resolved;
  }

  /**
   * Guards a user-supplied branch name against being read as a git option.
   * Anything else is left for git to resolve.
   *
   * @throws {Error} When the name starts with `-`
   */
  static validateBranchName(branch: string): boolean {
    if (branch.trim().startsWith('-')) {
      throw new Error(`Invalid branch name '${branch}': must not start with '-'`);
    }
    return true;
  }
}
