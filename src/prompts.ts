import { confirm } from '@inquirer/prompts';
import { UserCancelledError } from './errors.js';
import { ui } from './ui.js';

/**
 * Asks the user to confirm deletion of the listed branches.
 *
 * @returns Whether the user agreed
 * @throws {UserCancelledError} When the prompt is aborted with Ctrl+C
 */
export async function confirmDeletion(branches: string[]): Promise<boolean> {
  ui.title('Branches to delete:');
  branches.forEach(branch => console.log(`  • ${branch}`));

  try {
    return await confirm({
      message: `Delete ${branches.length} merged branch(es)?`,
      default: false
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'ExitPromptError' || error.message.includes('User force closed'))) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}
