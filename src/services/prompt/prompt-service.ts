/**
 * Interactive Prompt Service
 *
 * Asks for the repository password when none was given on the command line
 * or in the config file.
 */

import inquirer from 'inquirer';
import { InteractiveError } from '../../core/errors.js';

/**
 * Prompt Service Interface
 */
export interface IPromptService {
  isInteractive(): boolean;
  promptForPassword(user: string): Promise<string>;
}

export class PromptService implements IPromptService {
  /**
   * Check if the terminal supports interactive input
   */
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  /**
   * Prompt for the password of `user` without echoing it
   */
  async promptForPassword(user: string): Promise<string> {
    if (!this.isInteractive()) {
      throw new InteractiveError(['fedora-password']);
    }

    const { password } = await inquirer.prompt<{ password: string }>([
      {
        type: 'password',
        name: 'password',
        message: `Password for ${user}:`,
        mask: '*'
      }
    ]);

    return password;
  }
}

/**
 * Uses the supplied password, or prompts when a user is set without one
 */
export async function resolvePassword(
  prompts: IPromptService,
  user: string | undefined,
  password: string | undefined
): Promise<string | undefined> {
  if (password !== undefined || user === undefined) {
    return password;
  }
  return prompts.promptForPassword(user);
}
