/**
 * Prompters
 *
 * Interactive answers through inquirer, or the defaults for `--yes` runs and
 * non-TTY sessions.
 */

import inquirer from 'inquirer';
import { PROFILE_PLANS } from '../config/constants.js';
import { CommandError } from '../core/errors.js';
import { SERVICE_PROFILES, type Prompter, type ServiceProfile } from '../core/types.js';
import { processRunner, type CommandRunner } from '../infrastructure/shell/index.js';

export class InquirerPrompter implements Prompter {
  readonly interactive = true;

  constructor(
    private readonly runner: CommandRunner = processRunner,
    private readonly editor: string = process.env.VISUAL || process.env.EDITOR || 'nano'
  ) {}

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      { type: 'confirm', name: 'answer', message, default: defaultValue },
    ]);
    return answer;
  }

  async selectProfile(message: string, defaultValue: ServiceProfile): Promise<ServiceProfile> {
    const { profile } = await inquirer.prompt<{ profile: ServiceProfile }>([
      {
        type: 'list',
        name: 'profile',
        message,
        default: defaultValue,
        choices: SERVICE_PROFILES.map((value) => ({
          name: `${value.padEnd(12)} ${PROFILE_PLANS[value].description}`,
          value,
        })),
      },
    ]);
    return profile;
  }

  /**
   * Opens the file in $VISUAL / $EDITOR attached to this terminal.
   */
  async editFile(file: string): Promise<void> {
    const [command = 'nano', ...args] = this.editor.split(/\s+/).filter(Boolean);
    const result = await this.runner.run(command, [...args, file], { inherit: true });
    if (result.exitCode !== 0) {
      throw new CommandError(result.command, result.exitCode, result.stderr);
    }
  }
}

/**
 * Answers every question with its default and never opens an editor.
 */
export class NonInteractivePrompter implements Prompter {
  readonly interactive = false;

  async confirm(_message: string, defaultValue: boolean): Promise<boolean> {
    return defaultValue;
  }

  async selectProfile(_message: string, defaultValue: ServiceProfile): Promise<ServiceProfile> {
    return defaultValue;
  }

  async editFile(): Promise<void> {
    // no editor without a terminal
  }
}

export function createPrompter(options: { yes?: boolean; isTTY?: boolean }): Prompter {
  const isTTY = options.isTTY ?? Boolean(process.stdin.isTTY && process.stdout.isTTY);
  return options.yes || !isTTY ? new NonInteractivePrompter() : new InquirerPrompter();
}
