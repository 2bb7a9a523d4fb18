/**
 * CLI plumbing shared by the setup and domains commands.
 */

import { getConfig, type SetupConfig } from '../config/index.js';
import { ConfigValidationError, ConfigurationError, isSetupError, getErrorMessage } from '../core/errors.js';
import type { Prompter } from '../core/types.js';
import { closeLogger, getComponentLogger, initializeLogger } from '../infrastructure/logger/index.js';
import { createSetupContext, type SetupContext } from '../orchestrator/context.js';
import type { Writer } from '../orchestrator/report.js';
import { createPrompter } from './prompts.js';

const logger = getComponentLogger('CLI');

/**
 * Seams a test replaces: collaborators, terminal output and the exit code.
 */
export interface CliDependencies {
  prompter?: Prompter;
  context?: Partial<Omit<SetupContext, 'config' | 'prompter'>>;
  write?: Writer;
  color?: boolean;
  setExitCode?: (code: number) => void;
}

export interface GlobalOptions {
  projectDir?: string;
  yes?: boolean;
  color?: boolean;
}

export interface CliRuntime {
  config: SetupConfig;
  context: SetupContext;
  write: Writer;
  color: boolean;
  setExitCode: (code: number) => void;
}

export function createRuntime(options: GlobalOptions, deps: CliDependencies): CliRuntime {
  const config = getConfig(options.projectDir);
  initializeLogger({ logDir: config.paths.logDir });
  const prompter = deps.prompter ?? createPrompter({ yes: options.yes });
  return {
    config,
    context: createSetupContext(config, prompter, deps.context),
    write: deps.write ?? console.log,
    color: (deps.color ?? Boolean(process.stdout.isTTY)) && options.color !== false,
    setExitCode:
      deps.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
  };
}

/**
 * Prints an error that ended a command, with its hint and any issue list.
 */
export function reportFatal(error: unknown, write: Writer = console.error): void {
  write(`❌ ${getErrorMessage(error)}`);
  if (error instanceof ConfigurationError || error instanceof ConfigValidationError) {
    for (const issue of error.issues) {
      write(`   - ${issue}`);
    }
  }
  if (isSetupError(error) && error.hint) {
    write(`   hint: ${error.hint}`);
  }
}

/**
 * Entry point body of a bin script: parse, then flush the logger. The logger
 * comes up in createRuntime once the project directory is known. Any error
 * that escapes a command is fatal.
 */
export async function runMain(parse: () => Promise<unknown>): Promise<void> {
  try {
    await parse();
  } catch (error) {
    logger.error('Command failed', { error: getErrorMessage(error) });
    reportFatal(error);
    process.exitCode = 1;
  } finally {
    await closeLogger();
  }
}
