/**
 * Shell Infrastructure
 *
 * Process execution behind a small interface so that stages can be driven by
 * an in-process fake in tests.
 */

import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { CommandError, MissingToolError, getSystemErrorCode } from '../../core/errors.js';
import { getComponentLogger } from '../logger/index.js';

const logger = getComponentLogger('Shell');

// =============================================================================
// TYPES
// =============================================================================

export interface CommandResult {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Attach the child to this terminal (editors, log following) */
  inherit?: boolean;
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  /** Absolute path of an executable on PATH, or null */
  which(command: string): Promise<string | null>;
}

// =============================================================================
// PROCESS RUNNER
// =============================================================================

export class ProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const display = formatCommand(command, args);
    logger.debug('Running command', { command: display, cwd: options.cwd });

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: options.inherit ? 'inherit' : ['pipe', 'pipe', 'pipe'],
        timeout: options.timeoutMs,
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding('utf8').on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (err) => {
        if (getSystemErrorCode(err) === 'ENOENT') {
          reject(new MissingToolError(command));
          return;
        }
        reject(err);
      });

      child.on('close', (exitCode) => {
        logger.debug('Command finished', { command: display, exitCode });
        resolve({ command: display, exitCode, stdout, stderr });
      });

      if (child.stdin) {
        child.stdin.end(options.input ?? '');
      }
    });
  }

  async which(command: string): Promise<string | null> {
    const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    const extensions =
      process.platform === 'win32' ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];

    for (const dir of dirs) {
      for (const ext of extensions) {
        const candidate = path.join(dir, command + ext);
        const executable = await fs.promises.access(candidate, fs.constants.X_OK).then(
          () => true,
          () => false
        );
        if (executable) {
          return candidate;
        }
      }
    }
    return null;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Runs a command and throws CommandError on a non-zero exit.
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError(result.command, result.exitCode, result.stderr);
  }
  return result;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export const processRunner = new ProcessRunner();
