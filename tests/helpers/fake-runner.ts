/**
 * In-process stand-ins for external commands.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CommandResult, CommandRunner, RunOptions } from '../../src/infrastructure/shell/index.js';
import { formatCommand } from '../../src/infrastructure/shell/index.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export type CommandHandler = (
  args: readonly string[],
  options: RunOptions
) => Partial<Omit<CommandResult, 'command'>> | Promise<Partial<Omit<CommandResult, 'command'>>>;

/**
 * Scripted CommandRunner. Commands without a handler exit 0 with no output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly tools: Set<string>;

  constructor(tools: readonly string[] = ['docker']) {
    this.tools = new Set(tools);
  }

  on(command: string, handler: CommandHandler): this {
    this.handlers.set(command, handler);
    this.tools.add(command);
    return this;
  }

  removeTool(tool: string): this {
    this.tools.delete(tool);
    return this;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], options });
    const handler = this.handlers.get(command);
    const result = handler ? await handler(args, options) : {};
    return {
      command: formatCommand(command, args),
      exitCode: result.exitCode === undefined ? 0 : result.exitCode,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }

  async which(command: string): Promise<string | null> {
    return this.tools.has(command) ? `/usr/bin/${command}` : null;
  }

  /** Every call as a single command line */
  commandLines(): string[] {
    return this.calls.map(({ command, args }) => [command, ...args].join(' '));
  }
}

// =============================================================================
// DOCKER STAND-IN
// =============================================================================

export interface FakeContainer {
  Service: string;
  State: string;
  Health?: string;
  Status?: string;
}

export interface DockerStackOptions {
  /** Container list returned by successive `compose ps` calls; the last repeats */
  psSequence?: FakeContainer[][];
  upExitCode?: number;
  redisReply?: string;
  /** pg_isready exits 2 when false */
  datastoreReady?: boolean;
  existingNetworks?: string[];
}

/**
 * Emulates the docker CLI: compose version/up/ps/exec/logs and network commands.
 */
export function dockerStack(options: DockerStackOptions = {}): CommandHandler {
  const sequence = options.psSequence ?? [runningStack()];
  let psCalls = 0;

  return (args) => {
    if (args[0] === 'compose' && args[1] === 'version') {
      return { stdout: 'Docker Compose version v2.24.0\n' };
    }
    if (args[0] === 'network' && args[1] === 'create') {
      const name = args[2] ?? '';
      return (options.existingNetworks ?? []).includes(name)
        ? { exitCode: 1, stderr: `Error response from daemon: network with name ${name} already exists\n` }
        : { stdout: 'f00d\n' };
    }
    if (args[0] === 'network' || args[0] === 'volume') {
      return { stdout: 'tradedeck-backend\n' };
    }

    // docker compose -f <file> <subcommand> ...
    const rest = args.slice(3);
    const subcommand = rest.find((arg) => ['up', 'ps', 'exec', 'logs'].includes(arg));
    switch (subcommand) {
      case 'up':
        return options.upExitCode ? { exitCode: options.upExitCode, stderr: 'pull access denied\n' } : {};
      case 'ps': {
        const index = Math.min(psCalls, sequence.length - 1);
        psCalls++;
        return { stdout: (sequence[index] ?? []).map((entry) => JSON.stringify(entry)).join('\n') };
      }
      case 'exec':
        if (rest.includes('pg_isready')) {
          return options.datastoreReady === false
            ? { exitCode: 2, stdout: '/var/run/postgresql:5432 - no response\n' }
            : { stdout: '/var/run/postgresql:5432 - accepting connections\n' };
        }
        return { stdout: `${options.redisReply ?? 'PONG'}\n` };
      default:
        return {};
    }
  };
}

export function runningStack(services: readonly string[] = ['timescaledb', 'redis', 'trading-bot', 'nginx']): FakeContainer[] {
  return services.map((service) => ({ Service: service, State: 'running', Health: 'healthy', Status: 'Up 5 seconds' }));
}

// =============================================================================
// TEMP DIRECTORIES
// =============================================================================

export function makeTempDir(prefix = 'tradedeck-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const noSleep = async (): Promise<void> => {};
