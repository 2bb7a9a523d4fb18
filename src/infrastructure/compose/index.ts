/**
 * Compose Client
 *
 * Thin wrapper over the container runtime's compose CLI and network commands.
 * The runtime is treated as an opaque service lifecycle manager.
 */

import { z } from 'zod';
import { CommandError, MissingToolError } from '../../core/errors.js';
import { runOrThrow, type CommandResult, type CommandRunner } from '../shell/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type ComposeCommandPreference = 'auto' | 'docker compose' | 'docker-compose';

export interface ComposeClientOptions {
  composeFile: string;
  projectDir: string;
  command: ComposeCommandPreference;
}

export interface ComposeServiceState {
  service: string;
  /** running, exited, restarting, created, ... */
  state: string;
  /** healthy, unhealthy, starting, or empty when no healthcheck is defined */
  health: string;
  status: string;
}

export type NetworkCreateResult = 'created' | 'existing';

const psEntrySchema = z.object({
  Service: z.string(),
  State: z.string().default(''),
  Health: z.string().default(''),
  Status: z.string().default(''),
});

// =============================================================================
// COMPOSE CLIENT
// =============================================================================

export class ComposeClient {
  private base: readonly [string, ...string[]] | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ComposeClientOptions
  ) {}

  /**
   * Resolves the compose invocation (`docker compose` or `docker-compose`).
   *
   * @throws {MissingToolError} If neither is available
   */
  async detect(): Promise<readonly [string, ...string[]]> {
    if (this.base) {
      return this.base;
    }

    const preference = this.options.command;

    if (preference !== 'docker-compose' && (await this.runner.which('docker'))) {
      const version = await this.runner.run('docker', ['compose', 'version']);
      if (version.exitCode === 0) {
        this.base = ['docker', 'compose'];
        return this.base;
      }
    }

    if (preference !== 'docker compose' && (await this.runner.which('docker-compose'))) {
      this.base = ['docker-compose'];
      return this.base;
    }

    throw new MissingToolError(
      preference === 'auto' ? 'docker compose' : preference,
      'Install Docker Compose v2 (docker compose) or the docker-compose binary'
    );
  }

  /**
   * Starts services detached. An empty service list starts everything the
   * selected profiles enable.
   */
  async up(services: readonly string[], profiles: readonly string[]): Promise<CommandResult> {
    const profileArgs = profiles.flatMap((profile) => ['--profile', profile]);
    return this.compose([...profileArgs, 'up', '-d', ...services]);
  }

  /**
   * Lists container states for every service of the project.
   */
  async ps(): Promise<ComposeServiceState[]> {
    const [command] = await this.detect();
    if (command === 'docker-compose') {
      return this.legacyPs();
    }

    const result = await this.compose(['ps', '--all', '--format', 'json']);
    if (result.exitCode !== 0) {
      throw failure(result);
    }
    return parsePsOutput(result.stdout);
  }

  /**
   * Runs a command inside a service container without a TTY.
   */
  async exec(service: string, args: readonly string[]): Promise<CommandResult> {
    return this.compose(['exec', '-T', service, ...args]);
  }

  /**
   * Follows service logs on the operator's terminal.
   */
  async logs(service?: string): Promise<CommandResult> {
    return this.compose(['logs', '-f', ...(service ? [service] : [])], true);
  }

  /**
   * Creates a bridge network; an existing network counts as success.
   */
  async createNetwork(name: string): Promise<NetworkCreateResult> {
    const result = await this.runner.run('docker', ['network', 'create', name]);
    if (result.exitCode === 0) {
      return 'created';
    }
    if (/already exists/i.test(result.stderr)) {
      return 'existing';
    }
    throw failure(result);
  }

  async listNetworks(prefix: string): Promise<string[]> {
    const result = await runOrThrow(this.runner, 'docker', [
      'network',
      'ls',
      '--filter',
      `name=${prefix}`,
      '--format',
      '{{.Name}}',
    ]);
    return splitLines(result.stdout);
  }

  async listVolumes(prefix: string): Promise<string[]> {
    const result = await runOrThrow(this.runner, 'docker', [
      'volume',
      'ls',
      '--filter',
      `name=${prefix}`,
      '--format',
      '{{.Name}}',
    ]);
    return splitLines(result.stdout);
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  /**
   * docker-compose v1 has no JSON output and no health column: services
   * passing the running filter are `running`, the rest `not running`.
   */
  private async legacyPs(): Promise<ComposeServiceState[]> {
    const all = await this.compose(['ps', '--services']);
    if (all.exitCode !== 0) {
      throw failure(all);
    }
    const running = await this.compose(['ps', '--services', '--filter', 'status=running']);
    if (running.exitCode !== 0) {
      throw failure(running);
    }

    const up = new Set(splitLines(running.stdout));
    return splitLines(all.stdout).map((service) => ({
      service,
      state: up.has(service) ? 'running' : 'not running',
      health: '',
      status: '',
    }));
  }

  private async compose(args: readonly string[], inherit = false): Promise<CommandResult> {
    const [command, ...prefix] = await this.detect();
    return this.runner.run(command, [...prefix, '-f', this.options.composeFile, ...args], {
      cwd: this.options.projectDir,
      inherit,
    });
  }
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parses `compose ps --format json`, which is a JSON array on older Compose v2
 * releases and newline-delimited JSON on newer ones.
 */
export function parsePsOutput(stdout: string): ComposeServiceState[] {
  const text = stdout.trim();
  if (!text) {
    return [];
  }

  const raw: unknown[] = text.startsWith('[')
    ? z.array(z.unknown()).parse(JSON.parse(text))
    : splitLines(text).map((line): unknown => JSON.parse(line));

  return raw.map((entry) => {
    const parsed = psEntrySchema.parse(entry);
    return {
      service: parsed.Service,
      state: parsed.State.toLowerCase(),
      health: parsed.Health.toLowerCase(),
      status: parsed.Status,
    };
  });
}

/**
 * A container counts as up when it is running and not failing its healthcheck.
 */
export function isServiceUp(state: ComposeServiceState): boolean {
  return state.state === 'running' && (state.health === '' || state.health === 'healthy');
}

function failure(result: CommandResult): CommandError {
  return new CommandError(result.command, result.exitCode, result.stderr);
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}
