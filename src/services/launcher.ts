/**
 * Service Launcher
 *
 * Starts a service profile through compose and waits for its containers to
 * come up.
 */

import { CORE_SERVICES, PROFILE_PLANS } from '../config/constants.js';
import { getErrorMessage } from '../core/errors.js';
import type { ServiceProfile } from '../core/types.js';
import { isServiceUp, type ComposeClient, type ComposeServiceState } from '../infrastructure/compose/index.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import type { CommandResult } from '../infrastructure/shell/index.js';
import { formatTable } from '../utils/formatting.js';
import { pollUntil, sleep, type Sleeper } from '../utils/polling.js';

const logger = getComponentLogger('ServiceLauncher');

// =============================================================================
// TYPES
// =============================================================================

export enum LaunchState {
  NOT_STARTED = 'NOT_STARTED',
  STARTING = 'STARTING',
  STARTED = 'STARTED',
  START_FAILED = 'START_FAILED',
}

export interface LaunchTiming {
  readyTimeoutMs: number;
  readyPollMs: number;
  graceMs: number;
}

export interface LaunchResult {
  profile: ServiceProfile;
  state: LaunchState.STARTED | LaunchState.START_FAILED;
  services: ComposeServiceState[];
  /** Expected services that were not up when polling stopped */
  notReady: string[];
  reason: string | null;
}

export type LauncherCompose = Pick<ComposeClient, 'up' | 'ps' | 'logs'>;

// =============================================================================
// LAUNCHER
// =============================================================================

export class ServiceLauncher {
  private state: LaunchState = LaunchState.NOT_STARTED;
  private readonly sleeper: Sleeper;

  constructor(
    private readonly compose: LauncherCompose,
    private readonly timing: LaunchTiming,
    options: { sleeper?: Sleeper } = {}
  ) {
    this.sleeper = options.sleeper ?? sleep;
  }

  getState(): LaunchState {
    return this.state;
  }

  /**
   * Starts the profile and polls until every expected service is running,
   * then waits out the grace period. Never throws for a failed start.
   */
  async launch(profile: ServiceProfile): Promise<LaunchResult> {
    const plan = PROFILE_PLANS[profile];
    const expected = expectedServices(profile);
    this.state = LaunchState.STARTING;

    logger.info('Starting services', {
      profile,
      services: plan.services,
      composeProfiles: plan.composeProfiles,
    });

    let up: CommandResult;
    try {
      up = await this.compose.up(plan.services, plan.composeProfiles);
    } catch (error) {
      return this.fail(profile, [], expected, getErrorMessage(error));
    }
    if (up.exitCode !== 0) {
      return this.fail(profile, await this.snapshot(), expected, up.stderr.trim() || `${up.command} failed`);
    }

    const poll = await pollUntil(
      () => this.snapshot(),
      (states) => pendingServices(expected, states).length === 0,
      { timeoutMs: this.timing.readyTimeoutMs, intervalMs: this.timing.readyPollMs, sleeper: this.sleeper }
    );

    if (!poll.met) {
      return this.fail(
        profile,
        poll.last,
        pendingServices(expected, poll.last),
        `Services not running after ${Math.round(this.timing.readyTimeoutMs / 1000)}s`
      );
    }

    if (this.timing.graceMs > 0) {
      logger.debug('Waiting for services to settle', { graceMs: this.timing.graceMs });
      await this.sleeper(this.timing.graceMs);
    }

    this.state = LaunchState.STARTED;
    logger.info('Services started', { profile, attempts: poll.attempts });
    return { profile, state: LaunchState.STARTED, services: poll.last, notReady: [], reason: null };
  }

  async status(): Promise<ComposeServiceState[]> {
    return this.compose.ps();
  }

  async logs(service?: string): Promise<number | null> {
    const result = await this.compose.logs(service);
    return result.exitCode;
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  private async snapshot(): Promise<ComposeServiceState[]> {
    try {
      return await this.compose.ps();
    } catch (error) {
      logger.warn('Cannot read service status', { error: getErrorMessage(error) });
      return [];
    }
  }

  private fail(
    profile: ServiceProfile,
    services: ComposeServiceState[],
    notReady: string[],
    reason: string
  ): LaunchResult {
    this.state = LaunchState.START_FAILED;
    logger.warn('Service start failed', { profile, notReady, reason });
    return { profile, state: LaunchState.START_FAILED, services, notReady, reason };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Services that must be running for a launch to count as started. Feature
 * profiles start everything they enable; only the core stack is awaited.
 */
export function expectedServices(profile: ServiceProfile): string[] {
  const plan = PROFILE_PLANS[profile];
  return [...(plan.services.length > 0 ? plan.services : CORE_SERVICES)];
}

export function pendingServices(expected: readonly string[], states: readonly ComposeServiceState[]): string[] {
  return expected.filter((service) => {
    const state = states.find((candidate) => candidate.service === service);
    return !state || !isServiceUp(state);
  });
}

export function renderStatusTable(states: readonly ComposeServiceState[]): string {
  if (states.length === 0) {
    return '(no containers)';
  }
  return formatTable(
    ['SERVICE', 'STATE', 'HEALTH', 'STATUS'],
    states.map((state) => [state.service, state.state, state.health || '-', state.status])
  );
}
