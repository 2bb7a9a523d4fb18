/**
 * Health Verifier
 *
 * Checks the running stack once and reports which targets are healthy.
 */

import { CORE_SERVICES } from '../config/constants.js';
import { TypedEventEmitter } from '../core/events.js';
import { getErrorMessage } from '../core/errors.js';
import { isUnsetValue, type EnvironmentProfile } from '../environment/index.js';
import type { ComposeClient, ComposeServiceState } from '../infrastructure/compose/index.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import type { HealthReport, HealthTargetResult, SetupEventMap } from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

const logger = getComponentLogger('HealthVerifier');

const CACHE_SERVICE = 'redis';
const DATASTORE_SERVICE = 'timescaledb';
const DEFAULT_DATASTORE_USER = 'postgres';

// =============================================================================
// SERVICE CHECKS
// =============================================================================

export interface CheckOutcome {
  healthy: boolean;
  detail?: string;
}

/**
 * Shared per-run state handed to every check.
 */
export interface HealthCheckContext {
  /** Container states, read once per verification run */
  services(): Promise<ComposeServiceState[]>;
}

type HealthCheckFn = (context: HealthCheckContext) => Promise<CheckOutcome>;

/**
 * A follow-up check of a service whose container is up. A failing one marks
 * its service unhealthy; it is never counted on its own.
 */
export interface ServiceCheck {
  name: string;
  run: () => Promise<CheckOutcome>;
}

export type HttpCheck = (url: string, timeoutMs: number) => Promise<{ ok: boolean; status: number }>;

export const fetchStatus: HttpCheck = async (url, timeoutMs) => {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  return { ok: response.ok, status: response.status };
};

/**
 * Role pg_isready connects as. DB__USER from the env file, else postgres.
 */
export function datastoreUser(profile: EnvironmentProfile | null): string {
  const user = profile?.['DB__USER'];
  return user === undefined || isUnsetValue(user) ? DEFAULT_DATASTORE_USER : user;
}

export function healthUrls(domainSuffix: string): string[] {
  return [`http://${domainSuffix}/health`, `http://status.${domainSuffix}`];
}

// =============================================================================
// HEALTH VERIFIER
// =============================================================================

export interface DefaultCheckDeps {
  compose: Pick<ComposeClient, 'ps' | 'exec'>;
  domainSuffix: string;
  timeoutMs: number;
  /** Parsed .env of the stack */
  environment: EnvironmentProfile | null;
  httpCheck?: HttpCheck;
}

export class HealthVerifier extends TypedEventEmitter<Pick<SetupEventMap, 'health:checked'>> {
  private checks: Array<{ name: string; fn: HealthCheckFn }> = [];
  private servicesSource: (() => Promise<ComposeServiceState[]>) | null = null;

  // ===========================================================================
  // REGISTRATION
  // ===========================================================================

  registerCheck(name: string, fn: HealthCheckFn): void {
    this.checks.push({ name, fn });
    logger.debug('Registered health check', { target: name });
  }

  /**
   * Registers one check per service: the container must be running and not
   * unhealthy, then every follow-up check of the service must pass.
   */
  registerServiceCheck(service: string, checks: readonly ServiceCheck[] = []): void {
    this.registerCheck(service, async (context) => {
      const state = (await context.services()).find((candidate) => candidate.service === service);
      if (!state) {
        return { healthy: false, detail: 'no container' };
      }
      const detail = state.health ? `${state.state} (${state.health})` : state.state;
      if (state.state !== 'running' || state.health === 'unhealthy') {
        return { healthy: false, detail };
      }

      for (const check of checks) {
        const outcome = await runServiceCheck(check);
        if (!outcome.healthy) {
          return { healthy: false, detail: `${check.name}: ${outcome.detail ?? 'failed'}` };
        }
      }
      return { healthy: true, detail };
    });
  }

  /**
   * Registers the core services of the stack. The proxy carries the HTTP
   * targets, the datastore `pg_isready` and the cache `redis-cli ping`.
   */
  registerDefaultChecks(deps: DefaultCheckDeps): void {
    const httpCheck = deps.httpCheck ?? fetchStatus;
    this.servicesSource = () => deps.compose.ps();

    const serviceChecks: Record<string, ServiceCheck[]> = {
      nginx: healthUrls(deps.domainSuffix).map((url) => ({
        name: url,
        run: async () => {
          const response = await httpCheck(url, deps.timeoutMs);
          return { healthy: response.ok, detail: `HTTP ${response.status}` };
        },
      })),
      [DATASTORE_SERVICE]: [
        {
          name: 'pg_isready',
          run: async () => {
            const result = await deps.compose.exec(DATASTORE_SERVICE, [
              'pg_isready',
              '-U',
              datastoreUser(deps.environment),
            ]);
            return { healthy: result.exitCode === 0, detail: result.stdout.trim() || result.stderr.trim() };
          },
        },
      ],
      [CACHE_SERVICE]: [
        {
          name: 'redis-cli ping',
          run: async () => {
            const result = await deps.compose.exec(CACHE_SERVICE, ['redis-cli', 'ping']);
            const reply = result.stdout.trim();
            return { healthy: result.exitCode === 0 && reply === 'PONG', detail: reply || result.stderr.trim() };
          },
        },
      ],
    };

    for (const service of CORE_SERVICES) {
      this.registerServiceCheck(service, serviceChecks[service] ?? []);
    }
  }

  // ===========================================================================
  // VERIFICATION
  // ===========================================================================

  /**
   * Runs every registered check in order. A throwing check counts as
   * unhealthy with its error as detail.
   */
  async verify(): Promise<HealthReport> {
    let snapshot: Promise<ComposeServiceState[]> | null = null;
    const source = this.servicesSource;
    const context: HealthCheckContext = {
      services: () => {
        snapshot ??= source ? source() : Promise.resolve([]);
        return snapshot;
      },
    };

    const results: HealthTargetResult[] = [];
    for (const check of this.checks) {
      const result = await this.runCheck(check, context);
      results.push(result);
      this.emit('health:checked', result);
    }

    const healthyCount = results.filter((result) => result.healthy).length;
    const report: HealthReport = {
      results,
      healthyCount,
      totalCount: results.length,
      checkedAt: Date.now(),
    };

    if (healthyCount < results.length) {
      logger.warn('Some health checks failed', { healthy: healthyCount, total: results.length });
    } else {
      logger.info('All health checks passed', { total: results.length });
    }
    return report;
  }

  private async runCheck(
    check: { name: string; fn: HealthCheckFn },
    context: HealthCheckContext
  ): Promise<HealthTargetResult> {
    const start = Date.now();
    try {
      const outcome = await check.fn(context);
      return {
        name: check.name,
        healthy: outcome.healthy,
        latencyMs: Date.now() - start,
        detail: outcome.detail ?? null,
      };
    } catch (error) {
      return {
        name: check.name,
        healthy: false,
        latencyMs: Date.now() - start,
        detail: getErrorMessage(error),
      };
    }
  }
}

async function runServiceCheck(check: ServiceCheck): Promise<CheckOutcome> {
  try {
    return await check.run();
  } catch (error) {
    return { healthy: false, detail: getErrorMessage(error) };
  }
}
