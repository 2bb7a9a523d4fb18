/**
 * Service Launcher Tests
 */

import { ComposeClient } from '../../src/infrastructure/compose/index.js';
import { LaunchState, ServiceLauncher, expectedServices, pendingServices, renderStatusTable } from '../../src/services/launcher.js';
import { ServiceProfile } from '../../src/core/types.js';
import { pollUntil } from '../../src/utils/polling.js';
import { FakeRunner, dockerStack, runningStack } from '../helpers/fake-runner.js';

const timing = { readyTimeoutMs: 60_000, readyPollMs: 2_000, graceMs: 10_000 };

function launcherFor(runner: FakeRunner, sleeps: number[] = []): ServiceLauncher {
  const compose = new ComposeClient(runner, {
    composeFile: '/srv/tradedeck/docker-compose.yml',
    projectDir: '/srv/tradedeck',
    command: 'auto',
  });
  return new ServiceLauncher(compose, timing, {
    sleeper: async (ms) => {
      sleeps.push(ms);
    },
  });
}

describe('Service Launcher', () => {
  describe('pollUntil', () => {
    it('should stop after the interval budget is spent', async () => {
      let calls = 0;
      const result = await pollUntil(
        async () => ++calls,
        () => false,
        { timeoutMs: 10, intervalMs: 5, sleeper: async () => {} }
      );

      expect(result).toEqual({ met: false, last: 3, attempts: 3 });
    });

    it('should return as soon as the condition holds', async () => {
      let calls = 0;
      const result = await pollUntil(
        async () => ++calls,
        (value) => value === 2,
        { timeoutMs: 1_000, intervalMs: 5, sleeper: async () => {} }
      );

      expect(result).toEqual({ met: true, last: 2, attempts: 2 });
    });
  });

  describe('expected services', () => {
    it('should await the core stack for every profile', () => {
      expect(expectedServices(ServiceProfile.BASIC)).toEqual(['nginx', 'timescaledb', 'redis', 'trading-bot']);
      expect(expectedServices(ServiceProfile.FULL)).toEqual(['nginx', 'timescaledb', 'redis', 'trading-bot']);
    });

    it('should list services that are absent or not up', () => {
      const states = [
        { service: 'nginx', state: 'running', health: '', status: '' },
        { service: 'redis', state: 'running', health: 'starting', status: '' },
      ];

      expect(pendingServices(['nginx', 'redis', 'timescaledb'], states)).toEqual(['redis', 'timescaledb']);
    });
  });

  describe('launch', () => {
    it('should start the basic profile and wait out the grace period', async () => {
      const sleeps: number[] = [];
      const runner = new FakeRunner().on('docker', dockerStack());

      const result = await launcherFor(runner, sleeps).launch(ServiceProfile.BASIC);

      expect(result.state).toBe(LaunchState.STARTED);
      expect(result.notReady).toEqual([]);
      expect(runner.commandLines()).toContain(
        'docker compose -f /srv/tradedeck/docker-compose.yml up -d nginx timescaledb redis trading-bot'
      );
      expect(sleeps).toEqual([10_000]);
    });

    it('should enable compose profiles for the full stack', async () => {
      const runner = new FakeRunner().on('docker', dockerStack());

      await launcherFor(runner).launch(ServiceProfile.FULL);

      expect(runner.commandLines()).toContain(
        'docker compose -f /srv/tradedeck/docker-compose.yml --profile dev --profile monitoring --profile tools --profile analysis up -d'
      );
    });

    it('should poll until containers come up', async () => {
      const sleeps: number[] = [];
      const starting = runningStack().map((container) =>
        container.Service === 'timescaledb' ? { ...container, Health: 'starting' } : container
      );
      const runner = new FakeRunner().on('docker', dockerStack({ psSequence: [[], starting, runningStack()] }));

      const result = await launcherFor(runner, sleeps).launch(ServiceProfile.BASIC);

      expect(result.state).toBe(LaunchState.STARTED);
      expect(sleeps).toEqual([2_000, 2_000, 10_000]);
    });

    it('should report a failed start without throwing', async () => {
      const runner = new FakeRunner().on('docker', dockerStack({ upExitCode: 1, psSequence: [[]] }));

      const result = await launcherFor(runner).launch(ServiceProfile.BASIC);

      expect(result.state).toBe(LaunchState.START_FAILED);
      expect(result.reason).toBe('pull access denied');
      expect(result.notReady).toEqual(['nginx', 'timescaledb', 'redis', 'trading-bot']);
    });

    it('should give up after the readiness timeout', async () => {
      const sleeps: number[] = [];
      const runner = new FakeRunner().on('docker', dockerStack({ psSequence: [runningStack(['nginx', 'redis'])] }));

      const result = await launcherFor(runner, sleeps).launch(ServiceProfile.BASIC);

      expect(result.state).toBe(LaunchState.START_FAILED);
      expect(result.notReady).toEqual(['timescaledb', 'trading-bot']);
      expect(result.reason).toBe('Services not running after 60s');
      expect(sleeps).toHaveLength(30);
    });
  });

  describe('renderStatusTable', () => {
    it('should align the columns', () => {
      const table = renderStatusTable([
        { service: 'nginx', state: 'running', health: 'healthy', status: 'Up 1 minute' },
        { service: 'trading-bot', state: 'exited', health: '', status: 'Exited (1)' },
      ]);

      expect(table.split('\n')).toEqual([
        'SERVICE      STATE    HEALTH   STATUS',
        'nginx        running  healthy  Up 1 minute',
        'trading-bot  exited   -        Exited (1)',
      ]);
    });

    it('should say so when nothing runs', () => {
      expect(renderStatusTable([])).toBe('(no containers)');
    });
  });
});
