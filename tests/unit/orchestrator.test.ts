/**
 * Setup Orchestrator Tests
 *
 * End-to-end runs over a temp project directory with every external command
 * answered by the fake runner.
 */

import fs from 'fs';
import path from 'path';
import { ServiceProfile, StageOutcome } from '../../src/core/types.js';
import {
  Reporter,
  SETUP_STAGES,
  SetupOrchestrator,
  StageName,
  renderCompletionGuide,
  type StageResult,
  type StageStartedEvent,
} from '../../src/orchestrator/index.js';
import { FakeRunner, makeTempDir, removeTempDir, runningStack } from '../helpers/fake-runner.js';
import { hostsPath, testContext, writeProject } from '../helpers/project.js';
import { ScriptedPrompter } from '../helpers/prompter.js';

const options = { profile: ServiceProfile.BASIC, certificates: false, firewall: false };

function outcomes(stages: StageResult[]): Record<string, StageOutcome> {
  return Object.fromEntries(stages.map((stage) => [stage.stage, stage.outcome]));
}

describe('Setup Orchestrator', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  // ---------------------------------------------------------------------------
  // Full Runs
  // ---------------------------------------------------------------------------
  describe('run', () => {
    it('should complete every stage on a healthy machine', async () => {
      writeProject(dir);
      const context = testContext(dir);

      const summary = await new SetupOrchestrator(context, options).run();

      expect(summary.stages.map((stage) => stage.stage)).toEqual(SETUP_STAGES);
      expect(summary.stages.every((stage) => stage.outcome === StageOutcome.SUCCESS)).toBe(true);
      expect(summary.exitCode).toBe(0);
      expect(summary.profile).toBe(ServiceProfile.BASIC);
      expect(summary.health?.healthyCount).toBe(4);
      expect(summary.health?.totalCount).toBe(4);
    });

    it('should leave the project provisioned', async () => {
      writeProject(dir);

      await new SetupOrchestrator(testContext(dir), options).run();

      expect(fs.readFileSync(path.join(dir, 'tradedeck.config.yaml'), 'utf8')).toBe(
        fs.readFileSync(path.join(dir, 'tradedeck.config.next.yaml'), 'utf8')
      );
      expect(fs.existsSync(path.join(dir, '.env'))).toBe(true);
      expect(fs.existsSync(path.join(dir, 'nginx', 'conf.d', 'logging.conf'))).toBe(true);
      expect(fs.statSync(path.join(dir, 'monitoring', 'grafana')).isDirectory()).toBe(true);
      expect(fs.readFileSync(hostsPath(dir), 'utf8')).toContain('127.0.0.1    grafana.tradedeck.local');
    });

    it('should still exit 0 when one service is unhealthy', async () => {
      writeProject(dir);
      const context = testContext(dir, {
        overrides: {
          httpCheck: async (url) => ({ ok: !url.includes('status.'), status: url.includes('status.') ? 502 : 200 }),
        },
      });

      const summary = await new SetupOrchestrator(context, options).run();
      const health = summary.stages.find((stage) => stage.stage === StageName.HEALTH);

      expect(health?.outcome).toBe(StageOutcome.WARNING);
      expect(health?.message).toBe('3/4 services healthy');
      expect(health?.items).toContainEqual({
        outcome: StageOutcome.WARNING,
        message: 'nginx - http://status.tradedeck.local: HTTP 502',
      });
      expect(summary.exitCode).toBe(0);
    });

    it('should halt at the first fatal stage', async () => {
      writeProject(dir);
      const context = testContext(dir, { runner: new FakeRunner([]) });

      const summary = await new SetupOrchestrator(context, options).run();

      expect(summary.stages).toHaveLength(1);
      expect(summary.stages[0]?.outcome).toBe(StageOutcome.FATAL);
      expect(summary.stages[0]?.message).toBe('Required tool not found: docker');
      expect(summary.stages[0]?.hint).toBe('Install Docker and re-run');
      expect(summary.exitCode).toBe(1);
    });

    it('should stop on an invalid configuration and list its issues', async () => {
      writeProject(dir, { staged: 'initial_capital: 0\n' });

      const summary = await new SetupOrchestrator(testContext(dir), options).run();
      const migration = summary.stages[1];

      expect(summary.stages).toHaveLength(2);
      expect(migration?.outcome).toBe(StageOutcome.FATAL);
      expect(migration?.items).toHaveLength(1);
      expect(migration?.items[0]?.message).toMatch(/^initial_capital: /);
      expect(summary.exitCode).toBe(1);
    });

    it('should continue to the health stage after a failed start', async () => {
      writeProject(dir);
      const context = testContext(dir, { stack: { upExitCode: 1, psSequence: [[]] } });

      const summary = await new SetupOrchestrator(context, options).run();

      expect(outcomes(summary.stages)).toMatchObject({
        [StageName.SERVICES]: StageOutcome.WARNING,
        [StageName.HEALTH]: StageOutcome.WARNING,
      });
      expect(summary.stages).toHaveLength(SETUP_STAGES.length);
      expect(summary.exitCode).toBe(0);
    });

    it('should warn about placeholders left in the env file', async () => {
      writeProject(dir, { template: 'DB__PASSWORD=your_password_here\nEXCHANGES__BINANCE_API_KEY=test-key\n' });

      const summary = await new SetupOrchestrator(testContext(dir), options).run();
      const environment = summary.stages.find((stage) => stage.stage === StageName.ENVIRONMENT);

      expect(environment?.outcome).toBe(StageOutcome.WARNING);
      expect(environment?.items.filter((item) => item.outcome === StageOutcome.WARNING)).toEqual([
        { outcome: StageOutcome.WARNING, message: 'DB__PASSWORD is not set' },
        { outcome: StageOutcome.WARNING, message: 'MONITORING__TELEGRAM__BOT_TOKEN is not set' },
      ]);
    });

    it('should report an unchanged hosts table on re-run', async () => {
      writeProject(dir);
      await new SetupOrchestrator(testContext(dir), options).run();

      const summary = await new SetupOrchestrator(testContext(dir), options).run();
      const domains = summary.stages.find((stage) => stage.stage === StageName.DOMAINS);

      expect(domains?.items[0]?.message).toBe(`${hostsPath(dir)} already up to date`);
      expect(summary.exitCode).toBe(0);
    });

    it('should ask for the profile when none was given', async () => {
      writeProject(dir);
      const prompter = new ScriptedPrompter([], { interactive: false, profile: ServiceProfile.DEVELOPMENT });
      const context = testContext(dir, { prompter, stack: { psSequence: [runningStack()] } });

      const summary = await new SetupOrchestrator(context, { certificates: false, firewall: false }).run();

      expect(summary.profile).toBe(ServiceProfile.DEVELOPMENT);
      expect(context.runner.commandLines()).toContain(
        `docker compose -f ${path.join(dir, 'docker-compose-enhanced.yml')} --profile dev --profile tools up -d`
      );
    });

    it('should require openssl up front when certificates are requested', async () => {
      writeProject(dir);

      const summary = await new SetupOrchestrator(testContext(dir), { ...options, certificates: true }).run();
      const prerequisites = summary.stages[0];

      expect(prerequisites?.outcome).toBe(StageOutcome.FATAL);
      expect(prerequisites?.message).toBe('Required tool not found: openssl');
    });
  });

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------
  describe('events', () => {
    it('should announce every stage with its position', async () => {
      writeProject(dir);
      const orchestrator = new SetupOrchestrator(testContext(dir), options);
      const started: StageStartedEvent[] = [];
      orchestrator.on('stage:started', (event) => started.push(event));

      await orchestrator.run();

      expect(started.map((event) => `${event.index + 1}/${event.total} ${event.stage}`)).toEqual(
        SETUP_STAGES.map((stage, index) => `${index + 1}/7 ${stage}`)
      );
    });

    it('should run a single stage on its own', async () => {
      writeProject(dir);
      const orchestrator = new SetupOrchestrator(testContext(dir), options);

      const summary = await orchestrator.runSingle(() => orchestrator.migrateConfiguration());

      expect(summary.stages.map((stage) => stage.stage)).toEqual([StageName.CONFIG_MIGRATION]);
      expect(summary.exitCode).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------
  describe('Reporter', () => {
    it('should print items before the stage line', () => {
      const lines: string[] = [];
      const reporter = new Reporter((line) => lines.push(line), false);

      reporter.stage({
        stage: StageName.ENVIRONMENT,
        outcome: StageOutcome.WARNING,
        message: 'Edit .env and set 1 required key(s)',
        items: [{ outcome: StageOutcome.WARNING, message: 'DB__PASSWORD is not set' }],
        hint: null,
        durationMs: 12,
      });

      expect(lines).toEqual(['   ⚠️  DB__PASSWORD is not set', '⚠️  Edit .env and set 1 required key(s) (12ms)']);
    });

    it('should show the hint of a fatal stage', () => {
      const lines: string[] = [];
      new Reporter((line) => lines.push(line), false).stage({
        stage: StageName.PREREQUISITES,
        outcome: StageOutcome.FATAL,
        message: 'Required tool not found: docker',
        items: [],
        hint: 'Install Docker and re-run',
        durationMs: 3,
      });

      expect(lines).toEqual(['❌ Required tool not found: docker (3ms)', '   hint: Install Docker and re-run']);
    });

    it('should list the service URLs in the completion guide', () => {
      const guide = renderCompletionGuide('tradedeck.local', '/srv/tradedeck/docker-compose-enhanced.yml');

      expect(guide).toContain(`   ${'Grafana'.padEnd('MailHog (development)'.length)}  http://grafana.tradedeck.local`);
      expect(guide).toContain('   docker compose -f docker-compose-enhanced.yml logs -f trading-bot');
    });
  });
});
