/**
 * CLI Tests
 *
 * Drives the command trees in process with faked collaborators.
 */

import fs from 'fs';
import path from 'path';
import { CommanderError } from 'commander';
import { buildDomainsProgram } from '../../src/cli/domains-program.js';
import { NonInteractivePrompter, createPrompter, InquirerPrompter } from '../../src/cli/prompts.js';
import { buildSetupProgram } from '../../src/cli/setup-program.js';
import type { CliDependencies } from '../../src/cli/shared.js';
import { ServiceProfile } from '../../src/core/types.js';
import { FakeRunner, dockerStack, makeTempDir, removeTempDir } from '../helpers/fake-runner.js';
import { fakeCollaborators, hostsPath, writeProject } from '../helpers/project.js';

interface Harness {
  deps: CliDependencies;
  lines: string[];
  exitCodes: number[];
}

function harness(dir: string, runner?: FakeRunner): Harness {
  const lines: string[] = [];
  const exitCodes: number[] = [];
  return {
    lines,
    exitCodes,
    deps: {
      prompter: new NonInteractivePrompter(),
      context: fakeCollaborators(dir, { runner }),
      write: (line) => lines.push(line),
      color: false,
      setExitCode: (code) => exitCodes.push(code),
    },
  };
}

describe('CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    writeProject(dir);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  // ---------------------------------------------------------------------------
  // tradedeck-setup
  // ---------------------------------------------------------------------------
  describe('tradedeck-setup', () => {
    const argv = (...args: string[]) => ['node', 'tradedeck-setup', '--project-dir', dir, ...args];

    it('should run every stage by default and print the completion guide', async () => {
      const { deps, lines, exitCodes } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('--profile', 'basic', '--no-certs', '--no-firewall'));

      expect(exitCodes).toEqual([0]);
      expect(lines).toContain('✅ Completed');
      expect(lines).toContain('🎉 Environment ready');
    });

    it('should run a single stage', async () => {
      const { deps, lines, exitCodes } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('migrate-config'));

      expect(exitCodes).toEqual([0]);
      expect(lines.some((line) => line.startsWith('✅ Unified configuration applied'))).toBe(true);
      expect(fs.existsSync(path.join(dir, 'tradedeck.config.yaml'))).toBe(true);
    });

    it('should exit 1 when a single stage fails', async () => {
      fs.rmSync(path.join(dir, 'tradedeck.config.next.yaml'));
      const { deps, exitCodes } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('migrate-config'));

      expect(exitCodes).toEqual([1]);
    });

    it('should reject an unknown command with usage', async () => {
      const { deps } = harness(dir);
      const errors: string[] = [];
      const program = buildSetupProgram(deps)
        .exitOverride()
        .configureOutput({ writeErr: (text) => errors.push(text), writeOut: () => {} });

      const failure = await program.parseAsync(argv('frobnicate')).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(CommanderError);
      expect(failure instanceof CommanderError && failure.exitCode).toBe(1);
      expect(errors[0]).toBe("error: unknown command 'frobnicate'\n");
      expect(errors.join('')).toContain('Usage: tradedeck-setup');
    });

    it('should reject an unknown profile', async () => {
      const { deps } = harness(dir);
      const program = buildSetupProgram(deps)
        .exitOverride()
        .configureOutput({ writeErr: () => {}, writeOut: () => {} });

      await expect(program.parseAsync(argv('--profile', 'huge', 'start'))).rejects.toBeInstanceOf(CommanderError);
    });

    it('should print container, network and volume status', async () => {
      const { deps, lines } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('status'));

      expect(lines[0]?.split('\n')[0]).toBe('SERVICE      STATE    HEALTH   STATUS');
      expect(lines).toContain('Networks: tradedeck-backend');
      expect(lines).toContain('Volumes:  tradedeck-backend');
    });

    it('should fail the ssl command without openssl', async () => {
      const { deps, lines, exitCodes } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('ssl'));

      expect(exitCodes).toEqual([1]);
      expect(lines[0]).toBe('❌ Required tool not found: openssl');
    });

    it('should pass the logs exit code through', async () => {
      const runner = new FakeRunner(['docker']).on('docker', (args) =>
        args.includes('logs') ? { exitCode: 130 } : dockerStack()(args, {})
      );
      const { deps, exitCodes } = harness(dir, runner);

      await buildSetupProgram(deps).parseAsync(argv('logs', 'trading-bot'));

      expect(exitCodes).toEqual([1]);
      expect(runner.commandLines()).toContain(
        `docker compose -f ${path.join(dir, 'docker-compose-enhanced.yml')} logs -f trading-bot`
      );
    });

    it('should write the monitoring configuration', async () => {
      const { deps, lines } = harness(dir);

      await buildSetupProgram(deps).parseAsync(argv('monitoring'));

      expect(fs.existsSync(path.join(dir, 'monitoring', 'prometheus', 'prometheus.yml'))).toBe(true);
      expect(lines).toEqual([
        `✅ Prometheus configuration written to ${path.join('monitoring', 'prometheus', 'prometheus.yml')}`,
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // tradedeck-domains
  // ---------------------------------------------------------------------------
  describe('tradedeck-domains', () => {
    const argv = (...args: string[]) => ['node', 'tradedeck-domains', '--project-dir', dir, ...args];

    it('should write the managed block by default', async () => {
      const { deps, lines, exitCodes } = harness(dir);

      await buildDomainsProgram(deps).parseAsync(argv());

      expect(exitCodes).toEqual([0]);
      expect(lines[0]).toBe(`✅ 9 domains written to ${hostsPath(dir)}`);
      expect(fs.readFileSync(hostsPath(dir), 'utf8')).toContain('# BEGIN tradedeck local domains');
    });

    it('should remove the block again', async () => {
      const { deps, lines } = harness(dir);
      await buildDomainsProgram(deps).parseAsync(argv('setup'));

      await buildDomainsProgram(deps).parseAsync(argv('remove'));

      expect(lines[lines.length - 1]).toBe(`✅ 9 entries removed from ${hostsPath(dir)}`);
      expect(fs.readFileSync(hostsPath(dir), 'utf8')).toBe('127.0.0.1 localhost\n');
    });

    it('should list missing domains in check', async () => {
      const { deps, lines } = harness(dir);

      await buildDomainsProgram(deps).parseAsync(argv('check'));

      expect(lines).toContain('❌ tradedeck.local is missing');
      expect(lines.filter((line) => line.endsWith(' is missing'))).toHaveLength(9);
    });

    it('should summarise resolution in verify', async () => {
      const { deps, lines } = harness(dir);

      await buildDomainsProgram(deps).parseAsync(argv('verify'));

      expect(lines[0]).toBe('✅ tradedeck.local -> 127.0.0.1');
      expect(lines[lines.length - 1]).toBe('9/9 domains resolve to 127.0.0.1');
    });
  });

  // ---------------------------------------------------------------------------
  // Prompters
  // ---------------------------------------------------------------------------
  describe('prompters', () => {
    it('should answer with defaults when non-interactive', async () => {
      const prompter = new NonInteractivePrompter();

      expect(await prompter.confirm('Replace?', false)).toBe(false);
      expect(await prompter.selectProfile('Profile?', ServiceProfile.BASIC)).toBe(ServiceProfile.BASIC);
    });

    it('should never prompt with --yes or without a terminal', () => {
      expect(createPrompter({ yes: true, isTTY: true })).toBeInstanceOf(NonInteractivePrompter);
      expect(createPrompter({ isTTY: false })).toBeInstanceOf(NonInteractivePrompter);
      expect(createPrompter({ isTTY: true })).toBeInstanceOf(InquirerPrompter);
    });

    it('should open the editor on the operator terminal', async () => {
      const runner = new FakeRunner(['code']);

      await new InquirerPrompter(runner, 'code --wait').editFile('/srv/tradedeck/.env');

      expect(runner.calls).toEqual([
        { command: 'code', args: ['--wait', '/srv/tradedeck/.env'], options: { inherit: true } },
      ]);
    });
  });
});
