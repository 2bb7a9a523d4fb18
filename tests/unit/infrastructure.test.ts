/**
 * Infrastructure Tests
 *
 * Shell runner, compose client, directory/network provisioning and firewall.
 */

import fs from 'fs';
import path from 'path';
import { ComposeClient, parsePsOutput, isServiceUp } from '../../src/infrastructure/compose/index.js';
import { FirewallConfigurator, firewallCommands } from '../../src/infrastructure/firewall/index.js';
import { InfrastructureProvisioner, networkNames } from '../../src/infrastructure/provisioner/index.js';
import { formatCommand, processRunner, runOrThrow } from '../../src/infrastructure/shell/index.js';
import { CommandError, InfrastructureError, MissingToolError } from '../../src/core/errors.js';
import { FakeRunner, dockerStack, makeTempDir, removeTempDir } from '../helpers/fake-runner.js';

const composeOptions = {
  composeFile: '/srv/tradedeck/docker-compose.yml',
  projectDir: '/srv/tradedeck',
  command: 'auto' as const,
};

describe('Infrastructure', () => {
  // ---------------------------------------------------------------------------
  // Shell
  // ---------------------------------------------------------------------------
  describe('Shell', () => {
    it('should capture output of a child process', async () => {
      const result = await processRunner.run(process.execPath, ['-e', 'process.stdout.write("ok")']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('ok');
    });

    it('should pass input on stdin', async () => {
      const result = await processRunner.run(process.execPath, ['-e', 'process.stdin.pipe(process.stdout)'], {
        input: 'hosts content\n',
      });

      expect(result.stdout).toBe('hosts content\n');
    });

    it('should report a missing executable as a missing tool', async () => {
      await expect(processRunner.run('tradedeck-no-such-tool', [])).rejects.toBeInstanceOf(MissingToolError);
    });

    it('should throw CommandError on a non-zero exit', async () => {
      const runner = new FakeRunner().on('docker', () => ({ exitCode: 2, stderr: 'boom\n' }));

      await expect(runOrThrow(runner, 'docker', ['info'])).rejects.toBeInstanceOf(CommandError);
    });

    it('should quote arguments with spaces when formatting', () => {
      expect(formatCommand('openssl', ['-subj', '/CN=Local Root'])).toBe('openssl -subj "/CN=Local Root"');
    });
  });

  // ---------------------------------------------------------------------------
  // Compose
  // ---------------------------------------------------------------------------
  describe('ComposeClient', () => {
    it('should prefer the docker compose plugin', async () => {
      const runner = new FakeRunner(['docker', 'docker-compose']).on('docker', dockerStack());

      expect(await new ComposeClient(runner, composeOptions).detect()).toEqual(['docker', 'compose']);
    });

    it('should fall back to the standalone binary', async () => {
      const runner = new FakeRunner(['docker-compose']).on('docker', () => ({ exitCode: 1 }));

      expect(await new ComposeClient(runner, composeOptions).detect()).toEqual(['docker-compose']);
    });

    it('should read service states from docker-compose v1 without JSON output', async () => {
      const runner = new FakeRunner(['docker-compose']).on('docker-compose', (args) => {
        if (args.includes('--format')) {
          return { exitCode: 1, stderr: 'No such option: --format\n' };
        }
        return args.includes('status=running')
          ? { stdout: 'nginx\nredis\n' }
          : { stdout: 'nginx\ntimescaledb\nredis\n' };
      });

      const states = await new ComposeClient(runner, composeOptions).ps();

      expect(states).toEqual([
        { service: 'nginx', state: 'running', health: '', status: '' },
        { service: 'timescaledb', state: 'not running', health: '', status: '' },
        { service: 'redis', state: 'running', health: '', status: '' },
      ]);
      expect(runner.commandLines()).toEqual([
        'docker-compose -f /srv/tradedeck/docker-compose.yml ps --services',
        'docker-compose -f /srv/tradedeck/docker-compose.yml ps --services --filter status=running',
      ]);
    });

    it('should fail when neither is available', async () => {
      const runner = new FakeRunner([]);

      await expect(new ComposeClient(runner, composeOptions).detect()).rejects.toBeInstanceOf(MissingToolError);
    });

    it('should start profiles with the compose file from the project directory', async () => {
      const runner = new FakeRunner().on('docker', dockerStack());
      const compose = new ComposeClient(runner, composeOptions);

      await compose.up([], ['dev', 'tools']);

      const up = runner.calls[runner.calls.length - 1];
      expect(up?.args).toEqual([
        'compose',
        '-f',
        '/srv/tradedeck/docker-compose.yml',
        '--profile',
        'dev',
        '--profile',
        'tools',
        'up',
        '-d',
      ]);
      expect(up?.options.cwd).toBe('/srv/tradedeck');
    });

    it('should treat an existing network as success', async () => {
      const runner = new FakeRunner().on('docker', dockerStack({ existingNetworks: ['tradedeck-backend'] }));
      const compose = new ComposeClient(runner, composeOptions);

      expect(await compose.createNetwork('tradedeck-frontend')).toBe('created');
      expect(await compose.createNetwork('tradedeck-backend')).toBe('existing');
    });
  });

  describe('parsePsOutput', () => {
    it('should read a JSON array', () => {
      const states = parsePsOutput('[{"Service":"redis","State":"running","Health":"","Status":"Up 2 minutes"}]');

      expect(states).toEqual([{ service: 'redis', state: 'running', health: '', status: 'Up 2 minutes' }]);
    });

    it('should read newline-delimited JSON', () => {
      const states = parsePsOutput(
        '{"Service":"nginx","State":"running","Health":"healthy"}\n{"Service":"redis","State":"exited"}\n'
      );

      expect(states.map((state) => `${state.service}:${state.state}:${state.health}`)).toEqual([
        'nginx:running:healthy',
        'redis:exited:',
      ]);
    });

    it('should return nothing for empty output', () => {
      expect(parsePsOutput('  \n')).toEqual([]);
    });

    it('should count only running containers that pass their healthcheck as up', () => {
      expect(isServiceUp({ service: 'a', state: 'running', health: '', status: '' })).toBe(true);
      expect(isServiceUp({ service: 'a', state: 'running', health: 'starting', status: '' })).toBe(false);
      expect(isServiceUp({ service: 'a', state: 'exited', health: '', status: '' })).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Provisioner
  // ---------------------------------------------------------------------------
  describe('InfrastructureProvisioner', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    it('should name one network per tier', () => {
      expect(networkNames()).toEqual(['tradedeck-frontend', 'tradedeck-backend', 'tradedeck-database']);
    });

    it('should create directories and networks and tolerate existing ones', async () => {
      fs.mkdirSync(path.join(dir, 'logs'));
      const runner = new FakeRunner().on('docker', dockerStack({ existingNetworks: ['tradedeck-database'] }));
      const compose = new ComposeClient(runner, composeOptions);

      const result = await new InfrastructureProvisioner(compose, dir, ['logs', 'nginx/conf.d']).provision();

      expect(fs.statSync(path.join(dir, 'nginx', 'conf.d')).isDirectory()).toBe(true);
      expect(result.directories).toEqual(['logs', 'nginx/conf.d']);
      expect(result.networks).toEqual([
        { name: 'tradedeck-frontend', result: 'created' },
        { name: 'tradedeck-backend', result: 'created' },
        { name: 'tradedeck-database', result: 'existing' },
      ]);
    });

    it('should wrap a network failure', async () => {
      const runner = new FakeRunner().on('docker', () => ({ exitCode: 1, stderr: 'Cannot connect to the Docker daemon\n' }));
      const compose = new ComposeClient(runner, composeOptions);

      await expect(new InfrastructureProvisioner(compose, dir, []).provision()).rejects.toBeInstanceOf(
        InfrastructureError
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Firewall
  // ---------------------------------------------------------------------------
  describe('FirewallConfigurator', () => {
    it('should do nothing outside Linux', async () => {
      const runner = new FakeRunner(['ufw']);

      const result = await new FirewallConfigurator(runner, 'darwin', true).apply();

      expect(result.applied).toBe(false);
      expect(runner.calls).toHaveLength(0);
    });

    it('should report a missing ufw', async () => {
      const result = await new FirewallConfigurator(new FakeRunner([]), 'linux', true).apply();

      expect(result).toEqual({ applied: false, reason: 'ufw is not installed; configure the firewall manually' });
    });

    it('should apply every rule through sudo when not root', async () => {
      const runner = new FakeRunner(['ufw', 'sudo']);

      const result = await new FirewallConfigurator(runner, 'linux', false).apply();

      expect(result.applied).toBe(true);
      expect(runner.commandLines()).toEqual(firewallCommands().map((args) => ['sudo', 'ufw', ...args].join(' ')));
      expect(runner.commandLines()).toContain('sudo ufw deny 8888/tcp');
    });
  });
});
