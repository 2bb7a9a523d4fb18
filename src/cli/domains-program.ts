/**
 * tradedeck-domains command tree: manages the marker block of local domains
 * in the hosts table.
 */

import { Command } from 'commander';
import { getServiceUrls } from '../config/index.js';
import { LOOPBACK_ADDRESS } from '../config/constants.js';
import { createHostsManager } from '../orchestrator/context.js';
import type { HostsTableManager } from '../hosts/index.js';
import { createRuntime, reportFatal, type CliDependencies, type CliRuntime, type GlobalOptions } from './shared.js';

export function buildDomainsProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('tradedeck-domains')
    .description('Map the tradedeck domains to the loopback address')
    .option('--project-dir <dir>', 'project root')
    .option('--no-color', 'plain output')
    .showHelpAfterError();

  /**
   * Runs a hosts command; privilege and I/O failures end it with exit code 1.
   */
  const withHosts = async (body: (hosts: HostsTableManager, run: CliRuntime) => Promise<void>): Promise<void> => {
    const run = createRuntime({ ...program.opts<GlobalOptions>(), yes: true }, deps);
    try {
      await body(createHostsManager(run.context), run);
      run.setExitCode(0);
    } catch (error) {
      reportFatal(error, run.write);
      run.setExitCode(1);
    }
  };

  program
    .command('setup', { isDefault: true })
    .description('write the managed block (default)')
    .action(async (_options: object, command: Command) => {
      if (command.args.length > 0) {
        program.error(`error: unknown command '${command.args[0]}'`);
      }
      await withHosts(async (hosts, run) => {
        const result = await hosts.setup();
        run.write(
          result.written
            ? `✅ ${result.domains.length} domains written to ${result.hostsPath}`
            : `✅ ${result.hostsPath} already up to date`
        );
        for (const entry of result.unmanaged) {
          run.write(`⚠️  unmanaged entry left in place: ${entry.address} ${entry.domain}`);
        }
        run.write('');
        for (const { service, url } of getServiceUrls(run.config.domainSuffix)) {
          run.write(`   ${service.padEnd(12)} ${url}`);
        }
      });
    });

  program
    .command('remove')
    .description('delete the managed block')
    .action(() =>
      withHosts(async (hosts, run) => {
        const result = await hosts.remove();
        run.write(
          result.written
            ? `✅ ${result.removed.length} entries removed from ${result.hostsPath}`
            : `ℹ️  no managed block in ${result.hostsPath}`
        );
      })
    );

  program
    .command('check')
    .description('list configured, unmanaged and missing entries')
    .action(() =>
      withHosts(async (hosts, run) => {
        const result = await hosts.check();
        run.write(`Hosts table: ${result.hostsPath}`);
        for (const entry of result.managed) {
          run.write(`✅ ${entry.address} ${entry.domain}`);
        }
        for (const entry of result.unmanaged) {
          run.write(`⚠️  ${entry.address} ${entry.domain} (outside the managed block)`);
        }
        for (const domain of result.missing) {
          run.write(`❌ ${domain} is missing`);
        }
        for (const verification of result.verification) {
          if (!verification.loopback) {
            run.write(`⚠️  ${verification.domain} does not resolve to ${LOOPBACK_ADDRESS}`);
          }
        }
      })
    );

  program
    .command('verify')
    .description('resolve every domain and report its addresses')
    .action(() =>
      withHosts(async (hosts, run) => {
        const results = await hosts.verify();
        for (const result of results) {
          const addresses = result.addresses.length > 0 ? result.addresses.join(', ') : result.error ?? 'unresolved';
          run.write(`${result.loopback ? '✅' : '❌'} ${result.domain} -> ${addresses}`);
        }
        const resolved = results.filter((result) => result.loopback).length;
        run.write(`${resolved}/${results.length} domains resolve to ${LOOPBACK_ADDRESS}`);
      })
    );

  return program;
}
