/**
 * tradedeck-setup command tree.
 */

import path from 'path';
import { Command, Option } from 'commander';
import { CertificateProvisioner } from '../certificates/index.js';
import { NETWORK_PREFIX } from '../config/constants.js';
import { SERVICE_PROFILES, isServiceProfile } from '../core/types.js';
import { SetupOrchestrator } from '../orchestrator/setup.js';
import { Reporter, printCompletionGuide } from '../orchestrator/report.js';
import type { RunSummary, StageResult } from '../orchestrator/types.js';
import { writePrometheusConfig } from '../proxy/index.js';
import { ServiceLauncher, renderStatusTable } from '../services/launcher.js';
import { createRuntime, reportFatal, type CliDependencies, type CliRuntime, type GlobalOptions } from './shared.js';

interface SetupProgramOptions extends GlobalOptions {
  profile?: string;
  certs?: boolean;
  firewall?: boolean;
  autoRollback?: boolean;
}

export function buildSetupProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('tradedeck-setup')
    .description('Provision the tradedeck trading stack on this machine')
    .option('--project-dir <dir>', 'project root holding docker-compose.yml and config/')
    .option('-y, --yes', 'never prompt; take the default answer everywhere')
    .addOption(new Option('--profile <name>', 'service profile to start').choices(SERVICE_PROFILES))
    .option('--certs', 'generate development TLS certificates')
    .option('--no-certs', 'skip certificate generation')
    .option('--firewall', 'apply ufw firewall rules (Linux)')
    .option('--no-firewall', 'leave the firewall alone')
    .option('--auto-rollback', 'restore the previous configuration when the new one is invalid')
    .option('--no-color', 'plain output')
    .showHelpAfterError();

  const runtime = (): CliRuntime => createRuntime(program.opts<SetupProgramOptions>(), deps);

  const orchestrate = (run: CliRuntime): { orchestrator: SetupOrchestrator; reporter: Reporter } => {
    const options = program.opts<SetupProgramOptions>();
    const orchestrator = new SetupOrchestrator(run.context, {
      profile: options.profile && isServiceProfile(options.profile) ? options.profile : undefined,
      certificates: options.certs,
      firewall: options.firewall,
      autoRollback: options.autoRollback,
    });
    const reporter = new Reporter(run.write, run.color);
    reporter.attach(orchestrator);
    return { orchestrator, reporter };
  };

  const single = async (stage: (orchestrator: SetupOrchestrator) => Promise<StageResult>): Promise<void> => {
    const run = runtime();
    const { orchestrator, reporter } = orchestrate(run);
    const summary = await orchestrator.runSingle(() => stage(orchestrator));
    reporter.summary(summary);
    run.setExitCode(summary.exitCode);
  };

  program
    .command('setup', { isDefault: true })
    .description('run every provisioning stage (default)')
    .action(async (_options: object, command: Command) => {
      if (command.args.length > 0) {
        program.error(`error: unknown command '${command.args[0]}'`);
      }
      const run = runtime();
      const { orchestrator, reporter } = orchestrate(run);
      reporter.banner('TRADEDECK ENVIRONMENT SETUP');

      const summary: RunSummary = await orchestrator.run();
      reporter.summary(summary);
      if (summary.exitCode === 0) {
        printCompletionGuide(run.config.domainSuffix, run.config.paths.composeFile, run.write);
      }
      run.setExitCode(summary.exitCode);
    });

  program
    .command('migrate-config')
    .description('back up the active configuration and install the staged one')
    .action(() => single((orchestrator) => orchestrator.migrateConfiguration()));

  program
    .command('setup-domains')
    .description('hosts table, proxy fragments, certificates and firewall')
    .action(() => single((orchestrator) => orchestrator.setupDomains()));

  program
    .command('start')
    .description('start the services of a profile and wait until they run')
    .action(() => single((orchestrator) => orchestrator.launchServices()));

  program
    .command('verify')
    .description('check the running stack')
    .action(() => single((orchestrator) => orchestrator.verifyHealth()));

  program
    .command('status')
    .description('show containers, networks and volumes')
    .action(async () => {
      const run = runtime();
      const { compose, config } = run.context;
      const launcher = new ServiceLauncher(compose, config.timing);

      run.write(renderStatusTable(await launcher.status()));
      const networks = await compose.listNetworks(NETWORK_PREFIX);
      const volumes = await compose.listVolumes(NETWORK_PREFIX);
      run.write('');
      run.write(`Networks: ${networks.length > 0 ? networks.join(', ') : '(none)'}`);
      run.write(`Volumes:  ${volumes.length > 0 ? volumes.join(', ') : '(none)'}`);
    });

  program
    .command('logs')
    .description('follow service logs')
    .argument('[service]', 'a single service')
    .action(async (service: string | undefined) => {
      const run = runtime();
      const launcher = new ServiceLauncher(run.context.compose, run.config.timing);
      const exitCode = await launcher.logs(service);
      run.setExitCode(exitCode === 0 ? 0 : 1);
    });

  program
    .command('ssl')
    .description('generate the development certificate authority and server certificate')
    .option('--force', 'regenerate existing certificates')
    .action(async (options: { force?: boolean }) => {
      const run = runtime();
      const { config, runner } = run.context;
      try {
        const result = await new CertificateProvisioner(runner, {
          certDir: config.paths.certDir,
          domainSuffix: config.domainSuffix,
          keyBits: config.certificates.keyBits,
          force: options.force,
        }).provision();

        const { inspection } = result;
        run.write(`✅ Certificate authority ${result.authority}: ${path.relative(config.projectDir, result.paths.caCert)}`);
        run.write(`✅ Server certificate ${result.leaf}: ${path.relative(config.projectDir, result.paths.fullchain)}`);
        run.write(`   subject:  ${inspection.subject}`);
        run.write(`   names:    ${inspection.subjectAltNames.join(', ')}`);
        run.write(`   expires:  ${inspection.validTo.toISOString()}`);
        if (!inspection.signedByAuthority) {
          run.write('⚠️  Server certificate does not verify against the authority; re-run with --force');
        }
        run.write(`ℹ️  Import ${path.relative(config.projectDir, result.paths.caCert)} into your browser's trusted roots`);
        run.setExitCode(0);
      } catch (error) {
        reportFatal(error, run.write);
        run.setExitCode(1);
      }
    });

  program
    .command('monitoring')
    .description('write the Prometheus scrape configuration')
    .action(async () => {
      const run = runtime();
      const written = await writePrometheusConfig(run.config.paths.prometheusConfig);
      run.write(`✅ Prometheus configuration written to ${path.relative(run.config.projectDir, written)}`);
    });

  return program;
}
