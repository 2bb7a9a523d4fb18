/**
 * Setup Orchestrator
 *
 * Runs the provisioning stages in order. A fatal stage halts the run;
 * warnings accumulate and leave the exit code at 0.
 */

import path from 'path';
import { FILES, MIN_FREE_DISK_BYTES } from '../config/constants.js';
import { CertificateProvisioner } from '../certificates/index.js';
import { TypedEventEmitter } from '../core/events.js';
import { ConfigValidationError, MissingToolError, getErrorMessage, wrapError } from '../core/errors.js';
import { ServiceProfile, StageOutcome } from '../core/types.js';
import { EnvironmentValidator, loadEnvironmentProfile, type EnvironmentProfile } from '../environment/index.js';
import { FirewallConfigurator } from '../infrastructure/firewall/index.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { InfrastructureProvisioner } from '../infrastructure/provisioner/index.js';
import { ConfigurationMigrator } from '../migration/index.js';
import { ProxyConfigGenerator, ensureBaseConfig } from '../proxy/index.js';
import { LaunchState, ServiceLauncher, renderStatusTable } from '../services/launcher.js';
import { formatBytes } from '../utils/formatting.js';
import { createHostsManager, type SetupContext } from './context.js';
import { HealthVerifier } from './health.js';
import {
  StageName,
  type HealthReport,
  type RunSummary,
  type SetupEventMap,
  type StageItem,
  type StageResult,
} from './types.js';

const logger = getComponentLogger('SetupOrchestrator');

// =============================================================================
// TYPES
// =============================================================================

export interface SetupOptions {
  /** Service profile; asked for when absent */
  profile?: ServiceProfile;
  /** Generate certificates; asked for when absent */
  certificates?: boolean;
  /** Apply firewall rules (Linux); asked for when absent */
  firewall?: boolean;
  autoRollback?: boolean;
}

interface StageBody {
  message: string;
  items?: StageItem[];
  /** Derived from the items when omitted */
  outcome?: StageOutcome;
}

export const SETUP_STAGES: readonly StageName[] = [
  StageName.PREREQUISITES,
  StageName.CONFIG_MIGRATION,
  StageName.ENVIRONMENT,
  StageName.DOMAINS,
  StageName.INFRASTRUCTURE,
  StageName.SERVICES,
  StageName.HEALTH,
];

const ok = (message: string): StageItem => ({ outcome: StageOutcome.SUCCESS, message });
const warn = (message: string): StageItem => ({ outcome: StageOutcome.WARNING, message });
const skip = (message: string): StageItem => ({ outcome: StageOutcome.SKIPPED, message });

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class SetupOrchestrator extends TypedEventEmitter<SetupEventMap> {
  private environment: EnvironmentProfile | null = null;
  private profile: ServiceProfile | null = null;
  private health: HealthReport | null = null;
  private stageIndex = 0;
  private stageTotal = 1;

  constructor(
    private readonly context: SetupContext,
    private readonly options: SetupOptions = {}
  ) {
    super();
  }

  /**
   * Executes every stage in order and returns the summary.
   */
  async run(): Promise<RunSummary> {
    const start = Date.now();
    const stages: StageResult[] = [];
    this.stageTotal = SETUP_STAGES.length;

    const runners: Record<StageName, () => Promise<StageResult>> = {
      [StageName.PREREQUISITES]: () => this.checkPrerequisites(),
      [StageName.CONFIG_MIGRATION]: () => this.migrateConfiguration(),
      [StageName.ENVIRONMENT]: () => this.validateEnvironment(),
      [StageName.DOMAINS]: () => this.setupDomains(),
      [StageName.INFRASTRUCTURE]: () => this.provisionInfrastructure(),
      [StageName.SERVICES]: () => this.launchServices(),
      [StageName.HEALTH]: () => this.verifyHealth(),
    };

    for (const [index, stage] of SETUP_STAGES.entries()) {
      this.stageIndex = index;
      const result = await runners[stage]();
      stages.push(result);
      if (result.outcome === StageOutcome.FATAL) {
        logger.error('Setup halted', { stage, message: result.message });
        break;
      }
    }

    return this.complete(stages, start);
  }

  /**
   * Wraps a single stage invocation (CLI subcommands) into a summary.
   */
  async runSingle(stage: () => Promise<StageResult>): Promise<RunSummary> {
    const start = Date.now();
    this.stageIndex = 0;
    this.stageTotal = 1;
    const result = await stage();
    return this.complete([result], start);
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  async checkPrerequisites(): Promise<StageResult> {
    return this.stage(StageName.PREREQUISITES, async () => {
      const { runner, compose, config } = this.context;
      const items: StageItem[] = [];

      const docker = await runner.which('docker');
      if (!docker) {
        throw new MissingToolError('docker', 'Install Docker and re-run');
      }
      items.push(ok(`docker found at ${docker}`));

      const base = await compose.detect();
      items.push(ok(`compose command: ${base.join(' ')}`));

      if (this.options.certificates === true && !(await runner.which('openssl'))) {
        throw new MissingToolError('openssl', 'Install OpenSSL or re-run without --certs');
      }

      try {
        const free = await this.context.freeDiskBytes(config.projectDir);
        items.push(
          free < MIN_FREE_DISK_BYTES
            ? warn(`only ${formatBytes(free)} free disk space (2 GiB recommended)`)
            : ok(`${formatBytes(free)} free disk space`)
        );
      } catch (error) {
        items.push(warn(`cannot determine free disk space: ${getErrorMessage(error)}`));
      }

      return { message: 'Prerequisites satisfied', items };
    });
  }

  async migrateConfiguration(): Promise<StageResult> {
    return this.stage(StageName.CONFIG_MIGRATION, async () => {
      const { config } = this.context;
      const migrator = new ConfigurationMigrator({
        activePath: config.paths.activeConfig,
        stagedPath: config.paths.stagedConfig,
        autoRollback: this.options.autoRollback,
        clock: this.context.clock,
      });

      const result = await migrator.migrate();
      const items: StageItem[] = [
        result.backupPath
          ? ok(`previous configuration backed up to ${path.basename(result.backupPath)}`)
          : skip('no previous configuration to back up'),
        ok(`${path.basename(result.installedPath)} installed and validated`),
        ...result.warnings.map(warn),
      ];
      return { message: 'Unified configuration applied', items };
    });
  }

  async validateEnvironment(): Promise<StageResult> {
    return this.stage(StageName.ENVIRONMENT, async () => {
      const { config, prompter } = this.context;
      const validator = new EnvironmentValidator({
        envPath: config.paths.envFile,
        templatePath: config.paths.envTemplate,
        backupPath: config.paths.envBackup,
        prompter,
      });

      const result = await validator.run();
      this.environment = result.profile;

      const items: StageItem[] = [];
      if (result.created) {
        items.push(ok(`${FILES.ENV_FILE} created from ${FILES.ENV_TEMPLATE}`));
      }
      if (result.replaced) {
        items.push(ok(`${FILES.ENV_FILE} replaced, previous copy in ${FILES.ENV_BACKUP}`));
      }
      items.push(
        ...result.missing.map((key) => warn(`${key} is not set`)),
        ...(result.missing.length === 0 ? [ok('all required keys are set')] : [])
      );

      return {
        message:
          result.missing.length > 0
            ? `Edit ${FILES.ENV_FILE} and set ${result.missing.length} required key(s)`
            : 'Environment file complete',
        items,
      };
    });
  }

  async setupDomains(): Promise<StageResult> {
    return this.stage(StageName.DOMAINS, async () => {
      const { config, prompter, runner } = this.context;
      const hosts = createHostsManager(this.context);
      const items: StageItem[] = [];

      const applied = await hosts.setup();
      items.push(
        applied.written
          ? ok(`${applied.domains.length} domains written to ${applied.hostsPath}`)
          : ok(`${applied.hostsPath} already up to date`),
        ...applied.unmanaged.map((entry) =>
          warn(`unmanaged entry left in place: ${entry.address} ${entry.domain}`)
        )
      );

      const fragments = await new ProxyConfigGenerator(config.paths.nginxConfDir).generate();
      items.push(ok(`proxy fragments: ${fragments.map((fragment) => fragment.name).join(', ')}`));

      const wantCerts =
        this.options.certificates ?? (await prompter.confirm('Generate development TLS certificates?', false));
      if (wantCerts) {
        try {
          const certs = await new CertificateProvisioner(runner, {
            certDir: config.paths.certDir,
            domainSuffix: config.domainSuffix,
            keyBits: config.certificates.keyBits,
          }).provision();
          items.push(
            ok(`certificate authority ${certs.authority}, leaf certificate ${certs.leaf}`),
            ok(`trust ${path.relative(config.projectDir, certs.paths.caCert)} in your browser`)
          );
        } catch (error) {
          items.push(warn(`certificates not generated: ${getErrorMessage(error)}`));
        }
      } else {
        items.push(skip('certificate generation skipped'));
      }

      if (this.context.platform === 'linux') {
        const wantFirewall =
          this.options.firewall ?? (await prompter.confirm('Apply firewall rules with ufw?', false));
        if (wantFirewall) {
          try {
            const firewall = await new FirewallConfigurator(runner, this.context.platform).apply();
            items.push(firewall.applied ? ok(`firewall: ${firewall.rules.length} rules applied`) : warn(firewall.reason));
          } catch (error) {
            items.push(warn(`firewall not configured: ${getErrorMessage(error)}`));
          }
        }
      }

      const verification = await hosts.verify();
      for (const result of verification) {
        if (!result.loopback) {
          items.push(warn(`${result.domain} does not resolve to loopback${result.error ? ` (${result.error})` : ''}`));
        }
      }
      const resolved = verification.filter((result) => result.loopback).length;
      items.push(ok(`${resolved}/${verification.length} domains resolve to 127.0.0.1`));

      return { message: 'Local domains configured', items };
    });
  }

  async provisionInfrastructure(): Promise<StageResult> {
    return this.stage(StageName.INFRASTRUCTURE, async () => {
      const { config, compose } = this.context;
      const result = await new InfrastructureProvisioner(compose, config.projectDir).provision();
      const wroteBase = await ensureBaseConfig(config.paths.nginxConf, config.domainSuffix);

      const items: StageItem[] = [
        ok(`${result.directories.length} project directories present`),
        ...(wroteBase ? [warn(`${FILES.NGINX_CONF} was missing, wrote a minimal default`)] : []),
        ...result.networks.map(({ name, result: state }) =>
          ok(`network ${name} ${state === 'created' ? 'created' : 'already exists'}`)
        ),
      ];
      return { message: 'Directories and networks ready', items };
    });
  }

  async launchServices(): Promise<StageResult> {
    return this.stage(StageName.SERVICES, async () => {
      const profile = await this.resolveProfile();
      const launcher = new ServiceLauncher(this.context.compose, this.context.config.timing, {
        sleeper: this.context.sleeper,
      });

      const result = await launcher.launch(profile);
      if (result.state === LaunchState.STARTED) {
        return {
          message: `Profile ${profile} started`,
          items: result.services.map((state) => ok(`${state.service}: ${state.status || state.state}`)),
        };
      }

      return {
        message: `Profile ${profile} did not start cleanly: ${result.reason ?? 'unknown reason'}`,
        outcome: StageOutcome.WARNING,
        items: [
          ...result.notReady.map((service) => warn(`${service} is not running`)),
          ...renderStatusTable(result.services)
            .split('\n')
            .map((line) => ({ outcome: StageOutcome.SKIPPED, message: line })),
        ],
      };
    });
  }

  async verifyHealth(): Promise<StageResult> {
    return this.stage(StageName.HEALTH, async () => {
      const { config, compose } = this.context;
      const verifier = new HealthVerifier();
      verifier.registerDefaultChecks({
        compose,
        domainSuffix: config.domainSuffix,
        timeoutMs: config.timing.httpTimeoutMs,
        environment: await this.loadEnvironment(),
        httpCheck: this.context.httpCheck,
      });
      verifier.on('health:checked', (result) => this.emit('health:checked', result));

      const report = await verifier.verify();
      this.health = report;

      return {
        message: `${report.healthyCount}/${report.totalCount} services healthy`,
        items: report.results.map((result) => {
          const line = `${result.name}${result.detail ? ` - ${result.detail}` : ''}`;
          return result.healthy ? ok(line) : warn(line);
        }),
      };
    });
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async stage(name: StageName, body: () => Promise<StageBody>): Promise<StageResult> {
    this.emit('stage:started', { stage: name, index: this.stageIndex, total: this.stageTotal });
    const start = Date.now();
    let result: StageResult;

    try {
      const outcome = await body();
      const items = outcome.items ?? [];
      result = {
        stage: name,
        outcome:
          outcome.outcome ??
          (items.some((item) => item.outcome === StageOutcome.WARNING) ? StageOutcome.WARNING : StageOutcome.SUCCESS),
        message: outcome.message,
        items,
        hint: null,
        durationMs: Date.now() - start,
      };
    } catch (error) {
      const setupError = wrapError(error, 'STAGE_FAILED');
      logger.error('Stage failed', { stage: name, error: setupError.toJSON() });
      result = {
        stage: name,
        outcome: StageOutcome.FATAL,
        message: setupError.message,
        items: error instanceof ConfigValidationError ? error.issues.map(warn) : [],
        hint: setupError.hint,
        durationMs: Date.now() - start,
      };
    }

    logger.info('Stage completed', { stage: name, outcome: result.outcome, durationMs: result.durationMs });
    this.emit('stage:completed', result);
    return result;
  }

  private complete(stages: StageResult[], start: number): RunSummary {
    const summary: RunSummary = {
      stages,
      profile: this.profile,
      health: this.health,
      exitCode: stages.some((stage) => stage.outcome === StageOutcome.FATAL) ? 1 : 0,
      durationMs: Date.now() - start,
    };
    this.emit('run:completed', summary);
    return summary;
  }

  private async resolveProfile(): Promise<ServiceProfile> {
    this.profile ??=
      this.options.profile ??
      (await this.context.prompter.selectProfile('Which environment should be started?', ServiceProfile.BASIC));
    return this.profile;
  }

  /**
   * The env profile read by the environment stage, or the file on disk when
   * the health stage runs on its own.
   */
  private async loadEnvironment(): Promise<EnvironmentProfile | null> {
    if (this.environment) {
      return this.environment;
    }
    return loadEnvironmentProfile(this.context.config.paths.envFile).catch((error: unknown) => {
      logger.warn('Environment file not readable', { error: getErrorMessage(error) });
      return null;
    });
  }
}
