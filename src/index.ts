/**
 * tradedeck-setup
 *
 * Provisioning orchestrator for the tradedeck trading stack. The bin scripts
 * live in src/cli; this module exposes the building blocks.
 */

export * from './core/errors.js';
export * from './core/types.js';
export { TypedEventEmitter } from './core/events.js';

export * from './config/index.js';

export * from './hosts/index.js';
export * from './certificates/index.js';
export * from './proxy/index.js';
export * from './migration/index.js';
export * from './environment/index.js';
export * from './services/launcher.js';

export { ComposeClient, parsePsOutput, isServiceUp, type ComposeServiceState } from './infrastructure/compose/index.js';
export { ProcessRunner, processRunner, runOrThrow, type CommandRunner, type CommandResult } from './infrastructure/shell/index.js';
export { InfrastructureProvisioner, networkNames } from './infrastructure/provisioner/index.js';
export { FirewallConfigurator, firewallCommands } from './infrastructure/firewall/index.js';
export { logger, getComponentLogger, initializeLogger, closeLogger } from './infrastructure/logger/index.js';

export * from './orchestrator/index.js';

export { InquirerPrompter, NonInteractivePrompter, createPrompter } from './cli/prompts.js';
export { buildSetupProgram } from './cli/setup-program.js';
export { buildDomainsProgram } from './cli/domains-program.js';
