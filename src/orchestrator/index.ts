/**
 * Orchestrator Module
 *
 * Wires the provisioning components into the setup pipeline.
 *
 * Components:
 * - SetupOrchestrator: Stage sequencing and run summary
 * - HealthVerifier: One-shot health checks of the running stack
 * - Reporter: Terminal output
 */

// =============================================================================
// TYPES
// =============================================================================

export * from './types.js';

// =============================================================================
// CONTEXT
// =============================================================================

export { createSetupContext, createHostsManager, statfsFreeBytes, type SetupContext } from './context.js';

// =============================================================================
// HEALTH VERIFIER
// =============================================================================

export {
  HealthVerifier,
  datastoreUser,
  healthUrls,
  fetchStatus,
  type HttpCheck,
  type ServiceCheck,
  type DefaultCheckDeps,
} from './health.js';

// =============================================================================
// SETUP ORCHESTRATOR
// =============================================================================

export { SetupOrchestrator, SETUP_STAGES, type SetupOptions } from './setup.js';

// =============================================================================
// REPORTING
// =============================================================================

export { Reporter, printCompletionGuide, renderCompletionGuide, type Writer } from './report.js';
