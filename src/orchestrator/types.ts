/**
 * Orchestrator Types
 *
 * Stage results, health reports and the events of a setup run.
 */

import type { StageOutcome, ServiceProfile, Timestamp } from '../core/types.js';

// =============================================================================
// STAGES
// =============================================================================

export enum StageName {
  PREREQUISITES = 'prerequisites',
  CONFIG_MIGRATION = 'config-migration',
  ENVIRONMENT = 'environment',
  DOMAINS = 'domains',
  INFRASTRUCTURE = 'infrastructure',
  SERVICES = 'services',
  HEALTH = 'health',
}

export interface StageItem {
  outcome: StageOutcome;
  message: string;
}

export interface StageResult {
  stage: StageName;
  outcome: StageOutcome;
  message: string;
  /** Per-step lines shown under the stage heading */
  items: StageItem[];
  /** Remediation shown for fatal outcomes */
  hint: string | null;
  durationMs: number;
}

// =============================================================================
// HEALTH
// =============================================================================

/** One core service; its follow-up checks are folded into this single result */
export interface HealthTargetResult {
  name: string;
  healthy: boolean;
  latencyMs: number;
  detail: string | null;
}

export interface HealthReport {
  results: HealthTargetResult[];
  healthyCount: number;
  totalCount: number;
  checkedAt: Timestamp;
}

// =============================================================================
// RUN
// =============================================================================

export interface RunSummary {
  stages: StageResult[];
  profile: ServiceProfile | null;
  health: HealthReport | null;
  /** 0 unless a stage was fatal */
  exitCode: 0 | 1;
  durationMs: number;
}

export interface StageStartedEvent {
  stage: StageName;
  index: number;
  total: number;
}

export interface SetupEventMap {
  'stage:started': StageStartedEvent;
  'stage:completed': StageResult;
  'health:checked': HealthTargetResult;
  'run:completed': RunSummary;
}
