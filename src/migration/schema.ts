/**
 * Unified Configuration Schema
 *
 * Shape of tradedeck.config.yaml as far as the setup tool checks it. Sections
 * it does not know are passed through untouched.
 */

import { parse } from 'yaml';
import { z } from 'zod';

// =============================================================================
// SCHEMA
// =============================================================================

const stopLossSchema = z
  .object({
    z_score_threshold: z.number().positive(),
    time_limit_hours: z.number().int().positive().optional(),
    drawdown_threshold: z.number().positive().max(1).optional(),
  })
  .passthrough();

const positionLimitsSchema = z
  .object({
    max_pairs_simultaneous: z.number().int().min(1),
    correlation_limit: z.number().min(0).max(1).optional(),
  })
  .passthrough();

const positionSizingSchema = z
  .object({
    max_position_per_pair: z.number().positive().max(1),
    max_total_exposure: z.number().positive().max(1),
  })
  .passthrough()
  .refine((sizing) => sizing.max_position_per_pair <= sizing.max_total_exposure, {
    message: 'max_position_per_pair cannot exceed max_total_exposure',
    path: ['max_position_per_pair'],
  });

export const unifiedConfigSchema = z
  .object({
    project_name: z.string().min(1).optional(),
    version: z.string().optional(),
    trading_mode: z.enum(['testnet', 'live']).default('testnet'),
    dry_run: z.boolean().default(true),
    initial_capital: z.number().positive().default(1000),
    risk_management: z
      .object({
        stop_loss: stopLossSchema.optional(),
        position_limits: positionLimitsSchema.optional(),
      })
      .passthrough()
      .optional(),
    position_sizing: positionSizingSchema.optional(),
  })
  .passthrough();

export type UnifiedConfig = z.infer<typeof unifiedConfigSchema>;

// =============================================================================
// VALIDATION
// =============================================================================

export type ConfigCheck =
  | { ok: true; config: UnifiedConfig; warnings: string[] }
  | { ok: false; issues: string[] };

/**
 * Parses and validates the configuration text.
 */
export function checkUnifiedConfig(text: string): ConfigCheck {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    return { ok: false, issues: [`YAML syntax: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const result = unifiedConfigSchema.safeParse(document);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }

  return { ok: true, config: result.data, warnings: collectValueWarnings(result.data) };
}

/**
 * Values that load but deserve the operator's attention.
 */
export function collectValueWarnings(config: UnifiedConfig): string[] {
  const warnings: string[] = [];

  if (config.initial_capital < 100) {
    warnings.push(`initial_capital is ${config.initial_capital} USD, below the recommended 100`);
  }

  const zScore = config.risk_management?.stop_loss?.z_score_threshold;
  if (zScore !== undefined && (zScore <= 1.5 || zScore > 5)) {
    warnings.push(`stop-loss z_score_threshold ${zScore} is outside the recommended range (1.5, 5]`);
  }

  const maxPairs = config.risk_management?.position_limits?.max_pairs_simultaneous;
  if (maxPairs !== undefined && maxPairs > 20) {
    warnings.push(`max_pairs_simultaneous is ${maxPairs}; more than 20 open pairs is hard to manage`);
  }

  return warnings;
}
