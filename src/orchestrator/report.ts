/**
 * Terminal Report
 *
 * Operator-facing output of a setup run: banner, stage lines and the
 * completion guide.
 */

import path from 'path';
import { getServiceUrls } from '../config/index.js';
import { StageOutcome } from '../core/types.js';
import { formatDuration } from '../utils/formatting.js';
import type { SetupOrchestrator } from './setup.js';
import type { RunSummary, StageResult } from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export type Writer = (line: string) => void;

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

const ICONS: Record<StageOutcome, string> = {
  [StageOutcome.SUCCESS]: '✅',
  [StageOutcome.WARNING]: '⚠️ ',
  [StageOutcome.FATAL]: '❌',
  [StageOutcome.SKIPPED]: 'ℹ️ ',
};

function outcomeColor(outcome: StageOutcome): string {
  switch (outcome) {
    case StageOutcome.SUCCESS:
      return COLORS.green;
    case StageOutcome.WARNING:
      return COLORS.yellow;
    case StageOutcome.FATAL:
      return COLORS.red;
    default:
      return COLORS.dim;
  }
}

// =============================================================================
// REPORTER
// =============================================================================

export class Reporter {
  constructor(
    private readonly write: Writer = console.log,
    private readonly color = true
  ) {}

  /**
   * Prints stage progress as the orchestrator emits it.
   */
  attach(orchestrator: SetupOrchestrator): void {
    orchestrator.on('stage:started', ({ stage, index, total }) => {
      const counter = total > 1 ? `[${index + 1}/${total}] ` : '';
      this.write(this.paint(`\n🔧 ${counter}${stage}`, COLORS.magenta + COLORS.bold));
    });
    orchestrator.on('stage:completed', (result) => this.stage(result));
  }

  banner(title: string): void {
    const width = 59;
    const line = '═'.repeat(width);
    const padded = title.padStart(Math.floor((width + title.length) / 2)).padEnd(width);
    this.write(this.paint(`╔${line}╗\n║${padded}║\n╚${line}╝`, COLORS.cyan + COLORS.bold));
  }

  stage(result: StageResult): void {
    for (const item of result.items) {
      this.write(`   ${ICONS[item.outcome]} ${this.paint(item.message, outcomeColor(item.outcome))}`);
    }
    this.write(
      `${ICONS[result.outcome]} ${this.paint(result.message, outcomeColor(result.outcome))} ` +
        this.paint(`(${formatDuration(result.durationMs)})`, COLORS.dim)
    );
    if (result.hint) {
      this.write(this.paint(`   hint: ${result.hint}`, COLORS.yellow));
    }
  }

  summary(summary: RunSummary): void {
    const fatal = summary.stages.find((stage) => stage.outcome === StageOutcome.FATAL);
    const warnings = summary.stages.filter((stage) => stage.outcome === StageOutcome.WARNING).length;

    this.write('');
    if (fatal) {
      this.write(this.paint(`❌ Setup stopped at ${fatal.stage}: ${fatal.message}`, COLORS.red + COLORS.bold));
    } else if (warnings > 0) {
      this.write(this.paint(`⚠️  Completed with warnings in ${warnings} stage(s)`, COLORS.yellow + COLORS.bold));
    } else {
      this.write(this.paint('✅ Completed', COLORS.green + COLORS.bold));
    }
  }

  private paint(text: string, code: string): string {
    return this.color ? `${code}${text}${COLORS.reset}` : text;
  }
}

// =============================================================================
// COMPLETION GUIDE
// =============================================================================

/**
 * Lists the service URLs and the follow-up commands for the running stack.
 */
export function renderCompletionGuide(domainSuffix: string, composeFile: string): string[] {
  const compose = `docker compose -f ${path.basename(composeFile)}`;
  const urls = getServiceUrls(domainSuffix);
  const width = Math.max(...urls.map(({ service }) => service.length));

  return [
    '',
    '🎉 Environment ready',
    '',
    '🌐 Service URLs:',
    ...urls.map(({ service, url }) => `   ${service.padEnd(width)}  ${url}`),
    '',
    '🔧 Management:',
    `   ${compose} ps`,
    `   ${compose} logs -f trading-bot`,
    `   ${compose} restart`,
    `   ${compose} down`,
    `   ${compose} exec nginx nginx -t`,
    '',
    '⚠️  Next steps:',
    '   1. Set the real API keys in .env',
    `   2. Open http://${domainSuffix} to check the dashboard`,
    `   3. Configure dashboards in Grafana (grafana.${domainSuffix})`,
  ];
}

export function printCompletionGuide(domainSuffix: string, composeFile: string, write: Writer = console.log): void {
  for (const line of renderCompletionGuide(domainSuffix, composeFile)) {
    write(line);
  }
}
