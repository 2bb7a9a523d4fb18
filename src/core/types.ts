/**
 * Shared Types
 */

/** Unix epoch milliseconds */
export type Timestamp = number;

/**
 * Outcome of a single pipeline stage.
 */
export enum StageOutcome {
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  FATAL = 'FATAL',
  SKIPPED = 'SKIPPED',
}

/**
 * Service profile selecting which containers are started.
 */
export enum ServiceProfile {
  BASIC = 'basic',
  DEVELOPMENT = 'development',
  FULL = 'full',
}

export const SERVICE_PROFILES: readonly ServiceProfile[] = [
  ServiceProfile.BASIC,
  ServiceProfile.DEVELOPMENT,
  ServiceProfile.FULL,
];

export function isServiceProfile(value: string): value is ServiceProfile {
  return SERVICE_PROFILES.some((profile) => profile === value);
}

/**
 * Interactive confirmation hooks. Headless runs supply an implementation that
 * answers from pre-set options.
 */
export interface Prompter {
  readonly interactive: boolean;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  selectProfile(message: string, defaultValue: ServiceProfile): Promise<ServiceProfile>;
  editFile(path: string): Promise<void>;
}
