/**
 * Environment Validator
 *
 * Creates the stack's .env from its template and reports required secrets
 * that are still unset.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { PLACEHOLDER_PREFIX, REQUIRED_ENV_KEYS } from '../config/constants.js';
import { PreconditionError } from '../core/errors.js';
import type { Prompter } from '../core/types.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { pathExists } from '../utils/fs.js';

const logger = getComponentLogger('Environment');

// =============================================================================
// PROFILE
// =============================================================================

export type EnvironmentProfile = Readonly<Record<string, string>>;

/**
 * Empty values and template placeholders (`your_...`) count as unset.
 */
export function isUnsetValue(value: string | undefined): boolean {
  if (value === undefined) {
    return true;
  }
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase().startsWith(PLACEHOLDER_PREFIX);
}

export function findMissingKeys(required: readonly string[], values: EnvironmentProfile): string[] {
  return required.filter((key) => isUnsetValue(values[key]));
}

export async function loadEnvironmentProfile(envPath: string): Promise<EnvironmentProfile> {
  return dotenv.parse(await fs.promises.readFile(envPath));
}

// =============================================================================
// VALIDATOR
// =============================================================================

export interface EnvironmentValidatorOptions {
  envPath: string;
  templatePath: string;
  backupPath: string;
  prompter: Prompter;
  requiredKeys?: readonly string[];
}

export interface EnvironmentCheckResult {
  envPath: string;
  created: boolean;
  /** Existing file replaced by the template (after a backup) */
  replaced: boolean;
  missing: string[];
  profile: EnvironmentProfile;
}

export class EnvironmentValidator {
  private readonly requiredKeys: readonly string[];

  constructor(private readonly options: EnvironmentValidatorOptions) {
    this.requiredKeys = options.requiredKeys ?? REQUIRED_ENV_KEYS;
  }

  /**
   * @throws {PreconditionError} If neither the env file nor its template exists
   */
  async run(): Promise<EnvironmentCheckResult> {
    const { envPath, templatePath, backupPath, prompter } = this.options;
    const envName = path.basename(envPath);
    const templateName = path.basename(templatePath);
    let created = false;
    let replaced = false;

    if (!(await pathExists(envPath))) {
      if (!(await pathExists(templatePath))) {
        throw new PreconditionError(
          `Neither ${envName} nor its template ${templateName} exists`,
          `Restore ${templateName} from version control and re-run`,
          { envPath, templatePath }
        );
      }
      await fs.promises.copyFile(templatePath, envPath);
      created = true;
      logger.info('Environment file created from template', { envPath, templatePath });
    } else if (
      (await pathExists(templatePath)) &&
      (await prompter.confirm(`${envName} already exists. Replace it with ${templateName}?`, false))
    ) {
      await fs.promises.copyFile(envPath, backupPath);
      await fs.promises.copyFile(templatePath, envPath);
      replaced = true;
      logger.info('Environment file replaced from template', { envPath, backupPath });
    }

    let profile = await loadEnvironmentProfile(envPath);
    let missing = findMissingKeys(this.requiredKeys, profile);

    while (
      missing.length > 0 &&
      prompter.interactive &&
      (await prompter.confirm(`Open ${envName} in your editor to set ${missing.join(', ')}?`, false))
    ) {
      await prompter.editFile(envPath);
      profile = await loadEnvironmentProfile(envPath);
      missing = findMissingKeys(this.requiredKeys, profile);
    }

    if (missing.length > 0) {
      logger.warn('Required environment keys are unset', { missing });
    }

    return { envPath, created, replaced, missing, profile };
  }
}
