/**
 * Configuration Migrator
 *
 * Installs the staged unified configuration over the active one, keeping a
 * timestamped backup of the previous file.
 */

import fs from 'fs';
import path from 'path';
import { ConfigValidationError, PreconditionError, getSystemErrorCode } from '../core/errors.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { formatBackupTimestamp } from '../utils/formatting.js';
import { pathExists as exists } from '../utils/fs.js';
import { checkUnifiedConfig, type UnifiedConfig } from './schema.js';

const logger = getComponentLogger('ConfigMigrator');

// =============================================================================
// TYPES
// =============================================================================

export interface MigratorOptions {
  activePath: string;
  stagedPath: string;
  /** Restore the backup when the installed file fails validation */
  autoRollback?: boolean;
  clock?: () => Date;
}

export interface MigrationResult {
  installedPath: string;
  backupPath: string | null;
  config: UnifiedConfig;
  warnings: string[];
}

// =============================================================================
// MIGRATOR
// =============================================================================

export class ConfigurationMigrator {
  private readonly clock: () => Date;

  constructor(private readonly options: MigratorOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * @throws {PreconditionError} If the staged file does not exist
   * @throws {ConfigValidationError} If the installed file fails to load
   */
  async migrate(): Promise<MigrationResult> {
    const { activePath, stagedPath } = this.options;

    if (!(await exists(stagedPath))) {
      throw new PreconditionError(
        `Staged configuration not found: ${path.basename(stagedPath)}`,
        `Create ${path.basename(stagedPath)} next to ${path.basename(activePath)} and re-run`,
        { stagedPath }
      );
    }

    const backupPath = (await exists(activePath)) ? await this.backup(activePath) : null;
    if (backupPath) {
      logger.info('Active configuration backed up', { backupPath });
    }

    await installAtomically(stagedPath, activePath);
    logger.info('Staged configuration installed', { activePath });

    const check = checkUnifiedConfig(await fs.promises.readFile(activePath, 'utf8'));
    if (!check.ok) {
      const restored = await this.rollback(backupPath);
      logger.error('Installed configuration failed validation', { issues: check.issues, restored });
      throw new ConfigValidationError(path.basename(activePath), check.issues, backupPath, restored);
    }

    for (const warning of check.warnings) {
      logger.warn(warning);
    }

    return { installedPath: activePath, backupPath, config: check.config, warnings: check.warnings };
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  /**
   * Copies the active file to `<name>_backup_YYYYMMDD_HHMMSS<ext>`, adding a
   * counter when a backup from the same second exists.
   */
  private async backup(activePath: string): Promise<string> {
    const ext = path.extname(activePath);
    const stem = path.join(path.dirname(activePath), path.basename(activePath, ext));
    const stamp = formatBackupTimestamp(this.clock());

    for (let attempt = 0; ; attempt++) {
      const candidate = `${stem}_backup_${stamp}${attempt > 0 ? `_${attempt}` : ''}${ext}`;
      try {
        await fs.promises.copyFile(activePath, candidate, fs.constants.COPYFILE_EXCL);
        return candidate;
      } catch (error) {
        if (getSystemErrorCode(error) !== 'EEXIST') {
          throw error;
        }
      }
    }
  }

  private async rollback(backupPath: string | null): Promise<boolean> {
    if (!this.options.autoRollback) {
      return false;
    }
    if (!backupPath) {
      await fs.promises.rm(this.options.activePath, { force: true });
      logger.warn('Invalid configuration removed, no previous file existed');
      return false;
    }
    await installAtomically(backupPath, this.options.activePath);
    logger.warn('Previous configuration restored from backup', { backupPath });
    return true;
  }
}

/**
 * Copies `source` beside `target` and renames it into place.
 */
async function installAtomically(source: string, target: string): Promise<void> {
  const temp = `${target}.${process.pid}.tmp`;
  await fs.promises.copyFile(source, temp);
  try {
    await fs.promises.rename(temp, target);
  } catch (error) {
    await fs.promises.rm(temp, { force: true });
    throw error;
  }
}
