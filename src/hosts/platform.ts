/**
 * Hosts Platform
 *
 * Where the hosts table lives and how it is written on each operating system.
 */

import fs from 'fs';
import path from 'path';
import { HOSTS_PATHS } from '../config/constants.js';
import { CommandError, PrivilegeError, getErrorMessage, getSystemErrorCode } from '../core/errors.js';
import type { CommandRunner } from '../infrastructure/shell/index.js';

// =============================================================================
// INTERFACE
// =============================================================================

export interface HostsPlatform {
  readonly name: string;
  locateHostsTable(): string;
  readHostsTable(): Promise<string>;
  writeHostsTable(content: string): Promise<void>;
}

const PRIVILEGE_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

// =============================================================================
// FILE PLATFORM
// =============================================================================

/**
 * Reads and writes an explicit path directly.
 */
export class FileHostsPlatform implements HostsPlatform {
  readonly name: string = 'file';

  constructor(protected readonly hostsPath: string) {}

  locateHostsTable(): string {
    return this.hostsPath;
  }

  async readHostsTable(): Promise<string> {
    try {
      return await fs.promises.readFile(this.hostsPath, 'utf8');
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (code === 'ENOENT') {
        return '';
      }
      if (code && PRIVILEGE_CODES.has(code)) {
        throw new PrivilegeError(this.hostsPath, getErrorMessage(error));
      }
      throw error;
    }
  }

  async writeHostsTable(content: string): Promise<void> {
    try {
      await fs.promises.writeFile(this.hostsPath, content, 'utf8');
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (code && PRIVILEGE_CODES.has(code)) {
        throw new PrivilegeError(this.hostsPath, getErrorMessage(error));
      }
      throw error;
    }
  }
}

// =============================================================================
// WINDOWS PLATFORM
// =============================================================================

export class WindowsHostsPlatform extends FileHostsPlatform {
  override readonly name = 'windows';

  constructor(systemRoot = process.env.SystemRoot ?? 'C:\\Windows') {
    super(path.win32.join(systemRoot, ...HOSTS_PATHS.windowsRelative));
  }
}

// =============================================================================
// POSIX PLATFORM
// =============================================================================

export interface PosixHostsPlatformOptions {
  hostsPath?: string;
  /** Defaults to an effective uid check */
  isRoot?: boolean;
}

/**
 * Writes directly when running as root, otherwise through `sudo tee`.
 */
export class PosixHostsPlatform extends FileHostsPlatform {
  override readonly name = 'posix';
  private readonly isRoot: boolean;

  constructor(
    private readonly runner: CommandRunner,
    options: PosixHostsPlatformOptions = {}
  ) {
    super(options.hostsPath ?? HOSTS_PATHS.posix);
    this.isRoot = options.isRoot ?? process.getuid?.() === 0;
  }

  override async writeHostsTable(content: string): Promise<void> {
    if (this.isRoot) {
      return super.writeHostsTable(content);
    }

    if (!(await this.runner.which('sudo'))) {
      throw new PrivilegeError(this.hostsPath, 'not running as root and sudo is not available');
    }

    const result = await this.runner.run('sudo', ['tee', this.hostsPath], { input: content });
    if (result.exitCode !== 0) {
      throw new CommandError(result.command, result.exitCode, result.stderr);
    }
  }
}

// =============================================================================
// SELECTION
// =============================================================================

export interface PlatformSelection {
  runner: CommandRunner;
  /** Explicit hosts file, bypassing platform detection */
  override?: string | null;
  platform?: NodeJS.Platform;
}

export function selectHostsPlatform(selection: PlatformSelection): HostsPlatform {
  if (selection.override) {
    return new FileHostsPlatform(selection.override);
  }
  if ((selection.platform ?? process.platform) === 'win32') {
    return new WindowsHostsPlatform();
  }
  return new PosixHostsPlatform(selection.runner);
}
