/**
 * Custom Error Classes
 *
 * Error taxonomy for the provisioning workflow. Each error carries a
 * machine-readable code, a context object and an optional remediation hint
 * shown to the operator.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

/**
 * Base error class for all setup errors.
 */
export class SetupError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;
  public readonly hint: string | null;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options: { recoverable?: boolean; hint?: string } = {}
  ) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = options.recoverable ?? false;
    this.hint = options.hint ?? null;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serializes the error for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      hint: this.hint,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// =============================================================================
// CONFIGURATION ERRORS
// =============================================================================

/**
 * The tool's own settings are invalid. The hint defaults to the TRADEDECK_*
 * variables; callers validating something else name it instead.
 */
export class ConfigurationError extends SetupError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    hint = 'Fix the TRADEDECK_* environment variables listed above'
  ) {
    super(message, 'CONFIGURATION_ERROR', { issues }, { hint });
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// PRECONDITION ERRORS
// =============================================================================

/**
 * A required tool, file or privilege is missing. Raised before anything is
 * mutated.
 */
export class PreconditionError extends SetupError {
  constructor(message: string, hint: string, context: Record<string, unknown> = {}) {
    super(message, 'PRECONDITION_FAILED', context, { hint });
    this.name = 'PreconditionError';
  }
}

/**
 * A required executable is not on PATH.
 */
export class MissingToolError extends PreconditionError {
  constructor(tool: string, hint = `Install ${tool} and re-run`) {
    super(`Required tool not found: ${tool}`, hint, { tool });
    this.name = 'MissingToolError';
  }
}

/**
 * The process lacks the privilege to write a system resource.
 */
export class PrivilegeError extends SetupError {
  constructor(resource: string, reason: string) {
    super(`Insufficient privileges to modify ${resource}: ${reason}`, 'PRIVILEGE_REQUIRED', {
      resource,
      reason,
    }, {
      hint: 'Re-run with administrator rights (sudo on Linux/macOS, an elevated shell on Windows)',
    });
    this.name = 'PrivilegeError';
  }
}

// =============================================================================
// VALIDATION ERRORS
// =============================================================================

/**
 * The newly installed configuration file failed to load.
 */
export class ConfigValidationError extends SetupError {
  public readonly issues: string[];

  constructor(file: string, issues: string[], backupPath: string | null, restored = false) {
    const restore = restored
      ? 'The previous configuration was restored from the backup.'
      : backupPath
        ? `Restore manually with: cp ${backupPath} ${file}`
        : 'No previous configuration existed, fix the staged file and re-run';
    super(`Configuration ${file} failed validation`, 'CONFIG_VALIDATION_FAILED', {
      file,
      issues,
      backupPath,
      restored,
    }, { hint: restore });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// =============================================================================
// EXECUTION ERRORS
// =============================================================================

/**
 * An external command exited unsuccessfully.
 */
export class CommandError extends SetupError {
  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim();
    super(
      `Command failed (exit ${exitCode ?? 'signal'}): ${command}${detail ? `\n${detail}` : ''}`,
      'COMMAND_FAILED',
      { command, exitCode, stderr: detail },
      { recoverable: true }
    );
    this.name = 'CommandError';
  }
}

/**
 * Directory or network provisioning failed.
 */
export class InfrastructureError extends SetupError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INFRASTRUCTURE_ERROR', context, {
      hint: 'Check that the Docker daemon is running and the project directory is writable',
    });
    this.name = 'InfrastructureError';
  }
}

/**
 * Certificate generation or inspection failed.
 */
export class CertificateError extends SetupError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CERTIFICATE_ERROR', context, {
      hint: 'Delete the certificate directory and re-run with --certs to regenerate',
    });
    this.name = 'CertificateError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}

/**
 * Wraps an unknown error in a SetupError if it isn't already one.
 */
export function wrapError(error: unknown, defaultCode = 'UNKNOWN_ERROR'): SetupError {
  if (isSetupError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SetupError(error.message, defaultCode, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new SetupError(String(error), defaultCode);
}

/**
 * Extracts a user-friendly message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Reads the `code` of a Node.js system error (ENOENT, EACCES, ...).
 */
export function getSystemErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
