/**
 * Formatting Utilities
 */

/**
 * Formats a date as YYYYMMDD_HHMMSS in local time (backup file suffixes).
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Formats duration in human-readable form
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${ms}ms`;
}

/**
 * Formats a byte count with a binary unit.
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(unit === 0 ? 0 : 1)} ${units[unit] ?? 'B'}`;
}

/**
 * Renders rows as a fixed-width text table.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const renderRow = (cells: readonly string[]) =>
    widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join('  ').trimEnd();

  return [renderRow(headers), ...rows.map(renderRow)].join('\n');
}

// =============================================================================
// SANITIZATION
// =============================================================================

/**
 * Redacts sensitive values from an object for logging.
 */
export function sanitizeObject(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = ['password', 'apiKey', 'token', 'secret']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveKeys.some((sk) => lowerKey.includes(sk.toLowerCase()));

    if (isSensitive && typeof value === 'string') {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = sanitizeObject(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}
