/**
 * Shared utility functions
 */

const UTC_SECONDS_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})Z$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a date as YYYY-MM-DDTHH:MM:SSZ (UTC, whole seconds)
 */
export function formatUtcSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parse a YYYY-MM-DDTHH:MM:SSZ timestamp, rejecting any other shape
 */
export function parseUtcSeconds(timestamp: string): Date {
  const match = UTC_SECONDS_PATTERN.exec(timestamp);
  if (!match) {
    throw new Error(`time data '${timestamp}' does not match format YYYY-MM-DDTHH:MM:SSZ`);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls invalid fields over (Feb 30 -> Mar 2); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new Error(`time data '${timestamp}' is not a valid UTC timestamp`);
  }

  return date;
}

/**
 * Subtract whole hours from a date
 */
export function subtractHours(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * 60 * 60 * 1000);
}

/**
 * Compact UTC stamp for file names, e.g. 20240102_030405Z
 */
export function formatFileStamp(date: Date = new Date()): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}

/**
 * Default report path for a run started at the given time
 */
export function defaultReportPath(date: Date = new Date()): string {
  return `./backup_report_${formatFileStamp(date)}.json`;
}

/**
 * Parse an optional integer size field.
 * Integer strings parse, integers pass through, other numbers truncate,
 * anything else is treated as absent.
 */
export function parseOptionalInt(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (INTEGER_PATTERN.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Mask an access key id for reports and logs
 */
export function maskAccessKey(accessKeyId: string): string {
  if (!accessKeyId) {
    return '';
  }
  if (accessKeyId.length <= 8) {
    return '***';
  }
  return `${accessKeyId.slice(0, 4)}****${accessKeyId.slice(-4)}`;
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Deduplicate and sort strings ascending
 */
export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}
