import msLib from 'ms';
import bytesLib from 'bytes';

/**
 * Parse a duration string to milliseconds.
 * Supports: '500ms', '1s', '2s', '1m', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format a kB quantity (the unit of the memory accounting sources).
 */
export function formatKilobytes(kb: number): string {
  return formatBytes(kb * 1024);
}

/**
 * Format a percentage for display.
 */
export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}
