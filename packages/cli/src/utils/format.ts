import chalk from 'chalk';
import type { DeviceStatus, IssueSeverity, SamplerState } from '@tickscope/shared';
import { formatBytes, formatKilobytes, formatPercent } from '@tickscope/shared';

export { formatBytes, formatKilobytes, formatPercent };

const SPARK_LEVELS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

export function colorPercent(
  value: number | null | undefined,
  warnAbove = 50,
  critAbove = 80,
): string {
  if (value === null || value === undefined) return chalk.gray('-');
  const str = formatPercent(value);
  if (value > critAbove) return chalk.red(str);
  if (value > warnAbove) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatRate(value: number | null | undefined, unit: string, digits = 1): string {
  if (value === null || value === undefined) return chalk.gray('-');
  return `${value.toFixed(digits)} ${unit}`;
}

export function formatCount(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function colorSeverity(severity: IssueSeverity): string {
  return severity === 'critical' ? chalk.red('CRIT') : chalk.yellow('WARN');
}

export function colorDeviceStatus(status: DeviceStatus): string {
  switch (status) {
    case 'bottleneck':
      return chalk.red(status);
    case 'warning':
      return chalk.yellow(status);
    case 'hot':
      return chalk.magenta(status);
    default:
      return chalk.green(status);
  }
}

export function colorSamplerState(state: SamplerState): string {
  switch (state) {
    case 'ready':
      return chalk.green(state);
    case 'disabled':
      return chalk.red(state);
    default:
      return chalk.gray(state);
  }
}

/** A fixed-width bar for a 0-100 value, colored like `colorPercent`. */
export function progressBar(percent: number, width = 20): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
  if (clamped > 80) return chalk.red(bar);
  if (clamped > 50) return chalk.yellow(bar);
  return chalk.green(bar);
}

/**
 * One block character per value, scaled against `max` (the largest value
 * when omitted). An all-zero series renders as the lowest level.
 */
export function sparkline(values: readonly number[], max?: number): string {
  const top = max ?? Math.max(0, ...values);
  const last = SPARK_LEVELS.length - 1;
  return values
    .map((value) => {
      if (top <= 0) return SPARK_LEVELS[0];
      const level = Math.round((Math.max(0, value) / top) * last);
      return SPARK_LEVELS[Math.min(last, level)];
    })
    .join('');
}
