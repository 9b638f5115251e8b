import { ParseError } from '@tickscope/shared';

export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter((token) => token.length > 0);
}

export function lines(text: string): string[] {
  return text.split('\n').filter((line) => line.trim().length > 0);
}

/** Parses a non-negative integer counter field. */
export function toCounter(token: string | undefined, source: string, field: string): number {
  if (token === undefined || !/^\d+$/.test(token)) {
    throw new ParseError(source, `${field} is not a counter: ${token ?? '<missing>'}`);
  }
  return Number(token);
}

/**
 * `Key:   value [unit]` rows, as in meminfo, status and io. Rows whose value
 * is not numeric (Name, State, Cpus_allowed_list ...) are skipped.
 */
export function parseKeyValue(text: string): Map<string, number> {
  const values = new Map<string, number>();
  for (const line of lines(text)) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const key = line.slice(0, colon).trim();
    const [value] = tokenize(line.slice(colon + 1));
    if (value !== undefined && /^\d+$/.test(value)) {
      values.set(key, Number(value));
    }
  }
  return values;
}

/** `key value` rows, as in vmstat. */
export function parseKeySpaceValue(text: string): Map<string, number> {
  const values = new Map<string, number>();
  for (const line of lines(text)) {
    const [key, value] = tokenize(line);
    if (key !== undefined && value !== undefined && /^\d+$/.test(value)) {
      values.set(key, Number(value));
    }
  }
  return values;
}

/** Difference of two monotonic readings; a counter that went backwards yields 0. */
export function counterDelta(current: number, previous: number): number {
  return current >= previous ? current - previous : 0;
}

/** Counts the per-CPU `cpuN` rows of a `/proc/stat` body. */
export function countCpus(statText: string): number {
  return lines(statText).filter((line) => /^cpu\d+\s/.test(line)).length;
}

/** Expands a kernel range list such as `0-3,8-11` into its members. */
export function parseCpuList(list: string, source: string = 'cpulist'): number[] {
  const trimmed = list.trim();
  if (trimmed.length === 0) return [];

  const cpus: number[] = [];
  for (const part of trimmed.split(',')) {
    const match = /^(\d+)(?:-(\d+))?$/.exec(part.trim());
    if (!match) {
      throw new ParseError(source, `bad range "${part}"`);
    }
    const start = Number(match[1]);
    const end = match[2] !== undefined ? Number(match[2]) : start;
    if (end < start) {
      throw new ParseError(source, `descending range "${part}"`);
    }
    for (let cpu = start; cpu <= end; cpu++) {
      cpus.push(cpu);
    }
  }
  return cpus;
}
