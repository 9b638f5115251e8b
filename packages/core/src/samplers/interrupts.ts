import type { CpuConfig, InterruptClass, InterruptStat } from '@tickscope/shared';
import { ParseError, PROC_INTERRUPTS } from '@tickscope/shared';
import irqClasses from '../data/irq-classes.json' with { type: 'json' };
import { counterDelta, lines, tokenize } from '../sources/rows.js';

const IRQ_CLASSES: ReadonlyMap<string, string> = new Map(Object.entries(irqClasses));

export interface InterruptRow {
  irq: string;
  /** Per-CPU counts, ordered by CPU index. Summary rows such as ERR carry one. */
  counts: number[];
  description: string;
}

export type InterruptAnalysisOptions = Pick<
  CpuConfig,
  'interruptActivityFloor' | 'stormRatio' | 'unbalancedRatio' | 'minCpuCounters'
>;

export function parseInterruptTable(text: string): InterruptRow[] {
  const [header, ...body] = lines(text);
  if (header === undefined) {
    throw new ParseError(PROC_INTERRUPTS, 'empty table');
  }

  const cpuCount = tokenize(header).filter((token) => /^CPU\d+$/.test(token)).length;
  if (cpuCount === 0) {
    throw new ParseError(PROC_INTERRUPTS, 'no CPU columns in header');
  }

  const rows: InterruptRow[] = [];
  for (const line of body) {
    const tokens = tokenize(line);
    const label = tokens[0];
    if (label === undefined || !label.endsWith(':')) continue;

    const counts: number[] = [];
    let i = 1;
    while (i < tokens.length && counts.length < cpuCount && /^\d+$/.test(tokens[i])) {
      counts.push(Number(tokens[i]));
      i++;
    }

    rows.push({
      irq: label.slice(0, -1),
      counts,
      description: tokens.slice(i).join(' '),
    });
  }
  return rows;
}

export function describeIrq(irq: string, fallback: string = ''): string {
  return IRQ_CLASSES.get(irq) ?? (fallback.length > 0 ? fallback : 'unknown');
}

export function classifyBalance(
  balance: number,
  options: Pick<CpuConfig, 'stormRatio' | 'unbalancedRatio'>,
): InterruptClass {
  if (balance > options.stormRatio) return 'storm';
  if (balance > options.unbalancedRatio) return 'unbalanced';
  return 'balanced';
}

/**
 * Classifies each busy IRQ by how concentrated it is on one CPU. Rows with
 * too few per-CPU columns or a total under the activity floor are left out.
 * Storms sort first, then everything by total, descending.
 */
export function analyzeInterrupts(
  rows: InterruptRow[],
  previousTotals: ReadonlyMap<string, number> | null,
  options: InterruptAnalysisOptions,
): InterruptStat[] {
  const stats: InterruptStat[] = [];

  for (const row of rows) {
    if (row.counts.length < options.minCpuCounters) continue;

    const total = row.counts.reduce((a, b) => a + b, 0);
    if (total === 0 || total < options.interruptActivityFloor) continue;

    let maxCount = 0;
    let maxCpu = 0;
    row.counts.forEach((count, cpu) => {
      if (count > maxCount) {
        maxCount = count;
        maxCpu = cpu;
      }
    });

    const balance = maxCount / total;
    const previousTotal = previousTotals?.get(row.irq);

    stats.push({
      irq: row.irq,
      counts: [...row.counts],
      total,
      maxCount,
      maxCpu,
      balance,
      classification: classifyBalance(balance, options),
      description: describeIrq(row.irq, row.description),
      deltaTotal: previousTotal === undefined ? null : counterDelta(total, previousTotal),
    });
  }

  return stats.sort((a, b) => {
    const aStorm = a.classification === 'storm' ? 1 : 0;
    const bStorm = b.classification === 'storm' ? 1 : 0;
    if (aStorm !== bStorm) return bStorm - aStorm;
    return b.total - a.total;
  });
}

export function interruptTotals(rows: InterruptRow[]): Map<string, number> {
  return new Map(rows.map((row) => [row.irq, row.counts.reduce((a, b) => a + b, 0)]));
}
