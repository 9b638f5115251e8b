import type {
  CpuBucket,
  CpuConfig,
  CpuPercentages,
  CpuSnapshot,
  CpuTimes,
  InterruptStat,
  SamplerName,
} from '@tickscope/shared';
import { CPU_BUCKETS, getLogger, ParseError, PROC_INTERRUPTS, PROC_STAT } from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import { counterDelta, countCpus, lines, tokenize, toCounter } from '../sources/rows.js';
import { Sampler } from './Sampler.js';
import { analyzeInterrupts, interruptTotals, parseInterruptTable } from './interrupts.js';

function byBucket(value: (bucket: CpuBucket, index: number) => number): Record<CpuBucket, number> {
  return {
    user: value('user', 0),
    nice: value('nice', 1),
    system: value('system', 2),
    idle: value('idle', 3),
    iowait: value('iowait', 4),
    irq: value('irq', 5),
    softirq: value('softirq', 6),
    steal: value('steal', 7),
    guest: value('guest', 8),
    guestNice: value('guestNice', 9),
  };
}

/**
 * Reads the aggregate `cpu` row. Kernels older than 2.6.33 stop before the
 * guest buckets; missing trailing buckets read as zero.
 */
export function parseCpuTimes(statText: string): CpuTimes {
  const [first] = lines(statText);
  const tokens = first === undefined ? [] : tokenize(first);
  if (tokens[0] !== 'cpu') {
    throw new ParseError(PROC_STAT, `expected aggregate "cpu" row, got "${tokens[0] ?? ''}"`);
  }

  const fields = tokens.slice(1);
  if (fields.length < 4) {
    throw new ParseError(PROC_STAT, `aggregate row has ${fields.length} fields, need at least 4`);
  }

  return byBucket((bucket, index) => {
    const token = fields[index];
    return token === undefined ? 0 : toCounter(token, PROC_STAT, bucket);
  });
}

/** Null when no jiffies elapsed in any bucket. */
export function computeCpuPercentages(previous: CpuTimes, current: CpuTimes): CpuPercentages | null {
  const deltas = CPU_BUCKETS.map((bucket) => counterDelta(current[bucket], previous[bucket]));
  const total = deltas.reduce((a, b) => a + b, 0);
  if (total === 0) return null;

  return byBucket((_bucket, index) => (deltas[index] / total) * 100);
}

export class CpuSampler extends Sampler {
  readonly name: SamplerName = 'cpu';

  private config: CpuConfig;
  private current: CpuSnapshot | null = null;
  private previousTimes: CpuTimes | null = null;
  private interruptsAvailable = false;
  private interrupts: InterruptStat[] = [];
  private previousInterruptTotals: Map<string, number> | null = null;
  private cpuCount = 0;

  constructor(fs: HostFs, config: CpuConfig) {
    super(fs);
    this.config = config;
  }

  getCpuCount(): number {
    return this.cpuCount;
  }

  getTimes(): CpuTimes | null {
    return this.current ? { ...this.current.times } : null;
  }

  getPreviousTimes(): CpuTimes | null {
    return this.previousTimes ? { ...this.previousTimes } : null;
  }

  getPercentages(): CpuPercentages | null {
    return this.current?.percentages ? { ...this.current.percentages } : null;
  }

  getBucketPercent(bucket: CpuBucket): number | null {
    return this.current?.percentages?.[bucket] ?? null;
  }

  /** Everything that was not idle. */
  getCpuUsage(): number | null {
    const idle = this.getBucketPercent('idle');
    return idle === null ? null : 100 - idle;
  }

  getUserPercent(): number | null {
    return this.getBucketPercent('user');
  }

  getSystemPercent(): number | null {
    return this.getBucketPercent('system');
  }

  getIowaitPercent(): number | null {
    return this.getBucketPercent('iowait');
  }

  getStealPercent(): number | null {
    return this.getBucketPercent('steal');
  }

  hasInterruptData(): boolean {
    return this.interruptsAvailable;
  }

  getInterruptStats(): InterruptStat[] {
    return this.interrupts.map((stat) => ({ ...stat, counts: [...stat.counts] }));
  }

  getTopInterrupts(limit: number = this.config.topInterrupts): InterruptStat[] {
    return this.getInterruptStats().slice(0, limit);
  }

  getStormCount(): number {
    return this.interrupts.filter((stat) => stat.classification === 'storm').length;
  }

  protected open(): void {
    this.cpuCount = countCpus(this.fs.readText(PROC_STAT));
    this.interruptsAvailable = this.fs.exists(PROC_INTERRUPTS);
    if (!this.interruptsAvailable) {
      getLogger().debug({ source: PROC_INTERRUPTS }, 'Interrupt table not present, skipping IRQ analysis');
    }
  }

  protected sample(): void {
    const statText = this.fs.readText(PROC_STAT);
    const times = parseCpuTimes(statText);

    let interrupts: InterruptStat[] | null = null;
    let totals: Map<string, number> | null = null;
    if (this.interruptsAvailable) {
      const rows = parseInterruptTable(this.fs.readText(PROC_INTERRUPTS));
      interrupts = analyzeInterrupts(rows, this.previousInterruptTotals, this.config);
      totals = interruptTotals(rows);
    }

    let percentages = this.current?.percentages ?? null;
    if (this.current) {
      percentages = computeCpuPercentages(this.current.times, times) ?? percentages;
    }

    this.previousTimes = this.current?.times ?? null;
    this.current = { times, percentages };
    this.cpuCount = countCpus(statText);
    if (interrupts && totals) {
      this.interrupts = interrupts;
      this.previousInterruptTotals = totals;
    }
  }
}
