export const CPU_BUCKETS = [
  'user',
  'nice',
  'system',
  'idle',
  'iowait',
  'irq',
  'softirq',
  'steal',
  'guest',
  'guestNice',
] as const;

export type CpuBucket = (typeof CPU_BUCKETS)[number];

/** Cumulative jiffies per bucket, from the aggregate `cpu` row. */
export type CpuTimes = Record<CpuBucket, number>;

export type CpuPercentages = Record<CpuBucket, number>;

export interface CpuSnapshot {
  times: CpuTimes;
  /** Null until a second reading exists. */
  percentages: CpuPercentages | null;
}

export type InterruptClass = 'storm' | 'unbalanced' | 'balanced';

export interface InterruptStat {
  irq: string;
  counts: number[];
  total: number;
  maxCount: number;
  maxCpu: number;
  /** maxCount / total */
  balance: number;
  classification: InterruptClass;
  description: string;
  /** Interrupts raised since the previous tick, null on the first reading. */
  deltaTotal: number | null;
}
