export const PERF_EVENTS = [
  'cycles',
  'instructions',
  'cacheReferences',
  'cacheMisses',
  'branchInstructions',
  'branchMisses',
  'contextSwitches',
  'pageFaults',
] as const;

export type PerfEvent = (typeof PERF_EVENTS)[number];

export type PerfCounters = Record<PerfEvent, number>;

export interface PerfMetrics {
  ipc: number;
  cacheHitRate: number;
  branchMissRate: number;
  contextSwitchRate: number;
  pageFaultRate: number;
  cacheThrashing: boolean;
  branchMispredicting: boolean;
}

export type PerfMode = 'uninitialized' | 'counters' | 'unavailable';
