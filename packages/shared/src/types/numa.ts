export interface NumaNode {
  id: number;
  cpuCores: number[];
  memTotalKb: number;
  memFreeKb: number;
  memUsedKb: number;
  usagePercent: number;
  /** True for the single fallback node used when no topology is exposed. */
  synthetic: boolean;
}

export interface VmstatCounters {
  pgfault: number;
  pgmajfault: number;
  pgpgin: number;
  pgpgout: number;
  pswpin: number;
  pswpout: number;
  pgsteal: number;
  pgscanKswapd: number;
  pgscanDirect: number;
  nrDirty: number;
  nrWriteback: number;
  nrUnstable: number;
  nrSlabReclaimable: number;
  nrSlabUnreclaimable: number;
}

export interface MemoryPressure {
  pageFaultRate: number;
  majorFaultRate: number;
  swapRate: number;
  scanRate: number;
  score: number;
  isSwapping: boolean;
  isMemoryPressured: boolean;
}

export interface NumaImbalance {
  spread: number;
  imbalanced: boolean;
}
