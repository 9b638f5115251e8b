/** Values from the memory accounting source, all in kB. */
export interface MemoryCounters {
  memTotal: number;
  memFree: number;
  memAvailable: number;
  buffers: number;
  cached: number;
  swapCached: number;
  active: number;
  inactive: number;
  dirty: number;
  writeback: number;
}

export interface MemoryDerived {
  memoryUsagePercent: number;
  availablePercent: number;
  bufferEfficiency: number;
  cacheEfficiency: number;
  dirtyPercent: number;
  writebackPercent: number;
  totalCachePercent: number;
  memoryPressure: boolean;
  storageBottleneck: boolean;
  writeBottleneck: boolean;
}

export interface MemorySnapshot {
  counters: MemoryCounters;
  /** Null when the source reports a zero total. */
  derived: MemoryDerived | null;
}
