export interface ProcessCounters {
  utime: number;
  stime: number;
  cutime: number;
  cstime: number;
  numThreads: number;
  vsize: number;
  rss: number;
  minflt: number;
  majflt: number;
  cminflt: number;
  cmajflt: number;
  voluntaryCtxtSwitches: number;
  nonvoluntaryCtxtSwitches: number;
  rchar: number;
  wchar: number;
  syscr: number;
  syscw: number;
  readBytes: number;
  writeBytes: number;
}

export interface ProcessRates {
  /** Percent of one CPU over the wall-clock time since the previous tick. */
  cpuUsagePercent: number;
  cacheHitRate: number;
  ioEfficiency: number;
  cpuEfficiency: number;
  contextSwitchRate: number;
  pageFaultRate: number;
}

export interface ProcessFlags {
  cpuIntensive: boolean;
  memoryIntensive: boolean;
  ioIntensive: boolean;
  contextSwitchingHeavy: boolean;
  pageFaultingHeavy: boolean;
}

export interface ProcessRecord {
  pid: number;
  comm: string;
  state: string;
  counters: ProcessCounters;
  memoryUsageMb: number;
  rates: ProcessRates | null;
  flags: ProcessFlags;
  sampledAt: number;
}

export type IntensityCounts = Record<keyof ProcessFlags, number>;
