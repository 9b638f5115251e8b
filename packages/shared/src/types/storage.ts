export interface DiskCounters {
  reads: number;
  readMerges: number;
  readSectors: number;
  readTime: number;
  writes: number;
  writeMerges: number;
  writeSectors: number;
  writeTime: number;
  ioInProgress: number;
  ioTime: number;
  weightedIoTime: number;
}

/** Per-tick figures; with a 1s tick these read as per-second rates. */
export interface DiskRates {
  readIops: number;
  writeIops: number;
  totalIops: number;
  readMbps: number;
  writeMbps: number;
  totalMbps: number;
  avgLatencyMs: number;
}

export type QueueStatus = 'bottleneck' | 'warning' | 'normal';

export type DeviceStatus = QueueStatus | 'hot';

export interface DeviceInfo {
  name: string;
  scheduler: string | null;
  maxQueueDepth: number | null;
}

export interface DeviceStats {
  name: string;
  counters: DiskCounters;
  rates: DiskRates | null;
  queueDepth: number;
  queueUtilization: number;
  queueStatus: QueueStatus;
  isHot: boolean;
  status: DeviceStatus;
  scheduler: string | null;
  maxQueueDepth: number | null;
}
