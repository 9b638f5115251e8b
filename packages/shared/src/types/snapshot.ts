import type { CpuPercentages, InterruptStat } from './cpu.js';
import type { MemoryCounters, MemoryDerived } from './memory.js';
import type { DeviceStats } from './storage.js';
import type { MemoryPressure, NumaImbalance, NumaNode, VmstatCounters } from './numa.js';
import type { PerfMetrics, PerfMode } from './perf.js';
import type { IntensityCounts, ProcessRecord } from './process.js';

export type SamplerName = 'cpu' | 'memory' | 'storage' | 'numa' | 'perf' | 'process';

export type SamplerState = 'uninitialized' | 'ready' | 'disabled';

export interface SamplerStatus {
  name: SamplerName;
  state: SamplerState;
  firstReading: boolean;
  lastError: string | null;
}

export interface CpuView {
  usagePercent: number | null;
  percentages: CpuPercentages | null;
  topInterrupts: InterruptStat[];
}

export interface MemoryView {
  counters: MemoryCounters;
  derived: MemoryDerived | null;
}

export interface StorageView {
  devices: DeviceStats[];
  totalIops: number;
  totalMbps: number;
  hotDeviceCount: number;
  bottleneckCount: number;
  warningCount: number;
}

export interface NumaView {
  nodes: NumaNode[];
  averageUsagePercent: number;
  vmstat: VmstatCounters;
  pressure: MemoryPressure | null;
  imbalance: NumaImbalance;
}

export interface PerfView {
  mode: PerfMode;
  /** Description of the counter source, e.g. `simulated`. */
  source: string;
  metrics: PerfMetrics | null;
}

export interface ProcessView {
  count: number;
  topCpu: ProcessRecord[];
  topMemory: ProcessRecord[];
  topIo: ProcessRecord[];
  intensity: IntensityCounts;
}

/**
 * Everything one tick produced. Views are copies; nothing here aliases
 * sampler state. A view is null when its sampler is not enabled, disabled,
 * or failed this tick before it ever produced a reading.
 */
export interface HostSnapshot {
  tick: number;
  timestamp: Date;
  samplers: SamplerStatus[];
  cpu: CpuView | null;
  memory: MemoryView | null;
  storage: StorageView | null;
  numa: NumaView | null;
  perf: PerfView | null;
  process: ProcessView | null;
}
