export type {
  CpuBucket,
  CpuTimes,
  CpuPercentages,
  CpuSnapshot,
  InterruptClass,
  InterruptStat,
} from './cpu.js';

export { CPU_BUCKETS } from './cpu.js';

export type { MemoryCounters, MemoryDerived, MemorySnapshot } from './memory.js';

export type {
  DiskCounters,
  DiskRates,
  QueueStatus,
  DeviceStatus,
  DeviceInfo,
  DeviceStats,
} from './storage.js';

export type { NumaNode, VmstatCounters, MemoryPressure, NumaImbalance } from './numa.js';

export type { PerfEvent, PerfCounters, PerfMetrics, PerfMode } from './perf.js';

export { PERF_EVENTS } from './perf.js';

export type {
  ProcessCounters,
  ProcessRates,
  ProcessFlags,
  ProcessRecord,
  IntensityCounts,
} from './process.js';

export type {
  SamplerName,
  SamplerState,
  SamplerStatus,
  CpuView,
  MemoryView,
  StorageView,
  NumaView,
  PerfView,
  ProcessView,
  HostSnapshot,
} from './snapshot.js';

export type { Issue, IssueSeverity } from './issues.js';

export type { EventBusMessage, EventSource } from './events.js';
