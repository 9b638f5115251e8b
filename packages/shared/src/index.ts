// Types
export type {
  CpuBucket,
  CpuTimes,
  CpuPercentages,
  CpuSnapshot,
  InterruptClass,
  InterruptStat,
  MemoryCounters,
  MemoryDerived,
  MemorySnapshot,
  DiskCounters,
  DiskRates,
  QueueStatus,
  DeviceStatus,
  DeviceInfo,
  DeviceStats,
  NumaNode,
  VmstatCounters,
  MemoryPressure,
  NumaImbalance,
  PerfEvent,
  PerfCounters,
  PerfMetrics,
  PerfMode,
  ProcessCounters,
  ProcessRates,
  ProcessFlags,
  ProcessRecord,
  IntensityCounts,
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
  Issue,
  IssueSeverity,
  EventBusMessage,
  EventSource,
} from './types/index.js';

export { CPU_BUCKETS, PERF_EVENTS } from './types/index.js';

// Constants
export {
  TICKSCOPE_VERSION,
  TICKSCOPE_CONFIG_FILES,
  DEFAULT_INTERVAL,
  DEFAULT_HOST_ROOT,
  PROC_STAT,
  PROC_INTERRUPTS,
  PROC_MEMINFO,
  PROC_DISKSTATS,
  PROC_VMSTAT,
  PROC_ROOT,
  SYS_BLOCK,
  SYS_NUMA_NODES,
  DEFAULT_DEVICE_PREFIXES,
  BYTES_PER_MB,
  NUMA_PRESSURE_WEIGHTS,
  SPARKLINE_POINTS,
} from './constants.js';

// Schemas
export {
  tickscopeConfigSchema,
  samplersSchema,
  cpuConfigSchema,
  memoryConfigSchema,
  storageConfigSchema,
  numaConfigSchema,
  perfConfigSchema,
  PERF_SOURCES,
  processConfigSchema,
  logConfigSchema,
} from './schemas/config.schema.js';

export type {
  TickscopeConfigInput,
  ValidatedConfig,
  ResolvedConfig,
  SamplersConfig,
  CpuConfig,
  MemoryConfig,
  StorageConfig,
  NumaConfig,
  PerfConfig,
  PerfSourceKind,
  ProcessConfig,
  LogConfig,
} from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatKilobytes,
  formatPercent,
} from './utils/parser.js';

export { resolveConfig } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  TickscopeError,
  SourceUnavailableError,
  ParseError,
  EntityVanishedError,
  ConfigValidationError,
} from './utils/errors.js';
