// Counter sources
export type { HostFs } from './sources/HostFs.js';
export { ProcHostFs } from './sources/ProcHostFs.js';
export {
  tokenize,
  lines,
  toCounter,
  parseKeyValue,
  parseKeySpaceValue,
  counterDelta,
  countCpus,
  parseCpuList,
} from './sources/rows.js';

// Samplers
export { Sampler } from './samplers/Sampler.js';
export type { SampleResult } from './samplers/Sampler.js';
export { CpuSampler, parseCpuTimes, computeCpuPercentages } from './samplers/CpuSampler.js';
export {
  parseInterruptTable,
  analyzeInterrupts,
  classifyBalance,
  describeIrq,
} from './samplers/interrupts.js';
export type { InterruptRow, InterruptAnalysisOptions } from './samplers/interrupts.js';
export { MemorySampler, parseMeminfo, deriveMemory } from './samplers/MemorySampler.js';
export {
  StorageSampler,
  parseDiskCounters,
  computeDiskRates,
  classifyQueue,
  parseScheduler,
  selectHotDevices,
} from './samplers/StorageSampler.js';
export {
  NumaSampler,
  parseVmstat,
  parseNodeMeminfo,
  computePressure,
  computeImbalance,
} from './samplers/NumaSampler.js';
export { PerfCounterSampler, computePerfMetrics } from './samplers/PerfCounterSampler.js';
export {
  UnavailablePerfSource,
  SimulatedPerfSource,
  createPerfSource,
} from './samplers/PerfCounterSource.js';
export type { PerfCounterSource, PerfCounterHandle } from './samplers/PerfCounterSource.js';
export {
  ProcessSampler,
  parseProcStat,
  computeProcessRates,
  classifyProcess,
} from './samplers/ProcessSampler.js';
export type { Clock, StatFields } from './samplers/ProcessSampler.js';

// Analysis
export { IssueDetector, detectIssues, DEFAULT_ISSUE_THRESHOLDS } from './analysis/IssueDetector.js';
export type { IssueThresholds } from './analysis/IssueDetector.js';

// Events
export { EventBus } from './events/EventBus.js';
export type {
  EventName,
  SamplerErrorEvent,
  CollectorStartEvent,
  CollectorStopEvent,
} from './events/EventBus.js';

// Collector
export { Collector } from './collector/Collector.js';
export type { CollectorOptions } from './collector/Collector.js';
