import type {
  CpuView,
  HostSnapshot,
  MemoryView,
  NumaView,
  PerfView,
  ProcessView,
  ResolvedConfig,
  SamplerName,
  StorageView,
} from '@tickscope/shared';
import { getLogger } from '@tickscope/shared';
import { EventBus } from '../events/EventBus.js';
import { CpuSampler } from '../samplers/CpuSampler.js';
import { MemorySampler } from '../samplers/MemorySampler.js';
import { NumaSampler } from '../samplers/NumaSampler.js';
import { PerfCounterSampler } from '../samplers/PerfCounterSampler.js';
import type { PerfCounterSource } from '../samplers/PerfCounterSource.js';
import { createPerfSource } from '../samplers/PerfCounterSource.js';
import { ProcessSampler } from '../samplers/ProcessSampler.js';
import { StorageSampler } from '../samplers/StorageSampler.js';
import type { Clock } from '../samplers/ProcessSampler.js';
import type { Sampler } from '../samplers/Sampler.js';
import type { HostFs } from '../sources/HostFs.js';
import { ProcHostFs } from '../sources/ProcHostFs.js';

export interface CollectorOptions {
  config: ResolvedConfig;
  fs?: HostFs;
  perfSource?: PerfCounterSource;
  eventBus?: EventBus;
  clock?: Clock;
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Owns the enabled samplers and drives them one tick at a time. A tick runs
 * every sampler's `update()` in turn and only then publishes one snapshot,
 * so no partial tick is ever visible.
 */
export class Collector {
  readonly eventBus: EventBus;

  readonly cpu: CpuSampler | null;
  readonly memory: MemorySampler | null;
  readonly storage: StorageSampler | null;
  readonly numa: NumaSampler | null;
  readonly perf: PerfCounterSampler | null;
  readonly process: ProcessSampler | null;

  private config: ResolvedConfig;
  private clock: Clock;
  private samplers: Sampler[];
  private announcedDisabled: Set<SamplerName> = new Set();
  private tickCount = 0;
  private latest: HostSnapshot | null = null;
  private closed = false;

  constructor(options: CollectorOptions) {
    const { config } = options;
    const fs = options.fs ?? new ProcHostFs(config.hostRoot);
    const enabled = config.samplers;

    this.config = config;
    this.clock = options.clock ?? Date.now;
    this.eventBus = options.eventBus ?? new EventBus();

    this.cpu = enabled.cpu ? new CpuSampler(fs, config.cpu) : null;
    this.memory = enabled.memory ? new MemorySampler(fs, config.memory) : null;
    this.storage = enabled.storage ? new StorageSampler(fs, config.storage) : null;
    this.numa = enabled.numa ? new NumaSampler(fs, config.numa) : null;
    this.perf = enabled.perf
      ? new PerfCounterSampler(
          fs,
          config.perf,
          options.perfSource ?? createPerfSource(config.perf.source),
        )
      : null;
    this.process = enabled.process ? new ProcessSampler(fs, config.process, this.clock) : null;

    const all: (Sampler | null)[] = [
      this.cpu,
      this.memory,
      this.storage,
      this.numa,
      this.perf,
      this.process,
    ];
    this.samplers = all.filter((sampler): sampler is Sampler => sampler !== null);
  }

  getSamplers(): Sampler[] {
    return [...this.samplers];
  }

  /** Opens every enabled sampler. Returns how many are usable. */
  initialize(): number {
    let ready = 0;
    for (const sampler of this.samplers) {
      if (sampler.initialize().ok) {
        ready++;
      } else {
        this.announceDisabled(sampler);
      }
    }
    return ready;
  }

  hasActiveSamplers(): boolean {
    return this.samplers.some((sampler) => sampler.getState() !== 'disabled');
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getLatest(): HostSnapshot | null {
    return this.latest;
  }

  tick(): HostSnapshot {
    this.tickCount++;

    for (const sampler of this.samplers) {
      if (sampler.getState() === 'disabled') continue;

      const result = sampler.update();
      if (result.ok) continue;

      if (sampler.getState() === 'disabled') {
        this.announceDisabled(sampler);
      } else {
        this.eventBus.emit('sampler:error', {
          sampler: sampler.name,
          code: result.error.code,
          message: result.error.message,
          tick: this.tickCount,
        });
      }
    }

    const snapshot = this.buildSnapshot();
    this.latest = snapshot;
    this.eventBus.emit('tick:complete', snapshot);
    return snapshot;
  }

  /**
   * Ticks, then sleeps for the configured interval, until `signal` aborts.
   * The signal is checked before each tick and cuts the sleep short; every
   * sampler is closed on the way out.
   */
  async run(signal: AbortSignal, onTick?: (snapshot: HostSnapshot) => void): Promise<void> {
    const logger = getLogger();
    this.initialize();
    this.eventBus.emit('collector:start', {
      interval: this.config.interval,
      samplers: this.samplers.map((sampler) => sampler.name),
    });
    logger.info({ interval: this.config.interval }, 'Collector started');

    try {
      while (!signal.aborted) {
        const snapshot = this.tick();
        onTick?.(snapshot);
        await sleep(this.config.interval, signal);
      }
    } finally {
      this.close();
      this.eventBus.emit('collector:stop', { ticks: this.tickCount });
      logger.info({ ticks: this.tickCount }, 'Collector stopped');
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sampler of this.samplers) {
      sampler.close();
    }
  }

  private announceDisabled(sampler: Sampler): void {
    if (this.announcedDisabled.has(sampler.name)) return;
    this.announcedDisabled.add(sampler.name);
    const error = sampler.getLastError();
    this.eventBus.emit('sampler:disabled', {
      sampler: sampler.name,
      code: error?.code ?? 'SOURCE_UNAVAILABLE',
      message: error?.message ?? `${sampler.name} sampler disabled`,
      tick: this.tickCount,
    });
  }

  private buildSnapshot(): HostSnapshot {
    return {
      tick: this.tickCount,
      timestamp: new Date(this.clock()),
      samplers: this.samplers.map((sampler) => sampler.getStatus()),
      cpu: this.cpuView(),
      memory: this.memoryView(),
      storage: this.storageView(),
      numa: this.numaView(),
      perf: this.perfView(),
      process: this.processView(),
    };
  }

  private cpuView(): CpuView | null {
    const cpu = this.cpu;
    if (!cpu || !cpu.hasReading()) return null;
    return {
      usagePercent: cpu.getCpuUsage(),
      percentages: cpu.getPercentages(),
      topInterrupts: cpu.getTopInterrupts(),
    };
  }

  private memoryView(): MemoryView | null {
    return this.memory?.getSnapshot() ?? null;
  }

  private storageView(): StorageView | null {
    const storage = this.storage;
    if (!storage || !storage.hasReading()) return null;
    return {
      devices: storage.getDevices(),
      totalIops: storage.getTotalIOPS(),
      totalMbps: storage.getTotalThroughput(),
      hotDeviceCount: storage.getHotDeviceCount(),
      bottleneckCount: storage.getBottleneckCount(),
      warningCount: storage.getWarningCount(),
    };
  }

  private numaView(): NumaView | null {
    const numa = this.numa;
    const vmstat = numa?.getVmstat();
    if (!numa || !vmstat) return null;
    return {
      nodes: numa.getNodes(),
      averageUsagePercent: numa.getTotalMemoryUsage(),
      vmstat,
      pressure: numa.getPressure(),
      imbalance: numa.getImbalance(),
    };
  }

  private perfView(): PerfView | null {
    const perf = this.perf;
    if (!perf || perf.getState() === 'uninitialized') return null;
    return { mode: perf.getMode(), source: perf.getSourceDescription(), metrics: perf.getMetrics() };
  }

  private processView(): ProcessView | null {
    const process = this.process;
    if (!process || !process.hasReading()) return null;
    return {
      count: process.getProcessCount(),
      topCpu: process.getTopCPUProcesses(),
      topMemory: process.getTopMemoryProcesses(),
      topIo: process.getTopIOProcesses(),
      intensity: process.getIntensityCounts(),
    };
  }
}
