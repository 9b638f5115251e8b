import type {
  PerfConfig,
  PerfCounters,
  PerfEvent,
  PerfMetrics,
  PerfMode,
  SamplerName,
} from '@tickscope/shared';
import { PERF_EVENTS, ParseError } from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import { counterDelta } from '../sources/rows.js';
import { Sampler } from './Sampler.js';
import type { PerfCounterHandle, PerfCounterSource } from './PerfCounterSource.js';

export function computePerfMetrics(
  previous: PerfCounters,
  current: PerfCounters,
  config: PerfConfig,
): PerfMetrics {
  const delta = (event: PerfEvent): number => counterDelta(current[event], previous[event]);

  const cycles = delta('cycles');
  const instructions = delta('instructions');
  const references = delta('cacheReferences');
  const misses = delta('cacheMisses');
  const branches = delta('branchInstructions');
  const branchMisses = delta('branchMisses');

  const cacheHitRate = references > 0 ? ((references - Math.min(misses, references)) / references) * 100 : 0;
  const branchMissRate = branches > 0 ? (branchMisses / branches) * 100 : 0;

  return {
    ipc: cycles > 0 ? instructions / cycles : 0,
    cacheHitRate,
    branchMissRate,
    contextSwitchRate: delta('contextSwitches'),
    pageFaultRate: delta('pageFaults'),
    cacheThrashing: references > 0 && cacheHitRate < config.cacheThrashingHitRate,
    branchMispredicting: branches > 0 && branchMissRate > config.branchMissRate,
  };
}

export class PerfCounterSampler extends Sampler {
  readonly name: SamplerName = 'perf';

  private config: PerfConfig;
  private source: PerfCounterSource;
  private handles: Map<PerfEvent, PerfCounterHandle> = new Map();
  private mode: PerfMode = 'uninitialized';
  private previous: PerfCounters | null = null;
  private current: PerfCounters | null = null;
  private metrics: PerfMetrics | null = null;

  constructor(fs: HostFs, config: PerfConfig, source: PerfCounterSource) {
    super(fs);
    this.config = config;
    this.source = source;
  }

  getMode(): PerfMode {
    return this.mode;
  }

  getSourceDescription(): string {
    return this.source.description;
  }

  getCounters(): PerfCounters | null {
    return this.current ? { ...this.current } : null;
  }

  getPreviousCounters(): PerfCounters | null {
    return this.previous ? { ...this.previous } : null;
  }

  getMetrics(): PerfMetrics | null {
    return this.metrics ? { ...this.metrics } : null;
  }

  getIPC(): number | null {
    return this.metrics?.ipc ?? null;
  }

  getCacheHitRate(): number | null {
    return this.metrics?.cacheHitRate ?? null;
  }

  getBranchMissRate(): number | null {
    return this.metrics?.branchMissRate ?? null;
  }

  getContextSwitchRate(): number | null {
    return this.metrics?.contextSwitchRate ?? null;
  }

  getPageFaultRate(): number | null {
    return this.metrics?.pageFaultRate ?? null;
  }

  isCacheThrashing(): boolean {
    return this.metrics?.cacheThrashing ?? false;
  }

  isBranchMispredicting(): boolean {
    return this.metrics?.branchMispredicting ?? false;
  }

  override close(): void {
    for (const handle of this.handles.values()) {
      handle.close();
    }
    this.handles.clear();
  }

  /**
   * All eight events or none: a partial set cannot produce every metric, so
   * any failure closes what did open and leaves the sampler unavailable.
   */
  protected open(): void {
    try {
      for (const event of PERF_EVENTS) {
        this.handles.set(event, this.source.open(event));
      }
      this.mode = 'counters';
    } catch (err) {
      this.close();
      this.mode = 'unavailable';
      throw err;
    }
  }

  protected sample(): void {
    const counters = this.readCounters();
    this.metrics = this.current ? computePerfMetrics(this.current, counters, this.config) : null;
    this.previous = this.current;
    this.current = counters;
  }

  private readCounters(): PerfCounters {
    const read = (event: PerfEvent): number => {
      const handle = this.handles.get(event);
      if (!handle) {
        throw new ParseError(`perf:${event}`, 'counter is not open');
      }
      const value = handle.read();
      if (!Number.isFinite(value) || value < 0) {
        throw new ParseError(`perf:${event}`, `invalid reading ${value}`);
      }
      return value;
    };

    return {
      cycles: read('cycles'),
      instructions: read('instructions'),
      cacheReferences: read('cacheReferences'),
      cacheMisses: read('cacheMisses'),
      branchInstructions: read('branchInstructions'),
      branchMisses: read('branchMisses'),
      contextSwitches: read('contextSwitches'),
      pageFaults: read('pageFaults'),
    };
  }
}
