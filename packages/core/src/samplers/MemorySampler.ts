import type {
  MemoryConfig,
  MemoryCounters,
  MemoryDerived,
  MemorySnapshot,
  SamplerName,
} from '@tickscope/shared';
import { ParseError, PROC_MEMINFO } from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import { parseKeyValue } from '../sources/rows.js';
import { Sampler } from './Sampler.js';

export function parseMeminfo(text: string): MemoryCounters {
  const values = parseKeyValue(text);
  const memTotal = values.get('MemTotal');
  if (memTotal === undefined) {
    throw new ParseError(PROC_MEMINFO, 'MemTotal missing');
  }

  const read = (key: string): number => values.get(key) ?? 0;
  const memFree = read('MemFree');
  const buffers = read('Buffers');
  const cached = read('Cached');

  return {
    memTotal,
    memFree,
    // Kernels before 3.14 have no MemAvailable; estimate it the way free(1) did
    memAvailable: values.get('MemAvailable') ?? memFree + buffers + cached,
    buffers,
    cached,
    swapCached: read('SwapCached'),
    active: read('Active'),
    inactive: read('Inactive'),
    dirty: read('Dirty'),
    writeback: read('Writeback'),
  };
}

/** Percentages of the current reading alone; null when the total is zero. */
export function deriveMemory(counters: MemoryCounters, config: MemoryConfig): MemoryDerived | null {
  const total = counters.memTotal;
  if (total === 0) return null;

  const availablePercent = (counters.memAvailable / total) * 100;
  const memoryUsagePercent = ((total - counters.memAvailable) / total) * 100;
  const dirtyPercent = (counters.dirty / total) * 100;
  const writebackPercent = (counters.writeback / total) * 100;

  const combinedCache = counters.buffers + counters.cached;
  const totalCachePercent = (combinedCache / total) * 100;
  const bufferEfficiency = combinedCache > 0 ? (counters.buffers / combinedCache) * 100 : 0;
  const cacheEfficiency = combinedCache > 0 ? (counters.cached / combinedCache) * 100 : 0;

  const memoryPressure = availablePercent < config.pressureAvailablePercent;

  return {
    memoryUsagePercent,
    availablePercent,
    bufferEfficiency,
    cacheEfficiency,
    dirtyPercent,
    writebackPercent,
    totalCachePercent,
    memoryPressure,
    storageBottleneck:
      dirtyPercent > config.dirtyPercent ||
      writebackPercent > config.writebackPercent ||
      (memoryPressure && totalCachePercent < config.lowCachePercent),
    writeBottleneck: dirtyPercent > config.writeBottleneckDirtyPercent,
  };
}

export class MemorySampler extends Sampler {
  readonly name: SamplerName = 'memory';

  private config: MemoryConfig;
  private current: MemorySnapshot | null = null;

  constructor(fs: HostFs, config: MemoryConfig) {
    super(fs);
    this.config = config;
  }

  /** Memory figures are gauges, so the first reading is already complete. */
  override isFirstReading(): boolean {
    return this.sampleCount < 1;
  }

  getSnapshot(): MemorySnapshot | null {
    if (!this.current) return null;
    return {
      counters: { ...this.current.counters },
      derived: this.current.derived ? { ...this.current.derived } : null,
    };
  }

  getCounters(): MemoryCounters | null {
    return this.current ? { ...this.current.counters } : null;
  }

  getMemoryUsagePercent(): number | null {
    return this.current?.derived?.memoryUsagePercent ?? null;
  }

  getAvailablePercent(): number | null {
    return this.current?.derived?.availablePercent ?? null;
  }

  getAvailableKb(): number | null {
    return this.current?.counters.memAvailable ?? null;
  }

  getBufferEfficiency(): number | null {
    return this.current?.derived?.bufferEfficiency ?? null;
  }

  getCacheEfficiency(): number | null {
    return this.current?.derived?.cacheEfficiency ?? null;
  }

  getDirtyPercent(): number | null {
    return this.current?.derived?.dirtyPercent ?? null;
  }

  getWritebackPercent(): number | null {
    return this.current?.derived?.writebackPercent ?? null;
  }

  getTotalCachePercent(): number | null {
    return this.current?.derived?.totalCachePercent ?? null;
  }

  hasMemoryPressure(): boolean {
    return this.current?.derived?.memoryPressure ?? false;
  }

  hasStorageBottleneck(): boolean {
    return this.current?.derived?.storageBottleneck ?? false;
  }

  hasWriteBottleneck(): boolean {
    return this.current?.derived?.writeBottleneck ?? false;
  }

  protected open(): void {
    this.fs.readText(PROC_MEMINFO);
  }

  protected sample(): void {
    const counters = parseMeminfo(this.fs.readText(PROC_MEMINFO));
    this.current = { counters, derived: deriveMemory(counters, this.config) };
  }
}
