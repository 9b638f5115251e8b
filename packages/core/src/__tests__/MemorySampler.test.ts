import { beforeEach, describe, expect, it } from 'vitest';
import { memoryConfigSchema, ParseError } from '@tickscope/shared';
import { deriveMemory, MemorySampler, parseMeminfo } from '../samplers/MemorySampler.js';
import { MemoryHostFs } from './helpers/MemoryHostFs.js';

interface MeminfoFields {
  MemTotal: number;
  MemFree: number;
  MemAvailable?: number;
  Buffers: number;
  Cached: number;
  Dirty: number;
  Writeback: number;
}

const BASE: MeminfoFields = {
  MemTotal: 1_000_000,
  MemFree: 100_000,
  MemAvailable: 400_000,
  Buffers: 50_000,
  Cached: 150_000,
  Dirty: 10_000,
  Writeback: 0,
};

function meminfo(fields: MeminfoFields): string {
  return (
    Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${`${key}:`.padEnd(16)}${String(value).padStart(10)} kB`)
      .join('\n') + '\nSwapCached:            0 kB\nActive:           300000 kB\nInactive:         200000 kB\n'
  );
}

describe('MemorySampler', () => {
  let fs: MemoryHostFs;
  let sampler: MemorySampler;

  beforeEach(() => {
    fs = new MemoryHostFs().set('/proc/meminfo', meminfo(BASE));
    sampler = new MemorySampler(fs, memoryConfigSchema.parse({}));
  });

  it('should derive percentages from the very first reading', () => {
    expect(sampler.isFirstReading()).toBe(true);
    sampler.update();

    expect(sampler.isFirstReading()).toBe(false);
    expect(sampler.getMemoryUsagePercent()).toBeCloseTo(60);
    expect(sampler.getAvailablePercent()).toBeCloseTo(40);
    expect(sampler.getAvailableKb()).toBe(400_000);
  });

  it('should keep usage and available percentages summing to 100', () => {
    fs.set('/proc/meminfo', meminfo({ ...BASE, MemTotal: 777_777, MemAvailable: 123_457 }));
    sampler.update();

    const usage = sampler.getMemoryUsagePercent() ?? 0;
    const available = sampler.getAvailablePercent() ?? 0;
    expect(usage + available).toBeCloseTo(100, 9);
  });

  it('should split cache efficiency between buffers and page cache', () => {
    sampler.update();

    expect(sampler.getBufferEfficiency()).toBeCloseTo(25);
    expect(sampler.getCacheEfficiency()).toBeCloseTo(75);
    expect(sampler.getTotalCachePercent()).toBeCloseTo(20);
    expect(sampler.getDirtyPercent()).toBeCloseTo(1);
  });

  it('should raise no flags on a healthy host', () => {
    sampler.update();

    expect(sampler.hasMemoryPressure()).toBe(false);
    expect(sampler.hasStorageBottleneck()).toBe(false);
    expect(sampler.hasWriteBottleneck()).toBe(false);
  });

  it('should flag pressure below 10% available, and a storage bottleneck when cache is low too', () => {
    fs.set(
      '/proc/meminfo',
      meminfo({ ...BASE, MemAvailable: 50_000, Buffers: 10_000, Cached: 100_000, Dirty: 0 }),
    );
    sampler.update();

    expect(sampler.getAvailablePercent()).toBeCloseTo(5);
    expect(sampler.hasMemoryPressure()).toBe(true);
    expect(sampler.hasStorageBottleneck()).toBe(true);
    expect(sampler.hasWriteBottleneck()).toBe(false);
  });

  it('should flag a write bottleneck above 5% dirty', () => {
    fs.set('/proc/meminfo', meminfo({ ...BASE, Dirty: 60_000 }));
    sampler.update();

    expect(sampler.hasWriteBottleneck()).toBe(true);
    expect(sampler.hasStorageBottleneck()).toBe(true);
  });

  it('should flag a storage bottleneck above 1% writeback', () => {
    fs.set('/proc/meminfo', meminfo({ ...BASE, Writeback: 20_000 }));
    sampler.update();

    expect(sampler.getWritebackPercent()).toBeCloseTo(2);
    expect(sampler.hasStorageBottleneck()).toBe(true);
  });

  it('should report no percentages for a zero total', () => {
    fs.set('/proc/meminfo', meminfo({ ...BASE, MemTotal: 0 }));

    expect(sampler.update()).toEqual({ ok: true });
    expect(sampler.getMemoryUsagePercent()).toBeNull();
    expect(sampler.hasMemoryPressure()).toBe(false);
    expect(sampler.getSnapshot()?.derived).toBeNull();
  });

  it('should keep the last good snapshot when MemTotal is missing', () => {
    sampler.update();
    fs.set('/proc/meminfo', 'MemFree: 10 kB\n');

    const result = sampler.update();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
    }
    expect(sampler.getMemoryUsagePercent()).toBeCloseTo(60);
  });

  it('should hand out copies of the snapshot', () => {
    sampler.update();
    const snapshot = sampler.getSnapshot();
    if (snapshot) snapshot.counters.memTotal = 1;

    expect(sampler.getCounters()?.memTotal).toBe(1_000_000);
  });
});

describe('parseMeminfo', () => {
  it('should estimate MemAvailable on kernels that lack it', () => {
    const counters = parseMeminfo(meminfo({ ...BASE, MemAvailable: undefined }));
    expect(counters.memAvailable).toBe(300_000);
  });

  it('should read the extra accounting rows', () => {
    const counters = parseMeminfo(meminfo(BASE));
    expect(counters.active).toBe(300_000);
    expect(counters.inactive).toBe(200_000);
    expect(counters.swapCached).toBe(0);
  });
});

describe('deriveMemory', () => {
  it('should report zero cache efficiencies when nothing is cached', () => {
    const derived = deriveMemory(
      parseMeminfo(meminfo({ ...BASE, Buffers: 0, Cached: 0 })),
      memoryConfigSchema.parse({}),
    );
    expect(derived?.bufferEfficiency).toBe(0);
    expect(derived?.cacheEfficiency).toBe(0);
  });
});
