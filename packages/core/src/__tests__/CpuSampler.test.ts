import { beforeEach, describe, expect, it } from 'vitest';
import { cpuConfigSchema, ParseError, SourceUnavailableError } from '@tickscope/shared';
import { computeCpuPercentages, CpuSampler, parseCpuTimes } from '../samplers/CpuSampler.js';
import { MemoryHostFs } from './helpers/MemoryHostFs.js';

function statText(fields: number[]): string {
  return [
    `cpu  ${fields.join(' ')}`,
    `cpu0 ${fields.join(' ')}`,
    `cpu1 0 0 0 0 0 0 0 0 0 0`,
    'intr 12345 0 0',
    'ctxt 999',
    '',
  ].join('\n');
}

//                    user nice sys idle iowait irq softirq steal guest guestNice
const FIRST = [100, 0, 50, 800, 50, 0, 0, 0, 0, 0];
const SECOND = [200, 0, 100, 1000, 100, 0, 0, 0, 0, 0];

describe('CpuSampler', () => {
  let fs: MemoryHostFs;
  let sampler: CpuSampler;

  beforeEach(() => {
    fs = new MemoryHostFs().set('/proc/stat', statText(FIRST));
    sampler = new CpuSampler(fs, cpuConfigSchema.parse({}));
  });

  it('should suppress percentages on the first reading', () => {
    expect(sampler.update()).toEqual({ ok: true });
    expect(sampler.isFirstReading()).toBe(true);
    expect(sampler.getPercentages()).toBeNull();
    expect(sampler.getCpuUsage()).toBeNull();
    expect(sampler.getTimes()?.user).toBe(100);
  });

  it('should derive bucket percentages from the second reading', () => {
    sampler.update();
    fs.set('/proc/stat', statText(SECOND));
    sampler.update();

    expect(sampler.isFirstReading()).toBe(false);
    const pct = sampler.getPercentages();
    expect(pct).not.toBeNull();
    expect(pct?.user).toBeCloseTo(25);
    expect(pct?.system).toBeCloseTo(12.5);
    expect(pct?.idle).toBeCloseTo(50);
    expect(pct?.iowait).toBeCloseTo(12.5);
    expect(sampler.getCpuUsage()).toBeCloseTo(50);
    expect(sampler.getIowaitPercent()).toBeCloseTo(12.5);
  });

  it('should hold the prior reading beside the current one', () => {
    sampler.update();
    expect(sampler.getPreviousTimes()).toBeNull();

    fs.set('/proc/stat', statText(SECOND));
    sampler.update();

    expect(sampler.getPreviousTimes()?.user).toBe(100);
    expect(sampler.getPreviousTimes()?.idle).toBe(800);
    expect(sampler.getTimes()?.user).toBe(200);
  });

  it('should produce percentages that sum to 100', () => {
    sampler.update();
    fs.set('/proc/stat', statText([173, 9, 61, 1453, 77, 3, 11, 2, 0, 0]));
    sampler.update();

    const pct = sampler.getPercentages();
    const sum = pct ? Object.values(pct).reduce((a, b) => a + b, 0) : 0;
    expect(sum).toBeCloseTo(100, 9);
  });

  it('should leave the previous percentages in place when no time elapsed', () => {
    sampler.update();
    fs.set('/proc/stat', statText(SECOND));
    sampler.update();
    sampler.update();

    expect(sampler.getPercentages()?.user).toBeCloseTo(25);
  });

  it('should stay without percentages when the second reading has no delta', () => {
    sampler.update();
    sampler.update();

    expect(sampler.isFirstReading()).toBe(false);
    expect(sampler.getPercentages()).toBeNull();
  });

  it('should fail the tick on a wrong label and keep the last good reading', () => {
    sampler.update();
    fs.set('/proc/stat', 'intr 1 2 3\n');

    const result = sampler.update();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.code).toBe('PARSE_FAILURE');
    }
    expect(sampler.getState()).toBe('ready');
    expect(sampler.getTimes()?.idle).toBe(800);
    expect(sampler.getLastError()).toBeInstanceOf(ParseError);
  });

  it('should clear the last error after a good tick', () => {
    sampler.update();
    fs.set('/proc/stat', 'garbage\n');
    sampler.update();
    fs.set('/proc/stat', statText(SECOND));
    sampler.update();

    expect(sampler.getLastError()).toBeNull();
    expect(sampler.getStatus()).toEqual({
      name: 'cpu',
      state: 'ready',
      firstReading: false,
      lastError: null,
    });
  });

  it('should disable itself when the source is missing', () => {
    const missing = new CpuSampler(new MemoryHostFs(), cpuConfigSchema.parse({}));

    const result = missing.initialize();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
    }
    expect(missing.getState()).toBe('disabled');
    expect(missing.update().ok).toBe(false);
    expect(missing.getPercentages()).toBeNull();
  });

  it('should count the per-CPU rows', () => {
    sampler.initialize();
    expect(sampler.getCpuCount()).toBe(2);
  });

  it('should report no interrupt data when the table is absent', () => {
    sampler.update();
    expect(sampler.hasInterruptData()).toBe(false);
    expect(sampler.getTopInterrupts()).toEqual([]);
  });
});

describe('parseCpuTimes', () => {
  it('should read zero for buckets an older kernel does not report', () => {
    const times = parseCpuTimes('cpu 10 20 30 40\n');
    expect(times).toEqual({
      user: 10,
      nice: 20,
      system: 30,
      idle: 40,
      iowait: 0,
      irq: 0,
      softirq: 0,
      steal: 0,
      guest: 0,
      guestNice: 0,
    });
  });

  it('should reject a row with too few fields', () => {
    expect(() => parseCpuTimes('cpu 1 2\n')).toThrow('aggregate row has 2 fields, need at least 4');
  });
});

describe('computeCpuPercentages', () => {
  it('should treat a counter that went backwards as no activity', () => {
    const previous = parseCpuTimes('cpu 100 0 0 100\n');
    const current = parseCpuTimes('cpu 50 0 0 200\n');

    const pct = computeCpuPercentages(previous, current);

    expect(pct?.user).toBe(0);
    expect(pct?.idle).toBe(100);
  });

  it('should return null when no jiffies elapsed', () => {
    const times = parseCpuTimes('cpu 1 2 3 4\n');
    expect(computeCpuPercentages(times, times)).toBeNull();
  });
});
