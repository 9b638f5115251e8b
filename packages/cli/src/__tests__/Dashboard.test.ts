import { describe, it, expect, vi } from 'vitest';

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get() {
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {}, handler);

  return { default: chainable };
});

import type { DeviceStats, HostSnapshot, ProcessRecord } from '@tickscope/shared';
import { TICKSCOPE_VERSION } from '@tickscope/shared';
import { Dashboard, isViewName, renderTextBlock } from '../ui/Dashboard.js';
import {
  renderDeviceTable,
  renderIssues,
  renderNumaTable,
  renderProcessTable,
} from '../ui/Table.js';

function makeDevice(overrides: Partial<DeviceStats> = {}): DeviceStats {
  return {
    name: 'sda',
    counters: {
      reads: 0,
      readMerges: 0,
      readSectors: 0,
      readTime: 0,
      writes: 0,
      writeMerges: 0,
      writeSectors: 0,
      writeTime: 0,
      ioInProgress: 4,
      ioTime: 0,
      weightedIoTime: 0,
    },
    rates: {
      readIops: 120,
      writeIops: 30,
      totalIops: 150,
      readMbps: 2.5,
      writeMbps: 1.25,
      totalMbps: 3.75,
      avgLatencyMs: 0.5,
    },
    queueDepth: 4,
    queueUtilization: 3.125,
    queueStatus: 'normal',
    isHot: true,
    status: 'hot',
    scheduler: 'mq-deadline',
    maxQueueDepth: 64,
    ...overrides,
  };
}

function makeProcess(overrides: Partial<ProcessRecord> = {}): ProcessRecord {
  return {
    pid: 4242,
    comm: 'postgres',
    state: 'S',
    counters: {
      utime: 0,
      stime: 0,
      cutime: 0,
      cstime: 0,
      numThreads: 8,
      vsize: 0,
      rss: 0,
      minflt: 0,
      majflt: 0,
      cminflt: 0,
      cmajflt: 0,
      voluntaryCtxtSwitches: 0,
      nonvoluntaryCtxtSwitches: 0,
      rchar: 0,
      wchar: 0,
      syscr: 0,
      syscw: 0,
      readBytes: 0,
      writeBytes: 0,
    },
    memoryUsageMb: 256,
    rates: {
      cpuUsagePercent: 75,
      cacheHitRate: 100,
      ioEfficiency: 0,
      cpuEfficiency: 0,
      contextSwitchRate: 1500,
      pageFaultRate: 0,
    },
    flags: {
      cpuIntensive: true,
      memoryIntensive: false,
      ioIntensive: true,
      contextSwitchingHeavy: false,
      pageFaultingHeavy: false,
    },
    sampledAt: 0,
    ...overrides,
  };
}

function makeSnapshot(overrides: Partial<HostSnapshot> = {}): HostSnapshot {
  return {
    tick: 3,
    timestamp: new Date('2026-01-01T00:00:00.000Z'),
    samplers: [
      { name: 'cpu', state: 'ready', firstReading: false, lastError: null },
      {
        name: 'perf',
        state: 'disabled',
        firstReading: true,
        lastError: 'Source unavailable: perf:cycles',
      },
    ],
    cpu: {
      usagePercent: 42,
      percentages: {
        user: 30,
        nice: 0,
        system: 10,
        idle: 58,
        iowait: 2,
        irq: 0,
        softirq: 0,
        steal: 0,
        guest: 0,
        guestNice: 0,
      },
      topInterrupts: [],
    },
    memory: {
      counters: {
        memTotal: 8388608,
        memFree: 1048576,
        memAvailable: 4194304,
        buffers: 0,
        cached: 0,
        swapCached: 0,
        active: 0,
        inactive: 0,
        dirty: 0,
        writeback: 0,
      },
      derived: {
        memoryUsagePercent: 50,
        availablePercent: 50,
        bufferEfficiency: 0,
        cacheEfficiency: 0,
        dirtyPercent: 0,
        writebackPercent: 0,
        totalCachePercent: 20,
        memoryPressure: false,
        storageBottleneck: false,
        writeBottleneck: false,
      },
    },
    storage: null,
    numa: null,
    perf: null,
    process: null,
    ...overrides,
  };
}

describe('tables', () => {
  it('should render one row per device', () => {
    const output = renderDeviceTable([makeDevice()]);

    expect(output).toContain('sda');
    expect(output).toContain('hot');
    expect(output).toContain('120');
    expect(output).toContain('2.5 MB/s');
    expect(output).toContain('0.50 ms');
    expect(output).toContain('mq-deadline');
  });

  it('should render dashes for a device without rates', () => {
    const output = renderDeviceTable([makeDevice({ rates: null, scheduler: null })]);

    expect(output).not.toContain('MB/s');
    expect(output).toContain('-');
  });

  it('should list the set process flags without their suffix', () => {
    const output = renderProcessTable([makeProcess()]);

    expect(output).toContain('4242');
    expect(output).toContain('postgres');
    expect(output).toContain('75.0%');
    expect(output).toContain('256.0 MB');
    expect(output).toContain('1,500');
    expect(output).toContain('cpu,io');
  });

  it('should mark the synthetic NUMA node', () => {
    const output = renderNumaTable([
      {
        id: 0,
        cpuCores: [0, 1, 2, 3],
        memTotalKb: 1048576,
        memFreeKb: 524288,
        memUsedKb: 524288,
        usagePercent: 50,
        synthetic: true,
      },
    ]);

    expect(output).toContain('0*');
    expect(output).toContain('1 GB');
    expect(output).toContain('512 MB');
    expect(output).toContain('50.0%');
  });

  it('should render each issue on its own line', () => {
    expect(renderIssues([])).toBe('  No issues detected');
    expect(
      renderIssues([
        { severity: 'critical', source: 'cpu', message: 'CPU usage critical: 95.0%' },
        { severity: 'warning', source: 'storage', message: '2 hot storage devices' },
      ]),
    ).toBe('  CRIT [cpu] CPU usage critical: 95.0%\n  WARN [storage] 2 hot storage devices');
  });
});

describe('renderTextBlock', () => {
  it('should print a header, a line per sampler and the issues', () => {
    const lines = renderTextBlock(makeSnapshot(), []).split('\n');

    expect(lines[0]).toBe('  tickscope  tick 3  2026-01-01T00:00:00.000Z');
    expect(lines).toContain('  CPU       42.0%');
    expect(lines).toContain('    user 30.0  system 10.0  iowait 2.0  irq 0.0  softirq 0.0  steal 0.0');
    expect(lines).toContain('  Memory    50.0% of 8 GB  (4 GB available)');
    expect(lines).toContain('  perf: disabled (Source unavailable: perf:cycles)');
    expect(lines[lines.length - 1]).toBe('  No issues detected');
  });

  it('should include the storage line only when storage ran', () => {
    const without = renderTextBlock(makeSnapshot(), []);
    expect(without).not.toContain('Storage');

    const withStorage = renderTextBlock(
      makeSnapshot({
        storage: {
          devices: [makeDevice(), makeDevice({ name: 'sdb' })],
          totalIops: 1234.4,
          totalMbps: 5.5,
          hotDeviceCount: 1,
          bottleneckCount: 0,
          warningCount: 0,
        },
      }),
      [],
    );
    expect(withStorage.split('\n')).toContain(
      '  Storage   1,234 IOPS  5.5 MB/s  (2 devices, 1 hot, 0 saturated)',
    );
  });

  it('should say when CPU has no data yet', () => {
    expect(renderTextBlock(makeSnapshot({ cpu: null }), []).split('\n')).toContain('  CPU: no data');
  });
});

describe('Dashboard', () => {
  it('should recognise view names', () => {
    expect(isViewName('storage')).toBe(true);
    expect(isViewName('disks')).toBe(false);
  });

  it('should draw the overview with sparklines of recorded ticks', () => {
    const dashboard = new Dashboard();
    dashboard.record(makeSnapshot({ cpu: { usagePercent: 0, percentages: null, topInterrupts: [] } }));
    const latest = makeSnapshot({ cpu: { usagePercent: 100, percentages: null, topInterrupts: [] } });
    dashboard.record(latest);

    const output = dashboard.render(latest, []);

    expect(output).toContain(' overview | storage | perf | process | numa ');
    expect(output).toContain(`  CPU    ${'█'.repeat(20)} 100.0%`);
    expect(output).toContain('▁█');
    expect(output).toContain('▅▅');
    expect(output).toContain('Press Ctrl+C to exit');
  });

  it('should show the sampling interval in the header', () => {
    const snapshot = makeSnapshot();

    expect(new Dashboard('overview', 2000).render(snapshot, []).split('\n')[0]).toBe(
      `  tickscope v${TICKSCOPE_VERSION}  tick 3  2026-01-01T00:00:00.000Z  every 2s`,
    );
    expect(new Dashboard('overview', 500).render(snapshot, []).split('\n')[0]).toBe(
      `  tickscope v${TICKSCOPE_VERSION}  tick 3  2026-01-01T00:00:00.000Z  every 500ms`,
    );
    expect(new Dashboard().render(snapshot, []).split('\n')[0]).toBe(
      `  tickscope v${TICKSCOPE_VERSION}  tick 3  2026-01-01T00:00:00.000Z`,
    );
  });

  it('should skip ticks without a CPU reading in the history', () => {
    const dashboard = new Dashboard();
    dashboard.record(makeSnapshot({ cpu: null }));
    const latest = makeSnapshot({ cpu: { usagePercent: 100, percentages: null, topInterrupts: [] } });
    dashboard.record(latest);

    const cpuSpark = dashboard.render(latest, []).split('\n')[4];
    expect(cpuSpark).toBe('         █');
  });

  it('should switch views', () => {
    const dashboard = new Dashboard('numa');
    expect(dashboard.getView()).toBe('numa');
    expect(dashboard.render(makeSnapshot(), []).split('\n')).toContain('  NUMA: no data');

    dashboard.setView('perf');
    const snapshot = makeSnapshot({ perf: { mode: 'unavailable', source: 'unavailable', metrics: null } });
    expect(dashboard.render(snapshot, []).split('\n')).toContain('  Perf      unavailable');
  });

  it('should show perf detail when counters are running', () => {
    const dashboard = new Dashboard('perf');
    const snapshot = makeSnapshot({
      perf: {
        mode: 'counters',
        source: 'simulated',
        metrics: {
          ipc: 1.5,
          cacheHitRate: 75,
          branchMissRate: 2,
          contextSwitchRate: 300,
          pageFaultRate: 12,
          cacheThrashing: true,
          branchMispredicting: false,
        },
      },
    });

    const lines = dashboard.render(snapshot, []).split('\n');

    expect(lines).toContain('  Perf      IPC 1.50  cache hit 75.0%  branch miss 2.00%  (simulated)');
    expect(lines).toContain('    cache hit rate      75.0%  thrashing');
    expect(lines).toContain('    branch miss rate    2.00%');
  });
});
