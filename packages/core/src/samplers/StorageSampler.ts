import type {
  DeviceInfo,
  DeviceStats,
  DiskCounters,
  DiskRates,
  QueueStatus,
  SamplerName,
  StorageConfig,
} from '@tickscope/shared';
import {
  BYTES_PER_MB,
  getLogger,
  ParseError,
  PROC_DISKSTATS,
  SourceUnavailableError,
  SYS_BLOCK,
} from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import { counterDelta, lines, tokenize, toCounter } from '../sources/rows.js';
import { Sampler } from './Sampler.js';

const DISKSTAT_FIELDS = [
  'reads',
  'readMerges',
  'readSectors',
  'readTime',
  'writes',
  'writeMerges',
  'writeSectors',
  'writeTime',
  'ioInProgress',
  'ioTime',
  'weightedIoTime',
] as const;

/** One `/proc/diskstats` row, already split: major, minor, name, then the counters. */
export function parseDiskCounters(tokens: string[]): DiskCounters {
  const name = tokens[2] ?? '<unnamed>';
  if (tokens.length < 3 + DISKSTAT_FIELDS.length) {
    throw new ParseError(PROC_DISKSTATS, `row for ${name} has ${tokens.length} fields`);
  }
  const field = (index: number): number =>
    toCounter(tokens[3 + index], PROC_DISKSTATS, `${name}.${DISKSTAT_FIELDS[index]}`);

  return {
    reads: field(0),
    readMerges: field(1),
    readSectors: field(2),
    readTime: field(3),
    writes: field(4),
    writeMerges: field(5),
    writeSectors: field(6),
    writeTime: field(7),
    ioInProgress: field(8),
    ioTime: field(9),
    weightedIoTime: field(10),
  };
}

export function computeDiskRates(
  previous: DiskCounters,
  current: DiskCounters,
  sectorSize: number,
): DiskRates {
  const readIops = counterDelta(current.reads, previous.reads);
  const writeIops = counterDelta(current.writes, previous.writes);
  const totalIops = readIops + writeIops;
  const readMbps = (counterDelta(current.readSectors, previous.readSectors) * sectorSize) / BYTES_PER_MB;
  const writeMbps =
    (counterDelta(current.writeSectors, previous.writeSectors) * sectorSize) / BYTES_PER_MB;
  const ioTime = counterDelta(current.ioTime, previous.ioTime);

  return {
    readIops,
    writeIops,
    totalIops,
    readMbps,
    writeMbps,
    totalMbps: readMbps + writeMbps,
    avgLatencyMs: totalIops > 0 ? ioTime / totalIops : 0,
  };
}

export function classifyQueue(
  queueDepth: number,
  config: Pick<StorageConfig, 'bottleneckQueueDepth' | 'warningQueueDepth'>,
): QueueStatus {
  if (queueDepth > config.bottleneckQueueDepth) return 'bottleneck';
  if (queueDepth > config.warningQueueDepth) return 'warning';
  return 'normal';
}

/** The active scheduler is the bracketed entry, e.g. `mq-deadline kyber [bfq] none`. */
export function parseScheduler(text: string): string | null {
  const active = /\[([^\]]+)\]/.exec(text);
  if (active) return active[1];
  const [only] = tokenize(text);
  return only ?? null;
}

function iopsOf(device: DeviceStats): number {
  return device.rates?.totalIops ?? 0;
}

/**
 * Marks the busiest `ceil(N * hotFraction)` devices (at least one) as hot.
 * Only devices with rates this tick take part. Ties keep discovery order.
 */
export function selectHotDevices(devices: DeviceStats[], hotFraction: number): Set<string> {
  const ranked = devices
    .filter((device) => device.rates !== null)
    .sort((a, b) => iopsOf(b) - iopsOf(a));
  if (ranked.length === 0) return new Set();

  const hotCount = Math.max(1, Math.ceil(ranked.length * hotFraction));
  return new Set(ranked.slice(0, hotCount).map((device) => device.name));
}

export class StorageSampler extends Sampler {
  readonly name: SamplerName = 'storage';

  private config: StorageConfig;
  private devices: Map<string, DeviceInfo> = new Map();
  private counters: Map<string, DiskCounters> = new Map();
  private stats: Map<string, DeviceStats> = new Map();

  constructor(fs: HostFs, config: StorageConfig) {
    super(fs);
    this.config = config;
  }

  /**
   * Lists block devices whose names match the configured prefixes, with
   * their scheduler and request-queue size. Called once when the sampler
   * opens; call again to pick up hot-plugged devices.
   */
  discoverDevices(): DeviceInfo[] {
    const names = this.fs
      .listDir(SYS_BLOCK)
      .filter((name) => this.config.devicePrefixes.some((prefix) => name.startsWith(prefix)))
      .sort();

    this.devices = new Map(
      names.map((name) => [
        name,
        {
          name,
          scheduler: this.readOptional(`${SYS_BLOCK}/${name}/queue/scheduler`, parseScheduler),
          maxQueueDepth: this.readOptional(`${SYS_BLOCK}/${name}/queue/nr_requests`, (text) => {
            const value = Number.parseInt(text.trim(), 10);
            return Number.isNaN(value) ? null : value;
          }),
        },
      ]),
    );

    getLogger().debug({ devices: names }, 'Block devices discovered');
    return this.getDeviceInfo();
  }

  getDeviceInfo(): DeviceInfo[] {
    return [...this.devices.values()].map((info) => ({ ...info }));
  }

  getDevices(): DeviceStats[] {
    return [...this.stats.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((device) => this.copy(device));
  }

  getDevice(name: string): DeviceStats | null {
    const device = this.stats.get(name);
    return device ? this.copy(device) : null;
  }

  getHotDevices(): DeviceStats[] {
    return [...this.stats.values()]
      .filter((device) => device.isHot)
      .sort((a, b) => iopsOf(b) - iopsOf(a))
      .map((device) => this.copy(device));
  }

  getTotalIOPS(): number {
    let total = 0;
    for (const device of this.stats.values()) {
      total += iopsOf(device);
    }
    return total;
  }

  getTotalThroughput(): number {
    let total = 0;
    for (const device of this.stats.values()) {
      total += device.rates?.totalMbps ?? 0;
    }
    return total;
  }

  getHotDeviceCount(): number {
    return this.countWhere((device) => device.isHot);
  }

  getBottleneckCount(): number {
    return this.countWhere((device) => device.queueStatus === 'bottleneck');
  }

  getWarningCount(): number {
    return this.countWhere((device) => device.queueStatus === 'warning');
  }

  protected open(): void {
    this.fs.readText(PROC_DISKSTATS);
    this.discoverDevices();
  }

  protected sample(): void {
    const counters = new Map<string, DiskCounters>();
    for (const line of lines(this.fs.readText(PROC_DISKSTATS))) {
      const tokens = tokenize(line);
      const name = tokens[2];
      if (name === undefined || !this.devices.has(name)) continue;
      counters.set(name, parseDiskCounters(tokens));
    }

    const stats: DeviceStats[] = [];
    for (const [name, info] of this.devices) {
      const current = counters.get(name);
      if (!current) {
        getLogger().debug({ device: name }, 'Device missing from diskstats this tick');
        continue;
      }
      const previous = this.counters.get(name);
      const queueDepth = current.ioInProgress;
      const queueStatus = classifyQueue(queueDepth, this.config);

      stats.push({
        name,
        counters: current,
        rates: previous ? computeDiskRates(previous, current, this.config.sectorSize) : null,
        queueDepth,
        queueUtilization: (queueDepth / this.config.queueCapacity) * 100,
        queueStatus,
        isHot: false,
        status: queueStatus,
        scheduler: info.scheduler,
        maxQueueDepth: info.maxQueueDepth,
      });
    }

    const hot = selectHotDevices(stats, this.config.hotFraction);
    for (const device of stats) {
      device.isHot = hot.has(device.name);
      if (device.isHot && device.queueStatus === 'normal') {
        device.status = 'hot';
      }
    }

    this.counters = counters;
    this.stats = new Map(stats.map((device) => [device.name, device]));
  }

  private countWhere(predicate: (device: DeviceStats) => boolean): number {
    let count = 0;
    for (const device of this.stats.values()) {
      if (predicate(device)) count++;
    }
    return count;
  }

  private copy(device: DeviceStats): DeviceStats {
    return {
      ...device,
      counters: { ...device.counters },
      rates: device.rates ? { ...device.rates } : null,
    };
  }

  private readOptional<T>(path: string, parse: (text: string) => T | null): T | null {
    try {
      return parse(this.fs.readText(path));
    } catch (err) {
      if (err instanceof SourceUnavailableError) return null;
      throw err;
    }
  }
}
