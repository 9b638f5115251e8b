import type {
  IntensityCounts,
  ProcessConfig,
  ProcessCounters,
  ProcessFlags,
  ProcessRates,
  ProcessRecord,
  SamplerName,
} from '@tickscope/shared';
import {
  BYTES_PER_MB,
  EntityVanishedError,
  getLogger,
  ParseError,
  PROC_ROOT,
  SourceUnavailableError,
  TickscopeError,
} from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import { counterDelta, parseKeyValue, tokenize, toCounter } from '../sources/rows.js';
import { Sampler } from './Sampler.js';

export type Clock = () => number;

export interface StatFields {
  comm: string;
  state: string;
  utime: number;
  stime: number;
  cutime: number;
  cstime: number;
  numThreads: number;
  vsize: number;
  rss: number;
  minflt: number;
  majflt: number;
  cminflt: number;
  cmajflt: number;
}

/**
 * Parses `/proc/<pid>/stat`. The command name is parenthesised and may itself
 * contain spaces or parentheses, so fields are counted from the last `)`.
 */
export function parseProcStat(text: string, source: string): StatFields {
  const open = text.indexOf('(');
  const close = text.lastIndexOf(')');
  if (open < 0 || close < open) {
    throw new ParseError(source, 'command name not found');
  }

  const fields = tokenize(text.slice(close + 1));
  if (fields.length < 22) {
    throw new ParseError(source, `expected at least 22 fields after comm, got ${fields.length}`);
  }
  const counter = (index: number, name: string): number => toCounter(fields[index], source, name);

  return {
    comm: text.slice(open + 1, close),
    state: fields[0],
    minflt: counter(7, 'minflt'),
    cminflt: counter(8, 'cminflt'),
    majflt: counter(9, 'majflt'),
    cmajflt: counter(10, 'cmajflt'),
    utime: counter(11, 'utime'),
    stime: counter(12, 'stime'),
    // cutime and cstime are signed in the kernel ABI
    cutime: Math.max(0, Number.parseInt(fields[13], 10) || 0),
    cstime: Math.max(0, Number.parseInt(fields[14], 10) || 0),
    numThreads: counter(17, 'num_threads'),
    vsize: counter(20, 'vsize'),
    rss: Math.max(0, Number.parseInt(fields[21], 10) || 0),
  };
}

export function computeProcessRates(
  previous: ProcessCounters,
  current: ProcessCounters,
  elapsedMs: number,
  clockTicksPerSecond: number,
): ProcessRates {
  const cpuTicks =
    counterDelta(current.utime, previous.utime) + counterDelta(current.stime, previous.stime);
  const elapsedSeconds = elapsedMs / 1000;
  const charsRead = counterDelta(current.rchar, previous.rchar);
  const bytesRead = counterDelta(current.readBytes, previous.readBytes);
  const readSyscalls = counterDelta(current.syscr, previous.syscr);
  const totalCpu = current.utime + current.stime;

  return {
    cpuUsagePercent: elapsedSeconds > 0 ? (cpuTicks / clockTicksPerSecond / elapsedSeconds) * 100 : 0,
    cacheHitRate: charsRead > 0 ? (Math.max(0, charsRead - bytesRead) / charsRead) * 100 : 0,
    ioEfficiency: readSyscalls > 0 ? bytesRead / readSyscalls : 0,
    cpuEfficiency: totalCpu > 0 ? (current.utime / totalCpu) * 100 : 0,
    contextSwitchRate:
      counterDelta(current.voluntaryCtxtSwitches, previous.voluntaryCtxtSwitches) +
      counterDelta(current.nonvoluntaryCtxtSwitches, previous.nonvoluntaryCtxtSwitches),
    pageFaultRate:
      counterDelta(current.minflt, previous.minflt) + counterDelta(current.majflt, previous.majflt),
  };
}

export function classifyProcess(
  rates: ProcessRates | null,
  memoryUsageMb: number,
  config: ProcessConfig,
): ProcessFlags {
  return {
    cpuIntensive: rates !== null && rates.cpuUsagePercent > config.cpuPercent,
    memoryIntensive: memoryUsageMb > config.memoryMb,
    ioIntensive: rates !== null && rates.ioEfficiency > config.ioBytesPerSyscall,
    contextSwitchingHeavy: rates !== null && rates.contextSwitchRate > config.contextSwitches,
    pageFaultingHeavy: rates !== null && rates.pageFaultRate > config.pageFaults,
  };
}

type RankMetric = (record: ProcessRecord) => number;

const byCpu: RankMetric = (record) => record.rates?.cpuUsagePercent ?? 0;
const byMemory: RankMetric = (record) => record.memoryUsageMb;
const byIo: RankMetric = (record) => record.rates?.ioEfficiency ?? 0;

export class ProcessSampler extends Sampler {
  readonly name: SamplerName = 'process';

  private config: ProcessConfig;
  private clock: Clock;
  private records: Map<number, ProcessRecord> = new Map();

  constructor(fs: HostFs, config: ProcessConfig, clock: Clock = Date.now) {
    super(fs);
    this.config = config;
    this.clock = clock;
  }

  /** Live process ids, read lazily from the process table. Each call starts over. */
  *enumeratePids(): Generator<number> {
    for (const entry of this.fs.listDir(PROC_ROOT)) {
      if (/^\d+$/.test(entry)) {
        yield Number(entry);
      }
    }
  }

  getProcessCount(): number {
    return this.records.size;
  }

  getTrackedPids(): number[] {
    return [...this.records.keys()].sort((a, b) => a - b);
  }

  getProcess(pid: number): ProcessRecord | null {
    const record = this.records.get(pid);
    return record ? this.copy(record) : null;
  }

  getProcesses(): ProcessRecord[] {
    return this.getTrackedPids().flatMap((pid) => {
      const record = this.records.get(pid);
      return record ? [this.copy(record)] : [];
    });
  }

  getTopCPUProcesses(limit: number = this.config.topCount): ProcessRecord[] {
    return this.rank(byCpu, limit);
  }

  getTopMemoryProcesses(limit: number = this.config.topCount): ProcessRecord[] {
    return this.rank(byMemory, limit);
  }

  getTopIOProcesses(limit: number = this.config.topCount): ProcessRecord[] {
    return this.rank(byIo, limit);
  }

  getIntensityCounts(): IntensityCounts {
    const counts: IntensityCounts = {
      cpuIntensive: 0,
      memoryIntensive: 0,
      ioIntensive: 0,
      contextSwitchingHeavy: 0,
      pageFaultingHeavy: 0,
    };
    for (const record of this.records.values()) {
      if (record.flags.cpuIntensive) counts.cpuIntensive++;
      if (record.flags.memoryIntensive) counts.memoryIntensive++;
      if (record.flags.ioIntensive) counts.ioIntensive++;
      if (record.flags.contextSwitchingHeavy) counts.contextSwitchingHeavy++;
      if (record.flags.pageFaultingHeavy) counts.pageFaultingHeavy++;
    }
    return counts;
  }

  protected open(): void {
    this.fs.listDir(PROC_ROOT);
  }

  /**
   * One lifecycle pass: read every live pid, derive rates for the ones seen
   * last tick, and drop any tracked pid that is no longer in the table. A
   * process that cannot be read this tick keeps its previous record.
   */
  protected sample(): void {
    const now = this.clock();
    const next = new Map<number, ProcessRecord>();
    let vanished = 0;
    let unreadable = 0;

    for (const pid of this.enumeratePids()) {
      const previous = this.records.get(pid);
      let record: ProcessRecord;
      try {
        record = this.readProcess(pid, previous, now);
      } catch (err) {
        if (err instanceof EntityVanishedError) {
          vanished++;
        } else if (err instanceof TickscopeError) {
          unreadable++;
        } else {
          throw err;
        }
        if (previous) next.set(pid, previous);
        continue;
      }
      next.set(pid, record);
    }

    if (vanished > 0 || unreadable > 0) {
      getLogger().debug({ vanished, unreadable }, 'Processes skipped this tick');
    }
    this.records = next;
  }

  private readProcess(pid: number, previous: ProcessRecord | undefined, now: number): ProcessRecord {
    const base = `${PROC_ROOT}/${pid}`;
    const stat = parseProcStat(this.readEntity(pid, `${base}/stat`), `${base}/stat`);
    const status = parseKeyValue(this.readEntity(pid, `${base}/status`));
    const io = this.readIo(pid, `${base}/io`);

    const counters: ProcessCounters = {
      utime: stat.utime,
      stime: stat.stime,
      cutime: stat.cutime,
      cstime: stat.cstime,
      numThreads: stat.numThreads,
      vsize: stat.vsize,
      rss: stat.rss,
      minflt: stat.minflt,
      majflt: stat.majflt,
      cminflt: stat.cminflt,
      cmajflt: stat.cmajflt,
      voluntaryCtxtSwitches: status.get('voluntary_ctxt_switches') ?? 0,
      nonvoluntaryCtxtSwitches: status.get('nonvoluntary_ctxt_switches') ?? 0,
      rchar: io.get('rchar') ?? 0,
      wchar: io.get('wchar') ?? 0,
      syscr: io.get('syscr') ?? 0,
      syscw: io.get('syscw') ?? 0,
      readBytes: io.get('read_bytes') ?? 0,
      writeBytes: io.get('write_bytes') ?? 0,
    };

    const memoryUsageMb = (counters.rss * this.config.pageSize) / BYTES_PER_MB;
    const rates = previous
      ? computeProcessRates(
          previous.counters,
          counters,
          now - previous.sampledAt,
          this.config.clockTicksPerSecond,
        )
      : null;

    return {
      pid,
      comm: stat.comm,
      state: stat.state,
      counters,
      memoryUsageMb,
      rates,
      flags: classifyProcess(rates, memoryUsageMb, this.config),
      sampledAt: now,
    };
  }

  private readEntity(pid: number, path: string): string {
    try {
      return this.fs.readText(path);
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        throw new EntityVanishedError(`process ${pid}`);
      }
      throw err;
    }
  }

  /** Other users' io files are unreadable without privileges; their counters read as zero. */
  private readIo(pid: number, path: string): Map<string, number> {
    try {
      return parseKeyValue(this.fs.readText(path));
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        getLogger().trace({ pid }, 'I/O accounting not readable');
        return new Map();
      }
      throw err;
    }
  }

  /** Stable: equal metrics keep ascending pid order. */
  private rank(metric: RankMetric, limit: number): ProcessRecord[] {
    return this.getProcesses()
      .sort((a, b) => metric(b) - metric(a))
      .slice(0, limit);
  }

  private copy(record: ProcessRecord): ProcessRecord {
    return {
      ...record,
      counters: { ...record.counters },
      rates: record.rates ? { ...record.rates } : null,
      flags: { ...record.flags },
    };
  }
}
