import type {
  MemoryPressure,
  NumaConfig,
  NumaImbalance,
  NumaNode,
  SamplerName,
  VmstatCounters,
} from '@tickscope/shared';
import {
  getLogger,
  NUMA_PRESSURE_WEIGHTS,
  ParseError,
  PROC_MEMINFO,
  PROC_STAT,
  PROC_VMSTAT,
  SourceUnavailableError,
  SYS_NUMA_NODES,
} from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';
import {
  counterDelta,
  countCpus,
  parseCpuList,
  parseKeySpaceValue,
  parseKeyValue,
} from '../sources/rows.js';
import { Sampler } from './Sampler.js';

interface NodeTopology {
  id: number;
  cpuCores: number[];
  synthetic: boolean;
}

export function parseVmstat(text: string): VmstatCounters {
  const values = parseKeySpaceValue(text);
  const pgfault = values.get('pgfault');
  if (pgfault === undefined) {
    throw new ParseError(PROC_VMSTAT, 'pgfault missing');
  }
  const read = (key: string): number => values.get(key) ?? 0;

  return {
    pgfault,
    pgmajfault: read('pgmajfault'),
    pgpgin: read('pgpgin'),
    pgpgout: read('pgpgout'),
    pswpin: read('pswpin'),
    pswpout: read('pswpout'),
    // Split into kswapd/direct since 4.x
    pgsteal: values.get('pgsteal') ?? read('pgsteal_kswapd') + read('pgsteal_direct'),
    pgscanKswapd: read('pgscan_kswapd'),
    pgscanDirect: read('pgscan_direct'),
    nrDirty: read('nr_dirty'),
    nrWriteback: read('nr_writeback'),
    nrUnstable: read('nr_unstable'),
    nrSlabReclaimable: values.get('nr_slab_reclaimable') ?? read('nr_slab_reclaimable_B'),
    nrSlabUnreclaimable: values.get('nr_slab_unreclaimable') ?? read('nr_slab_unreclaimable_B'),
  };
}

/** Per-node meminfo rows read `Node 0 MemTotal:  16318480 kB`. */
export function parseNodeMeminfo(text: string): Map<string, number> {
  return parseKeyValue(text.replace(/^\s*Node\s+\d+\s+/gm, ''));
}

/**
 * Adds each trigger's fixed points: dirty and writeback page gauges from the
 * current reading, scanned pages, major faults and swapping from the deltas.
 */
export function computePressure(
  previous: VmstatCounters,
  current: VmstatCounters,
  criticalScore: number,
): MemoryPressure {
  const pageFaults = counterDelta(current.pgfault, previous.pgfault);
  const majorFaults = counterDelta(current.pgmajfault, previous.pgmajfault);
  const swapIn = counterDelta(current.pswpin, previous.pswpin);
  const swapOut = counterDelta(current.pswpout, previous.pswpout);
  const scanned =
    counterDelta(current.pgscanKswapd, previous.pgscanKswapd) +
    counterDelta(current.pgscanDirect, previous.pgscanDirect);

  const weights = NUMA_PRESSURE_WEIGHTS;
  let score = 0;
  if (current.nrDirty > weights.dirtyPages.above) score += weights.dirtyPages.points;
  if (current.nrWriteback > weights.writebackPages.above) score += weights.writebackPages.points;
  if (scanned > weights.scannedPages.above) score += weights.scannedPages.points;
  if (majorFaults > weights.majorFaults.above) score += weights.majorFaults.points;
  if (swapIn + swapOut > weights.swapActivity.above) score += weights.swapActivity.points;

  return {
    pageFaultRate: pageFaults,
    majorFaultRate: majorFaults,
    swapRate: swapIn + swapOut,
    scanRate: scanned,
    score,
    isSwapping: swapIn > 0 || swapOut > 0,
    isMemoryPressured: score > criticalScore,
  };
}

export function computeImbalance(nodes: NumaNode[], imbalancePercent: number): NumaImbalance {
  if (nodes.length < 2) {
    return { spread: 0, imbalanced: false };
  }
  const usages = nodes.map((node) => node.usagePercent);
  const spread = Math.max(...usages) - Math.min(...usages);
  return { spread, imbalanced: spread > imbalancePercent };
}

/** The synthetic node reads the host-wide accounting source. */
function memorySource(node: NodeTopology): string {
  return node.synthetic ? PROC_MEMINFO : `${SYS_NUMA_NODES}/node${node.id}/meminfo`;
}

export class NumaSampler extends Sampler {
  readonly name: SamplerName = 'numa';

  private config: NumaConfig;
  private topology: NodeTopology[] = [];
  private nodes: NumaNode[] = [];
  private vmstat: VmstatCounters | null = null;
  private pressure: MemoryPressure | null = null;

  constructor(fs: HostFs, config: NumaConfig) {
    super(fs);
    this.config = config;
  }

  getNumaNodeCount(): number {
    return this.topology.length;
  }

  isSynthetic(): boolean {
    return this.topology.some((node) => node.synthetic);
  }

  getNodes(): NumaNode[] {
    return this.nodes.map((node) => ({ ...node, cpuCores: [...node.cpuCores] }));
  }

  getNode(id: number): NumaNode | null {
    const node = this.nodes.find((candidate) => candidate.id === id);
    return node ? { ...node, cpuCores: [...node.cpuCores] } : null;
  }

  /** Mean usage across nodes. */
  getTotalMemoryUsage(): number {
    if (this.nodes.length === 0) return 0;
    return this.nodes.reduce((sum, node) => sum + node.usagePercent, 0) / this.nodes.length;
  }

  getVmstat(): VmstatCounters | null {
    return this.vmstat ? { ...this.vmstat } : null;
  }

  getPressure(): MemoryPressure | null {
    return this.pressure ? { ...this.pressure } : null;
  }

  getMemoryPressure(): number | null {
    return this.pressure?.score ?? null;
  }

  isMemoryPressured(): boolean {
    return this.pressure?.isMemoryPressured ?? false;
  }

  isSwapping(): boolean {
    return this.pressure?.isSwapping ?? false;
  }

  getPageFaultRate(): number | null {
    return this.pressure?.pageFaultRate ?? null;
  }

  getMajorFaultRate(): number | null {
    return this.pressure?.majorFaultRate ?? null;
  }

  getSwapRate(): number | null {
    return this.pressure?.swapRate ?? null;
  }

  getImbalance(): NumaImbalance {
    return computeImbalance(this.nodes, this.config.imbalancePercent);
  }

  protected open(): void {
    this.fs.readText(PROC_VMSTAT);
    const topology = this.discoverTopology();
    for (const node of topology) {
      this.fs.readText(memorySource(node));
    }
    this.topology = topology;
  }

  protected sample(): void {
    const vmstat = parseVmstat(this.fs.readText(PROC_VMSTAT));
    const nodes = this.topology.map((node) => this.readNode(node));

    this.pressure = this.vmstat ? computePressure(this.vmstat, vmstat, this.config.criticalScore) : null;
    this.vmstat = vmstat;
    this.nodes = nodes;
  }

  private discoverTopology(): NodeTopology[] {
    const topology: NodeTopology[] = [];

    if (this.fs.exists(SYS_NUMA_NODES)) {
      const ids = this.fs
        .listDir(SYS_NUMA_NODES)
        .map((entry) => /^node(\d+)$/.exec(entry))
        .filter((match): match is RegExpExecArray => match !== null)
        .map((match) => Number(match[1]))
        .sort((a, b) => a - b);

      for (const id of ids) {
        const path = `${SYS_NUMA_NODES}/node${id}/cpulist`;
        topology.push({ id, cpuCores: parseCpuList(this.fs.readText(path), path), synthetic: false });
      }
    }

    if (topology.length > 0) {
      getLogger().debug({ nodes: topology.length }, 'NUMA topology discovered');
      return topology;
    }

    const cpuCount = this.countHostCpus();
    getLogger().debug({ cpus: cpuCount }, 'No NUMA topology exposed, using one synthetic node');
    return [{ id: 0, cpuCores: Array.from({ length: cpuCount }, (_, cpu) => cpu), synthetic: true }];
  }

  private countHostCpus(): number {
    try {
      return countCpus(this.fs.readText(PROC_STAT));
    } catch (err) {
      if (err instanceof SourceUnavailableError) return 0;
      throw err;
    }
  }

  private readNode(node: NodeTopology): NumaNode {
    const source = memorySource(node);
    const text = this.fs.readText(source);
    const values = node.synthetic ? parseKeyValue(text) : parseNodeMeminfo(text);

    const memTotalKb = values.get('MemTotal');
    if (memTotalKb === undefined) {
      throw new ParseError(source, 'MemTotal missing');
    }
    const memFreeKb = values.get('MemFree') ?? 0;
    const memUsedKb = memTotalKb >= memFreeKb ? memTotalKb - memFreeKb : 0;

    return {
      id: node.id,
      cpuCores: node.cpuCores,
      memTotalKb,
      memFreeKb,
      memUsedKb,
      usagePercent: memTotalKb > 0 ? (memUsedKb / memTotalKb) * 100 : 0,
      synthetic: node.synthetic,
    };
  }
}
