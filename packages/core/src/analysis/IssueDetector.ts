import type { HostSnapshot, Issue, IssueSeverity, SamplerName } from '@tickscope/shared';

export interface IssueThresholds {
  cpuCritical: number;
  cpuWarning: number;
  iowaitCritical: number;
  iowaitWarning: number;
  memoryCritical: number;
  memoryWarning: number;
  hotDevicesCritical: number;
  hotDevicesWarning: number;
  bottlenecksCritical: number;
  cpuIntensiveProcesses: number;
  memoryIntensiveProcesses: number;
}

export const DEFAULT_ISSUE_THRESHOLDS: IssueThresholds = {
  cpuCritical: 90,
  cpuWarning: 80,
  iowaitCritical: 20,
  iowaitWarning: 10,
  memoryCritical: 95,
  memoryWarning: 85,
  hotDevicesCritical: 3,
  hotDevicesWarning: 1,
  bottlenecksCritical: 2,
  cpuIntensiveProcesses: 5,
  memoryIntensiveProcesses: 3,
};

/**
 * Turns one published snapshot into a list of human-readable issues.
 * Views that are absent produce nothing; critical issues sort first.
 */
export class IssueDetector {
  private readonly thresholds: IssueThresholds;

  constructor(thresholds: Partial<IssueThresholds> = {}) {
    this.thresholds = { ...DEFAULT_ISSUE_THRESHOLDS, ...thresholds };
  }

  detect(snapshot: HostSnapshot): Issue[] {
    const issues: Issue[] = [];
    const push = (severity: IssueSeverity, source: SamplerName, message: string): void => {
      issues.push({ severity, source, message });
    };

    this.checkCpu(snapshot, push);
    this.checkMemory(snapshot, push);
    this.checkStorage(snapshot, push);
    this.checkPerf(snapshot, push);
    this.checkNuma(snapshot, push);
    this.checkProcesses(snapshot, push);

    return issues.sort((a, b) => severityRank(b.severity) - severityRank(a.severity));
  }

  private checkCpu(snapshot: HostSnapshot, push: Reporter): void {
    const cpu = snapshot.cpu;
    if (!cpu || cpu.usagePercent === null || !cpu.percentages) return;
    const t = this.thresholds;

    if (cpu.usagePercent > t.cpuCritical) {
      push('critical', 'cpu', `CPU usage critical: ${cpu.usagePercent.toFixed(1)}%`);
    } else if (cpu.usagePercent > t.cpuWarning) {
      push('warning', 'cpu', `CPU usage high: ${cpu.usagePercent.toFixed(1)}%`);
    }

    const iowait = cpu.percentages.iowait;
    if (iowait > t.iowaitCritical) {
      push('critical', 'cpu', `I/O wait critical: ${iowait.toFixed(1)}%`);
    } else if (iowait > t.iowaitWarning) {
      push('warning', 'cpu', `I/O wait high: ${iowait.toFixed(1)}%`);
    }

    for (const stat of cpu.topInterrupts) {
      if (stat.classification === 'storm') {
        push('warning', 'cpu', `Interrupt storm on IRQ ${stat.irq} (${stat.description}) pinned to CPU${stat.maxCpu}`);
      }
    }
  }

  private checkMemory(snapshot: HostSnapshot, push: Reporter): void {
    const derived = snapshot.memory?.derived;
    if (!derived) return;
    const t = this.thresholds;

    if (derived.memoryUsagePercent > t.memoryCritical) {
      push('critical', 'memory', `Memory usage critical: ${derived.memoryUsagePercent.toFixed(1)}%`);
    } else if (derived.memoryUsagePercent > t.memoryWarning) {
      push('warning', 'memory', `Memory usage high: ${derived.memoryUsagePercent.toFixed(1)}%`);
    }

    if (derived.writeBottleneck) {
      push('warning', 'memory', `Write bottleneck: ${derived.dirtyPercent.toFixed(1)}% of memory dirty`);
    } else if (derived.storageBottleneck) {
      push('warning', 'memory', 'Storage bottleneck: dirty or writeback pages backing up');
    }
  }

  private checkStorage(snapshot: HostSnapshot, push: Reporter): void {
    const storage = snapshot.storage;
    if (!storage) return;
    const t = this.thresholds;

    if (storage.hotDeviceCount > t.hotDevicesCritical) {
      push('critical', 'storage', `${storage.hotDeviceCount} hot storage devices`);
    } else if (storage.hotDeviceCount > t.hotDevicesWarning) {
      push('warning', 'storage', `${storage.hotDeviceCount} hot storage devices`);
    }

    if (storage.bottleneckCount > t.bottlenecksCritical) {
      push('critical', 'storage', `${storage.bottleneckCount} devices with saturated queues`);
    } else if (storage.bottleneckCount > 0) {
      push('warning', 'storage', `${storage.bottleneckCount} devices with saturated queues`);
    }
  }

  private checkPerf(snapshot: HostSnapshot, push: Reporter): void {
    const metrics = snapshot.perf?.metrics;
    if (!metrics) return;

    if (metrics.cacheThrashing) {
      push('critical', 'perf', `Cache thrashing: hit rate ${metrics.cacheHitRate.toFixed(1)}%`);
    }
    if (metrics.branchMispredicting) {
      push('critical', 'perf', `Branch misprediction: miss rate ${metrics.branchMissRate.toFixed(1)}%`);
    }
  }

  private checkNuma(snapshot: HostSnapshot, push: Reporter): void {
    const numa = snapshot.numa;
    if (!numa) return;

    if (numa.pressure?.isMemoryPressured) {
      push('critical', 'numa', `Memory pressure score ${numa.pressure.score}`);
    }
    if (numa.pressure?.isSwapping) {
      push('critical', 'numa', `Swapping: ${numa.pressure.swapRate} pages this tick`);
    }
    if (numa.imbalance.imbalanced) {
      push('warning', 'numa', `NUMA imbalance: ${numa.imbalance.spread.toFixed(1)} point spread between nodes`);
    }
  }

  private checkProcesses(snapshot: HostSnapshot, push: Reporter): void {
    const process = snapshot.process;
    if (!process) return;
    const t = this.thresholds;

    if (process.intensity.cpuIntensive > t.cpuIntensiveProcesses) {
      push('critical', 'process', `${process.intensity.cpuIntensive} CPU-intensive processes`);
    }
    if (process.intensity.memoryIntensive > t.memoryIntensiveProcesses) {
      push('critical', 'process', `${process.intensity.memoryIntensive} memory-intensive processes`);
    }
  }
}

type Reporter = (severity: IssueSeverity, source: SamplerName, message: string) => void;

function severityRank(severity: IssueSeverity): number {
  return severity === 'critical' ? 1 : 0;
}

const defaultDetector = new IssueDetector();

export function detectIssues(snapshot: HostSnapshot): Issue[] {
  return defaultDetector.detect(snapshot);
}
