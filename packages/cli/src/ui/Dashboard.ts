import chalk from 'chalk';
import type { HostSnapshot, Issue } from '@tickscope/shared';
import { TICKSCOPE_VERSION, formatDuration } from '@tickscope/shared';
import {
  colorPercent,
  formatCount,
  formatKilobytes,
  formatRate,
  progressBar,
  sparkline,
} from '../utils/format.js';
import { MetricHistory } from './History.js';
import {
  renderDeviceTable,
  renderInterruptTable,
  renderIssues,
  renderNumaTable,
  renderProcessTable,
} from './Table.js';

export const VIEWS = ['overview', 'storage', 'perf', 'process', 'numa'] as const;

export type ViewName = (typeof VIEWS)[number];

export function isViewName(value: string): value is ViewName {
  return VIEWS.some((view) => view === value);
}

const RULE = '─'.repeat(68);

function header(title: string, snapshot: HostSnapshot, interval: number | null = null): string {
  const every = interval === null ? '' : `  every ${formatDuration(interval)}`;
  return (
    chalk.bold.cyan(`  ${title}`) +
    chalk.gray(`  tick ${snapshot.tick}  ${snapshot.timestamp.toISOString()}${every}`)
  );
}

function unavailable(what: string): string {
  return chalk.gray(`  ${what}: no data`);
}

export function renderCpuSummary(snapshot: HostSnapshot): string[] {
  const cpu = snapshot.cpu;
  if (!cpu) return [unavailable('CPU')];
  const p = cpu.percentages;
  const lines = [`  CPU       ${colorPercent(cpu.usagePercent)}`];
  if (p) {
    lines.push(
      chalk.gray(
        `    user ${p.user.toFixed(1)}  system ${p.system.toFixed(1)}  iowait ${p.iowait.toFixed(1)}  ` +
          `irq ${p.irq.toFixed(1)}  softirq ${p.softirq.toFixed(1)}  steal ${p.steal.toFixed(1)}`,
      ),
    );
  }
  return lines;
}

export function renderMemorySummary(snapshot: HostSnapshot): string[] {
  const memory = snapshot.memory;
  if (!memory) return [unavailable('Memory')];
  const { counters, derived } = memory;
  if (!derived) return [`  Memory    ${formatKilobytes(counters.memTotal)} total`];
  return [
    `  Memory    ${colorPercent(derived.memoryUsagePercent, 85, 95)} of ${formatKilobytes(counters.memTotal)}` +
      chalk.gray(`  (${formatKilobytes(counters.memAvailable)} available)`),
    chalk.gray(
      `    cache ${derived.totalCachePercent.toFixed(1)}%  dirty ${derived.dirtyPercent.toFixed(2)}%  ` +
        `writeback ${derived.writebackPercent.toFixed(2)}%`,
    ),
  ];
}

export function renderStorageSummary(snapshot: HostSnapshot): string[] {
  const storage = snapshot.storage;
  if (!storage) return [unavailable('Storage')];
  return [
    `  Storage   ${formatCount(storage.totalIops)} IOPS  ${formatRate(storage.totalMbps, 'MB/s')}` +
      chalk.gray(
        `  (${storage.devices.length} devices, ${storage.hotDeviceCount} hot, ` +
          `${storage.bottleneckCount} saturated)`,
      ),
  ];
}

export function renderPerfSummary(snapshot: HostSnapshot): string[] {
  const perf = snapshot.perf;
  if (!perf) return [unavailable('Perf')];
  if (perf.mode !== 'counters' || !perf.metrics) {
    return [chalk.gray(`  Perf      ${perf.mode}`)];
  }
  const m = perf.metrics;
  return [
    `  Perf      IPC ${m.ipc.toFixed(2)}  cache hit ${m.cacheHitRate.toFixed(1)}%` +
      `  branch miss ${m.branchMissRate.toFixed(2)}%` +
      chalk.gray(`  (${perf.source})`),
  ];
}

export function renderNumaSummary(snapshot: HostSnapshot): string[] {
  const numa = snapshot.numa;
  if (!numa) return [unavailable('NUMA')];
  const pressure = numa.pressure;
  return [
    `  NUMA      ${numa.nodes.length} node(s), avg ${colorPercent(numa.averageUsagePercent, 70, 90)}` +
      chalk.gray(`  pressure ${pressure ? pressure.score : '-'}  spread ${numa.imbalance.spread.toFixed(1)}`),
  ];
}

export function renderProcessSummary(snapshot: HostSnapshot): string[] {
  const proc = snapshot.process;
  if (!proc) return [unavailable('Processes')];
  const top = proc.topCpu[0];
  return [
    `  Processes ${proc.count} tracked` +
      chalk.gray(`  (${proc.intensity.cpuIntensive} cpu-heavy, ${proc.intensity.memoryIntensive} memory-heavy)`) +
      (top ? `  top: ${top.comm} ${colorPercent(top.rates?.cpuUsagePercent)}` : ''),
  ];
}

/**
 * One scrolling block per tick: a line per enabled sampler, then the issues
 * found in this snapshot.
 */
export function renderTextBlock(snapshot: HostSnapshot, issues: Issue[]): string {
  const lines: string[] = [header('tickscope', snapshot), chalk.gray(`  ${RULE}`)];

  lines.push(...renderCpuSummary(snapshot));
  lines.push(...renderMemorySummary(snapshot));
  if (snapshot.storage) lines.push(...renderStorageSummary(snapshot));
  if (snapshot.numa) lines.push(...renderNumaSummary(snapshot));
  if (snapshot.perf) lines.push(...renderPerfSummary(snapshot));
  if (snapshot.process) lines.push(...renderProcessSummary(snapshot));

  const disabled = snapshot.samplers.filter((status) => status.state === 'disabled');
  for (const status of disabled) {
    lines.push(chalk.gray(`  ${status.name}: disabled (${status.lastError ?? 'unavailable'})`));
  }

  lines.push(renderIssues(issues));
  return lines.join('\n');
}

/**
 * Redrawing multi-view dashboard. Keeps CPU, memory and IOPS history across
 * ticks for the overview sparklines.
 */
export class Dashboard {
  private view: ViewName;
  private interval: number | null;
  private cpuHistory = new MetricHistory();
  private memoryHistory = new MetricHistory();
  private iopsHistory = new MetricHistory();

  /** `interval` is the tick length in milliseconds, shown in the header when given. */
  constructor(view: ViewName = 'overview', interval: number | null = null) {
    this.view = view;
    this.interval = interval;
  }

  getView(): ViewName {
    return this.view;
  }

  setView(view: ViewName): void {
    this.view = view;
  }

  /** Record the snapshot's headline figures; call once per tick. */
  record(snapshot: HostSnapshot): void {
    const usage = snapshot.cpu?.usagePercent;
    if (usage !== null && usage !== undefined) this.cpuHistory.push(usage);
    const derived = snapshot.memory?.derived;
    if (derived) this.memoryHistory.push(derived.memoryUsagePercent);
    if (snapshot.storage) this.iopsHistory.push(snapshot.storage.totalIops);
  }

  render(snapshot: HostSnapshot, issues: Issue[]): string {
    const tabs = VIEWS.map((view) => (view === this.view ? chalk.inverse(` ${view} `) : ` ${view} `)).join(
      chalk.gray('|'),
    );
    const lines: string[] = [
      header(`tickscope v${TICKSCOPE_VERSION}`, snapshot, this.interval),
      `  ${tabs}`,
      chalk.gray(`  ${RULE}`),
    ];

    switch (this.view) {
      case 'overview':
        lines.push(...this.renderOverview(snapshot));
        break;
      case 'storage':
        lines.push(...renderStorageSummary(snapshot));
        if (snapshot.storage) lines.push(renderDeviceTable(snapshot.storage.devices));
        break;
      case 'perf':
        lines.push(...renderPerfSummary(snapshot));
        lines.push(...this.renderPerfDetail(snapshot));
        break;
      case 'process':
        lines.push(...renderProcessSummary(snapshot));
        if (snapshot.process) lines.push(renderProcessTable(snapshot.process.topCpu));
        break;
      case 'numa':
        lines.push(...renderNumaSummary(snapshot));
        if (snapshot.numa) lines.push(renderNumaTable(snapshot.numa.nodes));
        break;
    }

    lines.push(chalk.gray(`  ${RULE}`));
    lines.push(renderIssues(issues));
    lines.push(chalk.gray('\n  Press Ctrl+C to exit'));
    return lines.join('\n');
  }

  private renderOverview(snapshot: HostSnapshot): string[] {
    const lines: string[] = [];
    const usage = snapshot.cpu?.usagePercent;
    const derived = snapshot.memory?.derived;

    lines.push(`  CPU    ${progressBar(usage ?? 0)} ${colorPercent(usage)}`);
    lines.push(chalk.gray(`         ${sparkline(this.cpuHistory.values(), 100)}`));
    lines.push(`  Memory ${progressBar(derived?.memoryUsagePercent ?? 0)} ${colorPercent(derived?.memoryUsagePercent, 85, 95)}`);
    lines.push(chalk.gray(`         ${sparkline(this.memoryHistory.values(), 100)}`));
    if (snapshot.storage) {
      lines.push(`  IOPS   ${formatCount(snapshot.storage.totalIops)}`);
      lines.push(chalk.gray(`         ${sparkline(this.iopsHistory.values())}`));
    }

    const interrupts = snapshot.cpu?.topInterrupts ?? [];
    if (interrupts.length > 0) {
      lines.push(chalk.bold('\n  Interrupts'));
      lines.push(renderInterruptTable(interrupts));
    }
    return lines;
  }

  private renderPerfDetail(snapshot: HostSnapshot): string[] {
    const metrics = snapshot.perf?.metrics;
    if (!metrics) return [];
    return [
      `    instructions/cycle  ${metrics.ipc.toFixed(2)}`,
      `    cache hit rate      ${metrics.cacheHitRate.toFixed(1)}%${metrics.cacheThrashing ? chalk.red('  thrashing') : ''}`,
      `    branch miss rate    ${metrics.branchMissRate.toFixed(2)}%${metrics.branchMispredicting ? chalk.red('  mispredicting') : ''}`,
      `    context switches    ${formatCount(metrics.contextSwitchRate)}`,
      `    page faults         ${formatCount(metrics.pageFaultRate)}`,
    ];
  }
}
