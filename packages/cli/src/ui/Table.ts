import Table from 'cli-table3';
import chalk from 'chalk';
import type { DeviceStats, InterruptStat, Issue, NumaNode, ProcessRecord } from '@tickscope/shared';
import {
  colorDeviceStatus,
  colorPercent,
  colorSeverity,
  formatBytes,
  formatCount,
  formatRate,
} from '../utils/format.js';

function newTable(head: string[]) {
  return new Table({
    head: head.map((title) => chalk.bold(title)),
    style: {
      head: [],
      border: ['gray'],
    },
  });
}

export function renderDeviceTable(devices: DeviceStats[]): string {
  const table = newTable([
    'device',
    'status',
    'r/s',
    'w/s',
    'read',
    'write',
    'latency',
    'queue',
    'util',
    'sched',
  ]);

  for (const device of devices) {
    const rates = device.rates;
    table.push([
      device.name,
      colorDeviceStatus(device.status),
      rates ? formatCount(rates.readIops) : chalk.gray('-'),
      rates ? formatCount(rates.writeIops) : chalk.gray('-'),
      formatRate(rates?.readMbps, 'MB/s'),
      formatRate(rates?.writeMbps, 'MB/s'),
      formatRate(rates?.avgLatencyMs, 'ms', 2),
      String(device.queueDepth),
      colorPercent(device.queueUtilization, 39, 78),
      device.scheduler ?? chalk.gray('-'),
    ]);
  }

  return table.toString();
}

export function renderInterruptTable(stats: InterruptStat[]): string {
  const table = newTable(['irq', 'total', 'delta', 'peak cpu', 'balance', 'class', 'description']);

  for (const stat of stats) {
    const classification =
      stat.classification === 'storm'
        ? chalk.red(stat.classification)
        : stat.classification === 'unbalanced'
          ? chalk.yellow(stat.classification)
          : stat.classification;
    table.push([
      stat.irq,
      formatCount(stat.total),
      stat.deltaTotal === null ? chalk.gray('-') : formatCount(stat.deltaTotal),
      `cpu${stat.maxCpu}`,
      `${(stat.balance * 100).toFixed(0)}%`,
      classification,
      stat.description,
    ]);
  }

  return table.toString();
}

export function renderProcessTable(records: ProcessRecord[]): string {
  const table = newTable(['pid', 'comm', 'state', 'cpu', 'memory', 'threads', 'cs/tick', 'flags']);

  for (const record of records) {
    const flags = Object.entries(record.flags)
      .filter(([, set]) => set)
      .map(([name]) => name.replace(/Intensive|Heavy/, ''));
    table.push([
      String(record.pid),
      record.comm,
      record.state,
      colorPercent(record.rates?.cpuUsagePercent),
      `${record.memoryUsageMb.toFixed(1)} MB`,
      String(record.counters.numThreads),
      record.rates ? formatCount(record.rates.contextSwitchRate) : chalk.gray('-'),
      flags.length > 0 ? chalk.yellow(flags.join(',')) : chalk.gray('-'),
    ]);
  }

  return table.toString();
}

export function renderNumaTable(nodes: NumaNode[]): string {
  const table = newTable(['node', 'cpus', 'total', 'used', 'usage']);

  for (const node of nodes) {
    table.push([
      node.synthetic ? `${node.id}*` : String(node.id),
      String(node.cpuCores.length),
      formatBytes(node.memTotalKb * 1024),
      formatBytes(node.memUsedKb * 1024),
      colorPercent(node.usagePercent, 70, 90),
    ]);
  }

  return table.toString();
}

export function renderIssues(issues: Issue[]): string {
  if (issues.length === 0) return chalk.green('  No issues detected');
  return issues
    .map((issue) => `  ${colorSeverity(issue.severity)} ${chalk.gray(`[${issue.source}]`)} ${issue.message}`)
    .join('\n');
}
