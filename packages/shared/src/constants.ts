export const TICKSCOPE_VERSION = '0.3.0';

export const TICKSCOPE_CONFIG_FILES = ['tickscope.config.json', '.tickscope.json'];

export const DEFAULT_INTERVAL = '2s';
export const DEFAULT_HOST_ROOT = '/';

export const PROC_STAT = '/proc/stat';
export const PROC_INTERRUPTS = '/proc/interrupts';
export const PROC_MEMINFO = '/proc/meminfo';
export const PROC_DISKSTATS = '/proc/diskstats';
export const PROC_VMSTAT = '/proc/vmstat';
export const PROC_ROOT = '/proc';
export const SYS_BLOCK = '/sys/block';
export const SYS_NUMA_NODES = '/sys/devices/system/node';

export const DEFAULT_DEVICE_PREFIXES = ['nvme', 'sd', 'md', 'gdg', 'sxl'];

export const BYTES_PER_MB = 1024 * 1024;

/**
 * Fixed contributions to the systemwide memory pressure score. Each trigger
 * adds its points once per tick; the score is compared against
 * `numa.criticalScore` from the configuration.
 */
export const NUMA_PRESSURE_WEIGHTS = {
  dirtyPages: { above: 1000, points: 20 },
  writebackPages: { above: 500, points: 15 },
  scannedPages: { above: 1000, points: 25 },
  majorFaults: { above: 10, points: 30 },
  swapActivity: { above: 0, points: 40 },
} as const;

export const SPARKLINE_POINTS = 60;
