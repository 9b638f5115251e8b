import { z } from 'zod';
import { DEFAULT_DEVICE_PREFIXES, DEFAULT_HOST_ROOT, DEFAULT_INTERVAL } from '../constants.js';

const ratio = z.number().min(0).max(1);
const percent = z.number().min(0).max(100);

export const samplersSchema = z.object({
  cpu: z.boolean().default(true),
  memory: z.boolean().default(true),
  storage: z.boolean().default(true),
  numa: z.boolean().default(false),
  perf: z.boolean().default(false),
  process: z.boolean().default(false),
});

export const cpuConfigSchema = z
  .object({
    interruptActivityFloor: z.number().int().min(0).default(10_000),
    stormRatio: ratio.default(0.8),
    unbalancedRatio: ratio.default(0.5),
    minCpuCounters: z.number().int().min(1).default(10),
    topInterrupts: z.number().int().positive().default(10),
  })
  .refine((cfg) => cfg.unbalancedRatio <= cfg.stormRatio, {
    message: 'unbalancedRatio must not exceed stormRatio',
    path: ['unbalancedRatio'],
  });

export const memoryConfigSchema = z.object({
  pressureAvailablePercent: percent.default(10),
  dirtyPercent: percent.default(2),
  writebackPercent: percent.default(1),
  lowCachePercent: percent.default(15),
  writeBottleneckDirtyPercent: percent.default(5),
});

export const storageConfigSchema = z
  .object({
    devicePrefixes: z.array(z.string().min(1)).min(1).default(DEFAULT_DEVICE_PREFIXES),
    hotFraction: z.number().gt(0).max(1).default(0.25),
    bottleneckQueueDepth: z.number().int().min(0).default(100),
    warningQueueDepth: z.number().int().min(0).default(50),
    queueCapacity: z.number().int().positive().default(128),
    sectorSize: z.number().int().positive().default(512),
  })
  .refine((cfg) => cfg.warningQueueDepth <= cfg.bottleneckQueueDepth, {
    message: 'warningQueueDepth must not exceed bottleneckQueueDepth',
    path: ['warningQueueDepth'],
  });

export const numaConfigSchema = z.object({
  imbalancePercent: percent.default(30),
  criticalScore: z.number().min(0).default(50),
});

export const PERF_SOURCES = ['unavailable', 'simulated'] as const;

export const perfConfigSchema = z.object({
  source: z.enum(PERF_SOURCES).default('unavailable'),
  cacheThrashingHitRate: percent.default(80),
  branchMissRate: percent.default(5),
});

export const processConfigSchema = z.object({
  clockTicksPerSecond: z.number().int().positive().default(100),
  pageSize: z.number().int().positive().default(4096),
  cpuPercent: z.number().min(0).default(50),
  memoryMb: z.number().min(0).default(1000),
  ioBytesPerSyscall: z.number().min(0).default(1000),
  contextSwitches: z.number().min(0).default(1000),
  pageFaults: z.number().min(0).default(100),
  topCount: z.number().int().positive().default(10),
});

export const logConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(false),
  file: z.string().min(1).optional(),
});

export const tickscopeConfigSchema = z.object({
  interval: z.union([z.string().min(1), z.number().int().positive()]).default(DEFAULT_INTERVAL),
  hostRoot: z.string().min(1).default(DEFAULT_HOST_ROOT),
  samplers: samplersSchema.default({}),
  cpu: cpuConfigSchema.default({}),
  memory: memoryConfigSchema.default({}),
  storage: storageConfigSchema.default({}),
  numa: numaConfigSchema.default({}),
  perf: perfConfigSchema.default({}),
  process: processConfigSchema.default({}),
  log: logConfigSchema.default({}),
});

export type TickscopeConfigInput = z.input<typeof tickscopeConfigSchema>;
export type ValidatedConfig = z.infer<typeof tickscopeConfigSchema>;

export type SamplersConfig = z.infer<typeof samplersSchema>;
export type CpuConfig = z.infer<typeof cpuConfigSchema>;
export type MemoryConfig = z.infer<typeof memoryConfigSchema>;
export type StorageConfig = z.infer<typeof storageConfigSchema>;
export type NumaConfig = z.infer<typeof numaConfigSchema>;
export type PerfConfig = z.infer<typeof perfConfigSchema>;
export type PerfSourceKind = (typeof PERF_SOURCES)[number];
export type ProcessConfig = z.infer<typeof processConfigSchema>;
export type LogConfig = z.infer<typeof logConfigSchema>;

/** Validated configuration with the interval resolved to milliseconds. */
export type ResolvedConfig = Omit<ValidatedConfig, 'interval'> & { interval: number };
