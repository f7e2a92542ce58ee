import { tmpdir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { SensorThresholds } from '@rigcheck/sensors';
import type { StressConfig } from '@rigcheck/stress';

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

export type SourceConfig = {
  host: string;
  port: number;
  timeoutMs: number;
};

export type StartupConfig = {
  attempts: number;
  delayMs: number;
  probeTimeoutMs: number;
};

export type OutputConfig = {
  directory: string;
  openReports: boolean;
};

export type MonitorConfig = {
  source: SourceConfig;
  startup: StartupConfig;
  stress: StressConfig;
  thresholds: SensorThresholds;
  output: OutputConfig;
};

export type MonitorConfigOverrides = {
  source?: Partial<SourceConfig>;
  startup?: Partial<StartupConfig>;
  stress?: Partial<StressConfig>;
  thresholds?: Partial<SensorThresholds>;
  output?: Partial<OutputConfig>;
};

export class ConfigError extends Error {
  readonly code = 'invalid-config';

  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export const defaultMonitorConfig: MonitorConfig = {
  source: {
    host: 'localhost',
    port: 8085,
    timeoutMs: 5_000,
  },
  startup: {
    attempts: 3,
    delayMs: 2_000,
    probeTimeoutMs: 2_000,
  },
  stress: {
    cpuDurationMs: 10_000,
    cpuJoinMarginMs: 2_000,
    cpuWorkers: undefined,
    ramDurationMs: 10_000,
    ramFraction: 0.3,
    ramCapBytes: 1 * GiB,
    ramChunkBytes: 8 * MiB,
    ramMinBytes: 8 * MiB,
    ramPauseMs: 10,
    diskDurationMs: 10_000,
    diskBufferBytes: 1 * MiB,
    diskMinFreeBytes: 500 * MiB,
    diskDirectory: tmpdir(),
    gpuDurationMs: 10_000,
    gpuPollIntervalMs: 2_000,
  },
  thresholds: {
    cpuTemperature: 85,
    gpuTemperature: 90,
    diskLoad: 90,
    ramLoad: 90,
    power: 200,
    voltage: { min: 0.8, max: 1.5 },
  },
  output: {
    directory: path.resolve('reports'),
    openReports: true,
  },
};

const positiveInt = z.number().int().positive();
const durationMs = z.number().int().min(0);

const configSchema: z.ZodType<MonitorConfig> = z.object({
  source: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65_535),
    timeoutMs: positiveInt,
  }),
  startup: z.object({
    attempts: positiveInt,
    delayMs: durationMs,
    probeTimeoutMs: positiveInt,
  }),
  stress: z.object({
    cpuDurationMs: durationMs,
    cpuJoinMarginMs: durationMs,
    cpuWorkers: positiveInt.optional(),
    ramDurationMs: durationMs,
    ramFraction: z.number().gt(0).max(1),
    ramCapBytes: positiveInt,
    ramChunkBytes: positiveInt,
    ramMinBytes: positiveInt,
    ramPauseMs: durationMs,
    diskDurationMs: durationMs,
    diskBufferBytes: positiveInt,
    diskMinFreeBytes: z.number().int().min(0),
    diskDirectory: z.string().min(1),
    gpuDurationMs: durationMs,
    gpuPollIntervalMs: positiveInt,
  }),
  thresholds: z.object({
    cpuTemperature: z.number(),
    gpuTemperature: z.number(),
    diskLoad: z.number(),
    ramLoad: z.number(),
    power: z.number(),
    voltage: z
      .object({ min: z.number(), max: z.number() })
      .refine((range) => range.min < range.max, { message: 'voltage min must be below max' }),
  }),
  output: z.object({
    directory: z.string().min(1),
    openReports: z.boolean(),
  }),
});

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  const entries: unknown[] = Object.values(value);
  for (const entry of entries) {
    if (typeof entry === 'object' && entry !== null && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
};

export const createMonitorConfig = (overrides: MonitorConfigOverrides = {}): MonitorConfig => {
  const merged: MonitorConfig = {
    source: { ...defaultMonitorConfig.source, ...overrides.source },
    startup: { ...defaultMonitorConfig.startup, ...overrides.startup },
    stress: { ...defaultMonitorConfig.stress, ...overrides.stress },
    thresholds: {
      ...defaultMonitorConfig.thresholds,
      ...overrides.thresholds,
      voltage: { ...(overrides.thresholds?.voltage ?? defaultMonitorConfig.thresholds.voltage) },
    },
    output: { ...defaultMonitorConfig.output, ...overrides.output },
  };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
        return `${where}: ${issue.message}`;
      }),
    );
  }
  return deepFreeze(result.data);
};

export const sourceBaseUrl = (config: MonitorConfig): string => {
  return `http://${config.source.host}:${config.source.port}`;
};
