import type { SensorLogger, SensorReading, SensorThresholds } from '@rigcheck/sensors';

export type StressComponent = 'CPU' | 'RAM' | 'Disk' | 'GPU';

export type StressStatus = 'OK' | 'Critical' | 'HighUsage' | 'Unavailable' | 'Error';

export type StressResult = {
  component: StressComponent;
  metric?: number;
  status: StressStatus;
};

export type StressOutcome = {
  metric?: number;
  status: Exclude<StressStatus, 'Error'>;
};

export type StressConfig = {
  cpuDurationMs: number;
  cpuJoinMarginMs: number;
  cpuWorkers?: number;
  ramDurationMs: number;
  ramFraction: number;
  ramCapBytes: number;
  ramChunkBytes: number;
  ramMinBytes: number;
  ramPauseMs: number;
  diskDurationMs: number;
  diskBufferBytes: number;
  diskMinFreeBytes: number;
  diskDirectory: string;
  gpuDurationMs: number;
  gpuPollIntervalMs: number;
};

export type MemorySnapshot = {
  freeBytes: number;
  totalBytes: number;
};

export type SystemProbes = {
  memory: () => Promise<MemorySnapshot>;
  freeDiskSpace: (directory: string) => Promise<number>;
};

export type StressContext = {
  config: StressConfig;
  thresholds: SensorThresholds;
  logger: SensorLogger;
  sample: () => Promise<SensorReading[]>;
  probes: SystemProbes;
};

export type StressRoutine = (context: StressContext) => Promise<StressOutcome>;

export type StressSuiteResult = {
  results: StressResult[];
  errors: string[];
};
