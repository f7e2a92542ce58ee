export type RawSensorNode = {
  name: string;
  value: string;
  children: RawSensorNode[];
  min?: string;
  max?: string;
};

export type SensorKind =
  | 'Temperature'
  | 'Load'
  | 'Voltage'
  | 'Fan'
  | 'Data'
  | 'Power'
  | 'Clock'
  | 'Unknown';

export type SensorReading = {
  name: string;
  kind: SensorKind;
  value: number;
  unit: string;
  max?: number;
  rawValue: string;
};

export type VoltageRange = {
  min: number;
  max: number;
};

export type SensorThresholds = {
  cpuTemperature: number;
  gpuTemperature: number;
  diskLoad: number;
  ramLoad: number;
  power: number;
  voltage: VoltageRange;
};

export type SensorLogger = {
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

export type SensorSourceOptions = {
  baseUrl: string;
  timeoutMs?: number;
  thresholds: SensorThresholds;
  logger?: SensorLogger;
};

export type ProbeOptions = {
  attempts: number;
  delayMs: number;
  timeoutMs: number;
  logger?: SensorLogger;
};
