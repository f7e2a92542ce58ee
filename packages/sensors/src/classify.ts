import type {
  RawSensorNode,
  SensorKind,
  SensorLogger,
  SensorReading,
  SensorThresholds,
} from './types';

const KIND_RULES: Array<{ kind: SensorKind; pattern: RegExp }> = [
  { kind: 'Temperature', pattern: /temperature|°c/i },
  { kind: 'Load', pattern: /load|%/i },
  { kind: 'Voltage', pattern: /voltage|v/i },
  { kind: 'Fan', pattern: /fan|rpm/i },
  { kind: 'Data', pattern: /data|gb|mb|used space|available/i },
  { kind: 'Power', pattern: /power|w/i },
  { kind: 'Clock', pattern: /clock|mhz/i },
];

export const UNIT_BY_KIND: Readonly<Record<SensorKind, string>> = {
  Temperature: '°C',
  Voltage: 'V',
  Fan: 'RPM',
  Load: '%',
  Data: 'GB',
  Power: 'W',
  Clock: 'MHz',
  Unknown: '',
};

export const CPU_NAME_PATTERN = /\b(?:cpu|processor)\b|^core\b/i;
export const GPU_NAME_PATTERN = /gpu|graphics|video/i;
export const DISK_NAME_PATTERN = /disk|drive|ssd|hdd|nvme|storage|used space/i;
const MEMORY_NAME_PATTERN = /\b(?:ram|memory)\b/i;

const DECIMAL_PATTERN = /^\d+(?:\.\d+)?$/;

const silentLogger: SensorLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const isCpuSensor = (name: string): boolean => CPU_NAME_PATTERN.test(name);
export const isGpuSensor = (name: string): boolean => GPU_NAME_PATTERN.test(name);
export const isDiskSensor = (name: string): boolean => DISK_NAME_PATTERN.test(name);
export const isMemorySensor = (name: string): boolean =>
  MEMORY_NAME_PATTERN.test(name) && !GPU_NAME_PATTERN.test(name);

export const cleanNumericText = (value: string): string => {
  return value.replace(/[^\d,.]/g, '').replace(/,/g, '.');
};

export const parseSensorValue = (value: string): number | null => {
  const cleaned = cleanNumericText(value);
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null;
  }
  return Number.parseFloat(cleaned);
};

export const roundValue = (value: number): number => Number(value.toFixed(2));

export const classifyKind = (name: string, value: string): SensorKind => {
  const text = `${name}${value}`;
  const rule = KIND_RULES.find((entry) => entry.pattern.test(text));
  return rule?.kind ?? 'Unknown';
};

export const resolveThreshold = (
  name: string,
  kind: SensorKind,
  thresholds: SensorThresholds,
): number | undefined => {
  if (isCpuSensor(name) && kind === 'Temperature') {
    return thresholds.cpuTemperature;
  }
  if (isGpuSensor(name) && kind === 'Temperature') {
    return thresholds.gpuTemperature;
  }
  if (isDiskSensor(name) && kind === 'Load') {
    return thresholds.diskLoad;
  }
  if (name.includes('Volt')) {
    return thresholds.voltage.max;
  }
  if (name.includes('Power') && kind === 'Power') {
    return thresholds.power;
  }
  return undefined;
};

export const isLeafCandidate = (node: RawSensorNode): boolean => {
  return node.children.length === 0 && node.name.length > 0 && node.value.length > 0;
};

/**
 * Turn one leaf into a reading. Returns null when the value is not a plain
 * decimal quantity once units are stripped (model names, versions, etc.).
 */
export const classifyLeaf = (
  node: RawSensorNode,
  thresholds: SensorThresholds,
): SensorReading | null => {
  const parsed = parseSensorValue(node.value);
  if (parsed === null) {
    return null;
  }
  const kind = classifyKind(node.name, node.value);
  const max = resolveThreshold(node.name, kind, thresholds);
  const reading: SensorReading = {
    name: node.name,
    kind,
    value: roundValue(parsed),
    unit: UNIT_BY_KIND[kind],
    rawValue: node.value,
  };
  if (max !== undefined) {
    reading.max = max;
  }
  return Object.freeze(reading);
};

export const flattenSensorTree = (
  root: RawSensorNode,
  thresholds: SensorThresholds,
  logger: SensorLogger = silentLogger,
): SensorReading[] => {
  const readings: SensorReading[] = [];

  const visit = (node: RawSensorNode): void => {
    if (isLeafCandidate(node)) {
      const reading = classifyLeaf(node, thresholds);
      if (reading) {
        readings.push(reading);
      } else {
        logger.warn(`skipping non-numeric sensor value: ${node.name}`, { value: node.value });
      }
    }
    for (const child of node.children) {
      visit(child);
    }
  };

  visit(root);

  const known = readings.filter((reading) => reading.kind !== 'Unknown');
  if (known.length === 0) {
    logger.warn('no classifiable sensor readings found');
  }
  return known;
};
