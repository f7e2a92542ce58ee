export {
  UNIT_BY_KIND,
  classifyKind,
  classifyLeaf,
  cleanNumericText,
  flattenSensorTree,
  isCpuSensor,
  isDiskSensor,
  isGpuSensor,
  isLeafCandidate,
  isMemorySensor,
  parseSensorValue,
  resolveThreshold,
  roundValue,
} from './classify';
export { SourceUnavailableError } from './errors';
export {
  DEFAULT_SOURCE_TIMEOUT_MS,
  SensorSource,
  decodeSensorTree,
  probePort,
  waitForSource,
} from './source';
export type {
  ProbeOptions,
  RawSensorNode,
  SensorKind,
  SensorLogger,
  SensorReading,
  SensorSourceOptions,
  SensorThresholds,
  VoltageRange,
} from './types';
