import type { SensorReading, VoltageRange } from '@rigcheck/sensors';

export const formatThresholdAlert = (reading: SensorReading, max: number): string => {
  return `${reading.name}: ${reading.value}${reading.unit} exceeds threshold ${max}${reading.unit}`;
};

export const formatVoltageAlert = (reading: SensorReading, range: VoltageRange): string => {
  return `${reading.name}: ${reading.value}V outside valid voltage range ${range.min}V-${range.max}V`;
};

const outsideRange = (value: number, range: VoltageRange): boolean => {
  return value < range.min || value > range.max;
};

/**
 * Threshold and voltage-range checks run independently per reading, so one
 * voltage reading can raise both. Stress errors follow in their run order.
 */
export const evaluateAlerts = (
  readings: SensorReading[],
  stressErrors: string[],
  voltageRange: VoltageRange,
): string[] => {
  const alerts: string[] = [];
  for (const reading of readings) {
    if (reading.max !== undefined && reading.value > reading.max) {
      alerts.push(formatThresholdAlert(reading, reading.max));
    }
    if (reading.kind === 'Voltage' && outsideRange(reading.value, voltageRange)) {
      alerts.push(formatVoltageAlert(reading, voltageRange));
    }
  }
  return [...alerts, ...stressErrors];
};
