import type { SensorReading } from '@rigcheck/sensors';

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const maxValue = (readings: SensorReading[]): number | undefined => {
  if (readings.length === 0) {
    return undefined;
  }
  return Math.max(...readings.map((reading) => reading.value));
};

export const mib = (bytes: number): string => (bytes / (1024 * 1024)).toFixed(1);
