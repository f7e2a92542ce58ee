import { isGpuSensor } from '@rigcheck/sensors';
import { sleep } from './sampling';
import type { StressContext, StressOutcome } from './types';

/**
 * GPU load is not synthesized; the routine polls GPU temperatures for the
 * configured window. Missing GPU sensors (integrated graphics) are expected.
 */
export const runGpuStress = async (context: StressContext): Promise<StressOutcome> => {
  const { config, logger, thresholds } = context;
  const deadline = Date.now() + config.gpuDurationMs;
  const temperatures: number[] = [];
  let polls = 0;
  let failures = 0;
  let lastError: unknown;

  for (;;) {
    polls += 1;
    try {
      const readings = await context.sample();
      for (const reading of readings) {
        if (reading.kind === 'Temperature' && isGpuSensor(reading.name)) {
          temperatures.push(reading.value);
        }
      }
    } catch (error) {
      failures += 1;
      lastError = error;
      logger.warn(`GPU sensor poll ${polls} failed`, error);
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      break;
    }
    await sleep(Math.min(config.gpuPollIntervalMs, remaining));
  }

  if (failures === polls) {
    throw lastError instanceof Error ? lastError : new Error('every GPU sensor poll failed');
  }

  const metric = temperatures.length > 0 ? Math.max(...temperatures) : undefined;
  if (metric === undefined) {
    logger.warn('no GPU temperature sensors reported (integrated graphics or sensors not exposed)');
    return { status: 'Unavailable' };
  }
  return { metric, status: metric > thresholds.gpuTemperature ? 'Critical' : 'OK' };
};
