import type { SensorLogger } from '@rigcheck/sensors';
import type { StressComponent, StressContext, StressResult, StressRoutine } from './types';

export type RoutineRun = {
  result: StressResult;
  error?: string;
};

const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

const formatMetric = (metric?: number): string => {
  return metric === undefined ? 'n/a' : metric.toFixed(1);
};

/**
 * Run one stress routine with its failures contained: any throw becomes an
 * `Error` result plus an error line, and never reaches the caller.
 */
export const runStressRoutine = async (
  component: StressComponent,
  routine: StressRoutine,
  context: StressContext,
): Promise<RoutineRun> => {
  const logger: SensorLogger = context.logger;
  logger.info(`starting ${component} stress test`);
  try {
    const outcome = await routine(context);
    const result: StressResult = { component, status: outcome.status };
    if (outcome.metric !== undefined) {
      result.metric = outcome.metric;
    }
    logger.info(`${component} stress test finished: ${outcome.status} (max ${formatMetric(outcome.metric)})`);
    return { result: Object.freeze(result) };
  } catch (error) {
    const message = `${component} stress test failed: ${describeError(error)}`;
    logger.error(message, error);
    const failed: StressResult = { component, status: 'Error' };
    return { result: Object.freeze(failed), error: message };
  }
};
