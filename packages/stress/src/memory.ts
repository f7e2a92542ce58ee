import { randomFillSync } from 'node:crypto';
import { isMemorySensor } from '@rigcheck/sensors';
import type { SensorLogger } from '@rigcheck/sensors';
import { InsufficientResourceError } from './errors';
import { maxValue, mib, sleep } from './sampling';
import type { MemorySnapshot, StressConfig, StressContext, StressOutcome } from './types';

export type MemoryPlanConfig = Pick<StressConfig, 'ramFraction' | 'ramCapBytes' | 'ramMinBytes'>;

export type MemoryLoadOptions = {
  targetBytes: number;
  chunkBytes: number;
  durationMs: number;
  pauseMs: number;
  logger: SensorLogger;
  allocate?: (bytes: number) => Buffer;
};

export type MemoryLoadSummary = {
  allocatedChunks: number;
  releasedChunks: number;
  rewrites: number;
};

export const planMemoryAllocation = (snapshot: MemorySnapshot, config: MemoryPlanConfig): number => {
  const targetBytes = Math.floor(Math.min(snapshot.totalBytes * config.ramFraction, config.ramCapBytes));
  if (targetBytes < config.ramMinBytes) {
    throw new InsufficientResourceError(
      `memory target ${mib(targetBytes)} MiB is below the ${mib(config.ramMinBytes)} MiB minimum`,
    );
  }
  if (snapshot.freeBytes < targetBytes) {
    throw new InsufficientResourceError(
      `not enough free memory: ${mib(snapshot.freeBytes)} MiB free, ${mib(targetBytes)} MiB required`,
    );
  }
  return targetBytes;
};

const requestGarbageCollection = (): void => {
  const collect: unknown = Reflect.get(globalThis, 'gc');
  if (typeof collect === 'function') {
    collect();
  }
};

/**
 * Allocate the target in fixed chunks, then keep rewriting the first chunk
 * with random bytes until the deadline. Every chunk is dropped before return.
 */
export const runMemoryLoad = async (options: MemoryLoadOptions): Promise<MemoryLoadSummary> => {
  const allocate = options.allocate ?? ((bytes: number) => Buffer.alloc(bytes));
  const chunks: Buffer[] = [];
  const chunkCount = Math.max(1, Math.floor(options.targetBytes / options.chunkBytes));
  const summary: MemoryLoadSummary = { allocatedChunks: 0, releasedChunks: 0, rewrites: 0 };
  const deadline = Date.now() + options.durationMs;
  try {
    for (let i = 0; i < chunkCount; i += 1) {
      chunks.push(allocate(options.chunkBytes));
      summary.allocatedChunks += 1;
      await sleep(options.pauseMs);
    }
    const active = chunks[0];
    while (Date.now() < deadline) {
      randomFillSync(active);
      summary.rewrites += 1;
      await sleep(options.pauseMs);
    }
  } finally {
    summary.releasedChunks = chunks.length;
    chunks.length = 0;
    requestGarbageCollection();
    options.logger.info(
      `RAM stress released ${summary.releasedChunks} chunk(s) after ${summary.rewrites} rewrite(s)`,
    );
  }
  return summary;
};

export const runMemoryStress = async (context: StressContext): Promise<StressOutcome> => {
  const { config, logger, probes, thresholds } = context;
  const snapshot = await probes.memory();
  const targetBytes = planMemoryAllocation(snapshot, config);
  logger.info(
    `RAM stress: allocating ${mib(targetBytes)} MiB of ${mib(snapshot.totalBytes)} MiB (${mib(snapshot.freeBytes)} MiB free)`,
  );
  await runMemoryLoad({
    targetBytes,
    chunkBytes: config.ramChunkBytes,
    durationMs: config.ramDurationMs,
    pauseMs: config.ramPauseMs,
    logger,
  });

  const readings = await context.sample();
  const metric = maxValue(
    readings.filter((reading) => reading.kind === 'Load' && isMemorySensor(reading.name)),
  );
  if (metric === undefined) {
    logger.warn('no memory load sensors reported');
    return { status: 'Unavailable' };
  }
  return { metric, status: metric > thresholds.ramLoad ? 'HighUsage' : 'OK' };
};
