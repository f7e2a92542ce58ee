import { constants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { isDiskSensor } from '@rigcheck/sensors';
import { InsufficientResourceError } from './errors';
import { maxValue, mib } from './sampling';
import type { StressContext, StressOutcome } from './types';

export type DiskLoadOptions = {
  directory: string;
  bufferBytes: number;
  durationMs: number;
  syncEachWrite?: boolean;
};

export type DiskLoadSummary = {
  filePath: string;
  writes: number;
  syncs: number;
  bytesWritten: number;
};

// Windows has no O_SYNC; there every write is followed by a datasync instead.
const syncFlag: unknown = Reflect.get(constants, 'O_SYNC');
const O_SYNC = typeof syncFlag === 'number' ? syncFlag : undefined;

const WRITE_FLAGS = constants.O_WRONLY | constants.O_CREAT | constants.O_TRUNC | (O_SYNC ?? 0);

export const runDiskLoad = async (options: DiskLoadOptions): Promise<DiskLoadSummary> => {
  const filePath = path.join(options.directory, `rigcheck-disk-${process.pid}-${Date.now()}.bin`);
  const buffer = Buffer.alloc(options.bufferBytes, 0xa5);
  const syncEachWrite = options.syncEachWrite ?? (O_SYNC === undefined);
  const summary: DiskLoadSummary = { filePath, writes: 0, syncs: 0, bytesWritten: 0 };
  const deadline = Date.now() + options.durationMs;
  try {
    const handle = await fs.open(filePath, WRITE_FLAGS);
    try {
      do {
        const { bytesWritten } = await handle.write(buffer, 0, buffer.length);
        summary.writes += 1;
        summary.bytesWritten += bytesWritten;
        if (syncEachWrite) {
          await handle.datasync();
          summary.syncs += 1;
        }
      } while (Date.now() < deadline);
    } finally {
      await handle.close();
    }
  } finally {
    await fs.rm(filePath, { force: true });
  }
  return summary;
};

export const runDiskStress = async (context: StressContext): Promise<StressOutcome> => {
  const { config, logger, probes, thresholds } = context;
  const freeBytes = await probes.freeDiskSpace(config.diskDirectory);
  if (freeBytes <= config.diskMinFreeBytes) {
    throw new InsufficientResourceError(
      `not enough free disk space: ${mib(freeBytes)} MiB free, more than ${mib(config.diskMinFreeBytes)} MiB required`,
    );
  }
  logger.info(`Disk stress: writing to ${config.diskDirectory} for ${config.diskDurationMs} ms`);
  const summary = await runDiskLoad({
    directory: config.diskDirectory,
    bufferBytes: config.diskBufferBytes,
    durationMs: config.diskDurationMs,
  });
  logger.info(`Disk stress wrote ${mib(summary.bytesWritten)} MiB in ${summary.writes} write(s)`);

  const readings = await context.sample();
  const metric = maxValue(
    readings.filter((reading) => reading.kind === 'Load' && isDiskSensor(reading.name)),
  );
  if (metric === undefined) {
    logger.warn('no disk load sensors reported');
    return { status: 'Unavailable' };
  }
  return { metric, status: metric > thresholds.diskLoad ? 'HighUsage' : 'OK' };
};
