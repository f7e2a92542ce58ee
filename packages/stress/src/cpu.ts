import { Worker } from 'node:worker_threads';
import type { WorkerOptions } from 'node:worker_threads';
import os from 'node:os';
import path from 'node:path';
import { isCpuSensor } from '@rigcheck/sensors';
import type { SensorLogger } from '@rigcheck/sensors';
import { maxValue } from './sampling';
import type { StressContext, StressOutcome } from './types';
import type { CpuWorkerData, CpuWorkerReport } from './workers/types';

export type CpuLoadOptions = {
  workers: number;
  durationMs: number;
  joinMarginMs: number;
  logger: SensorLogger;
  spawnWorker?: (file: string, options: WorkerOptions) => Worker;
};

export type CpuLoadSummary = {
  workers: number;
  iterations: number;
  terminated: number;
};

type WorkerExit = {
  code: number;
  error?: Error;
  report?: CpuWorkerReport;
};

const resolveWorkerPath = (): { path: string; execArgv: string[] } => {
  const isTypeScript = __filename.endsWith('.ts');
  const workerFile = isTypeScript ? 'cpu-worker.ts' : 'cpu-worker.js';
  const workerPath = path.join(__dirname, 'workers', workerFile);
  const execArgv = isTypeScript ? ['--require', 'tsx/cjs'] : [];
  return { path: workerPath, execArgv };
};

export const logicalCoreCount = (): number => {
  return Math.max(1, os.availableParallelism());
};

const joinWorker = (worker: Worker, exited: Set<Worker>): Promise<WorkerExit> => {
  return new Promise((resolve) => {
    let error: Error | undefined;
    let report: CpuWorkerReport | undefined;
    worker.on('message', (message: CpuWorkerReport) => {
      report = message;
    });
    worker.once('error', (workerError) => {
      error = workerError;
    });
    worker.once('exit', (code) => {
      exited.add(worker);
      resolve({ code, error, report });
    });
  });
};

/**
 * Spin one worker per requested core until the deadline. Workers that have
 * not exited `joinMarginMs` after the deadline get the cancel flag raised and
 * are terminated.
 */
export const runCpuLoad = async (options: CpuLoadOptions): Promise<CpuLoadSummary> => {
  const { path: workerPath, execArgv } = resolveWorkerPath();
  const cancel = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
  const data: CpuWorkerData = { deadline: Date.now() + options.durationMs, cancel };
  const spawnWorker =
    options.spawnWorker ?? ((file: string, workerOptions: WorkerOptions) => new Worker(file, workerOptions));
  const workers: Worker[] = [];
  try {
    for (let i = 0; i < options.workers; i += 1) {
      workers.push(spawnWorker(workerPath, { execArgv, workerData: data }));
    }
  } catch (error) {
    Atomics.store(new Int32Array(cancel), 0, 1);
    await Promise.all(workers.map((worker) => worker.terminate()));
    throw error;
  }
  const exited = new Set<Worker>();
  const exits = workers.map((worker) => joinWorker(worker, exited));

  let timer: NodeJS.Timeout | undefined;
  const timedOut = await Promise.race([
    Promise.all(exits).then(() => false),
    new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), options.durationMs + options.joinMarginMs);
    }),
  ]);
  clearTimeout(timer);

  let terminated = 0;
  if (timedOut) {
    Atomics.store(new Int32Array(cancel), 0, 1);
    const stragglers = workers.filter((worker) => !exited.has(worker));
    await Promise.all(stragglers.map((worker) => worker.terminate()));
    terminated = stragglers.length;
    options.logger.warn(`CPU stress terminated ${terminated} worker(s) that missed the join deadline`);
  }

  const settled = await Promise.all(exits);
  const failed = settled.find((entry) => entry.error);
  if (failed?.error) {
    throw failed.error;
  }

  return {
    workers: workers.length,
    iterations: settled.reduce((sum, entry) => sum + (entry.report?.iterations ?? 0), 0),
    terminated,
  };
};

export const runCpuStress = async (context: StressContext): Promise<StressOutcome> => {
  const { config, logger, thresholds } = context;
  const workers = config.cpuWorkers ?? logicalCoreCount();
  logger.info(`CPU stress: ${workers} worker(s) for ${config.cpuDurationMs} ms`);
  const summary = await runCpuLoad({
    workers,
    durationMs: config.cpuDurationMs,
    joinMarginMs: config.cpuJoinMarginMs,
    logger,
  });
  logger.info(`CPU stress completed ${summary.iterations} batches across ${summary.workers} worker(s)`);

  const readings = await context.sample();
  const metric = maxValue(
    readings.filter((reading) => reading.kind === 'Temperature' && isCpuSensor(reading.name)),
  );
  if (metric === undefined) {
    logger.warn('no CPU temperature sensors reported');
    return { status: 'Unavailable' };
  }
  return { metric, status: metric > thresholds.cpuTemperature ? 'Critical' : 'OK' };
};
