import { parentPort, workerData } from 'node:worker_threads';
import type { CpuWorkerData, CpuWorkerReport } from './types';

const BATCH_SIZE = 10_000;

const spin = (data: CpuWorkerData): CpuWorkerReport => {
  const cancelled = new Int32Array(data.cancel);
  let iterations = 0;
  let checksum = 0;
  do {
    for (let i = 0; i < BATCH_SIZE; i += 1) {
      checksum += Math.sqrt(Math.random() * 1_000_000);
    }
    iterations += 1;
  } while (Date.now() < data.deadline && Atomics.load(cancelled, 0) === 0);
  return { type: 'done', iterations, checksum };
};

if (parentPort) {
  const data: CpuWorkerData = workerData;
  parentPort.postMessage(spin(data));
}
