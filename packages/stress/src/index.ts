import { runCpuStress } from './cpu';
import { runDiskStress } from './disk';
import { runGpuStress } from './gpu';
import { runMemoryStress } from './memory';
import { runStressRoutine } from './runner';
import type {
  StressComponent,
  StressContext,
  StressResult,
  StressRoutine,
  StressSuiteResult,
} from './types';

export type StressRoutineTable = Record<StressComponent, StressRoutine>;

export const STRESS_ORDER: readonly StressComponent[] = ['CPU', 'RAM', 'Disk', 'GPU'];

export const defaultStressRoutines: StressRoutineTable = {
  CPU: runCpuStress,
  RAM: runMemoryStress,
  Disk: runDiskStress,
  GPU: runGpuStress,
};

export const runStressSuite = async (
  context: StressContext,
  routines: StressRoutineTable = defaultStressRoutines,
): Promise<StressSuiteResult> => {
  const results: StressResult[] = [];
  const errors: string[] = [];
  for (const component of STRESS_ORDER) {
    const run = await runStressRoutine(component, routines[component], context);
    results.push(run.result);
    if (run.error) {
      errors.push(run.error);
    }
  }
  return { results, errors };
};

export { logicalCoreCount, runCpuLoad, runCpuStress } from './cpu';
export { runDiskLoad, runDiskStress } from './disk';
export { InsufficientResourceError } from './errors';
export { runGpuStress } from './gpu';
export { planMemoryAllocation, runMemoryLoad, runMemoryStress } from './memory';
export { findVolume, readFreeDiskSpace, readMemorySnapshot, systemProbes } from './probes';
export type { VolumeSpace } from './probes';
export { runStressRoutine } from './runner';
export type { CpuLoadOptions, CpuLoadSummary } from './cpu';
export type { DiskLoadOptions, DiskLoadSummary } from './disk';
export type { MemoryLoadOptions, MemoryLoadSummary, MemoryPlanConfig } from './memory';
export type { RoutineRun } from './runner';
export type {
  MemorySnapshot,
  StressComponent,
  StressConfig,
  StressContext,
  StressOutcome,
  StressResult,
  StressRoutine,
  StressStatus,
  StressSuiteResult,
  SystemProbes,
} from './types';
