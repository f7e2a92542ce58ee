import { test } from 'node:test';
import assert from 'node:assert/strict';
import { runStressSuite } from '../src/index';
import type { StressRoutine, StressRoutineTable } from '../src/index';
import { createTestContext } from './helpers/context';

const failing = (message: string): StressRoutine => async () => {
  throw new Error(message);
};

test('runStressSuite returns four Error results when every routine fails', async () => {
  const routines: StressRoutineTable = {
    CPU: failing('cpu broke'),
    RAM: failing('ram broke'),
    Disk: failing('disk broke'),
    GPU: failing('gpu broke'),
  };

  const suite = await runStressSuite(createTestContext(), routines);

  assert.deepEqual(suite.results, [
    { component: 'CPU', status: 'Error' },
    { component: 'RAM', status: 'Error' },
    { component: 'Disk', status: 'Error' },
    { component: 'GPU', status: 'Error' },
  ]);
  assert.deepEqual(suite.errors, [
    'CPU stress test failed: cpu broke',
    'RAM stress test failed: ram broke',
    'Disk stress test failed: disk broke',
    'GPU stress test failed: gpu broke',
  ]);
});

test('runStressSuite keeps running after a failed routine', async () => {
  const order: string[] = [];
  const routines: StressRoutineTable = {
    CPU: async () => {
      order.push('CPU');
      return { metric: 70, status: 'OK' };
    },
    RAM: async () => {
      order.push('RAM');
      throw new Error('not enough free memory');
    },
    Disk: async () => {
      order.push('Disk');
      return { metric: 95, status: 'HighUsage' };
    },
    GPU: async () => {
      order.push('GPU');
      return { status: 'Unavailable' };
    },
  };

  const suite = await runStressSuite(createTestContext(), routines);

  assert.deepEqual(order, ['CPU', 'RAM', 'Disk', 'GPU']);
  assert.deepEqual(
    suite.results.map((result) => result.status),
    ['OK', 'Error', 'HighUsage', 'Unavailable'],
  );
  assert.deepEqual(suite.errors, ['RAM stress test failed: not enough free memory']);
});
