import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { runDiskLoad, runDiskStress, runStressRoutine } from '../src/index';
import { createTestContext, reading } from './helpers/context';

const MiB = 1024 * 1024;

const withScratchDir = async (work: (directory: string) => Promise<void>): Promise<void> => {
  const directory = await fs.mkdtemp(path.join(tmpdir(), 'rigcheck-disk-test-'));
  try {
    await work(directory);
  } finally {
    await fs.rm(directory, { recursive: true, force: true });
  }
};

test('runDiskLoad writes whole buffers and removes its file', async () => {
  await withScratchDir(async (directory) => {
    const summary = await runDiskLoad({ directory, bufferBytes: 64 * 1024, durationMs: 10 });
    assert.ok(summary.writes >= 1);
    assert.equal(summary.bytesWritten, summary.writes * 64 * 1024);
    assert.equal(path.dirname(summary.filePath), directory);
    assert.deepEqual(await fs.readdir(directory), []);
  });
});

test('runDiskLoad syncs after every write when asked to', async () => {
  await withScratchDir(async (directory) => {
    const summary = await runDiskLoad({ directory, bufferBytes: 4096, durationMs: 10, syncEachWrite: true });
    assert.ok(summary.writes >= 1);
    assert.equal(summary.syncs, summary.writes);
    assert.deepEqual(await fs.readdir(directory), []);
  });
});

test('runDiskLoad skips explicit syncs when told the file is opened for synchronous writes', async () => {
  await withScratchDir(async (directory) => {
    const summary = await runDiskLoad({ directory, bufferBytes: 4096, durationMs: 10, syncEachWrite: false });
    assert.ok(summary.writes >= 1);
    assert.equal(summary.syncs, 0);
  });
});

test('runDiskLoad removes its file when the directory cannot be written', async () => {
  await withScratchDir(async (directory) => {
    const missing = path.join(directory, 'missing');
    await assert.rejects(() => runDiskLoad({ directory: missing, bufferBytes: 1024, durationMs: 10 }));
    assert.deepEqual(await fs.readdir(directory), []);
  });
});

test('Disk routine fails before creating a file when free space is short', async () => {
  await withScratchDir(async (directory) => {
    const context = createTestContext({
      config: { diskDirectory: directory, diskMinFreeBytes: 500 * MiB },
      probes: {
        memory: async () => ({ freeBytes: 0, totalBytes: 0 }),
        freeDiskSpace: async () => 100 * MiB,
      },
    });

    const run = await runStressRoutine('Disk', runDiskStress, context);

    assert.deepEqual(run.result, { component: 'Disk', status: 'Error' });
    assert.equal(
      run.error,
      'Disk stress test failed: not enough free disk space: 100.0 MiB free, more than 500.0 MiB required',
    );
    assert.deepEqual(await fs.readdir(directory), []);
  });
});

test('Disk routine reports high usage from disk load sensors', async () => {
  await withScratchDir(async (directory) => {
    const context = createTestContext({
      config: { diskDirectory: directory },
      sample: async () => [reading('Used Space', 'Load', 95), reading('CPU Total', 'Load', 99)],
    });

    const outcome = await runDiskStress(context);

    assert.deepEqual(outcome, { metric: 95, status: 'HighUsage' });
    assert.deepEqual(await fs.readdir(directory), []);
  });
});

test('Disk routine stays OK under the disk load threshold', async () => {
  await withScratchDir(async (directory) => {
    const context = createTestContext({
      config: { diskDirectory: directory },
      sample: async () => [reading('Total Activity', 'Load', 12), reading('Disk Activity', 'Load', 40.5)],
    });

    assert.deepEqual(await runDiskStress(context), { metric: 40.5, status: 'OK' });
  });
});
