import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SourceUnavailableError } from '@rigcheck/sensors';
import type { ProbeOptions, RawSensorNode, SensorReading } from '@rigcheck/sensors';
import type { StressContext, StressSuiteResult } from '@rigcheck/stress';
import { createMonitorConfig } from '../src/config';
import { buildArtifactPaths } from '../src/lib';
import { formatResultLine, runMonitor } from '../src/pipeline';
import type { MonitorDependencies, SensorFeed } from '../src/pipeline';
import { createRecordingLogger } from './helpers/logger';

const AT = new Date(2024, 4, 6, 12, 30, 0);

const TREE: RawSensorNode = {
  name: 'Sensor',
  value: '',
  children: [{ name: 'CPU Package', value: '91 °C', children: [] }],
};

const cpuPackage = (value: number): SensorReading => ({
  name: 'CPU Package',
  kind: 'Temperature',
  value,
  unit: '°C',
  max: 85,
  rawValue: `${value} °C`,
});

const SUITE: StressSuiteResult = {
  results: [
    { component: 'CPU', metric: 91, status: 'Critical' },
    { component: 'RAM', status: 'Error' },
    { component: 'Disk', metric: 12.5, status: 'OK' },
    { component: 'GPU', status: 'Unavailable' },
  ],
  errors: ['RAM stress test failed: not enough free memory: 10.0 MiB free, 64.0 MiB required'],
};

type Harness = {
  deps: MonitorDependencies;
  calls: string[];
  printed: string[];
  opened: string[];
  contexts: StressContext[];
  logger: ReturnType<typeof createRecordingLogger>;
};

const createHarness = (directory: string, overrides: Partial<MonitorDependencies> = {}): Harness => {
  const calls: string[] = [];
  const printed: string[] = [];
  const opened: string[] = [];
  const contexts: StressContext[] = [];
  const logger = createRecordingLogger();
  const samples = [[cpuPackage(40)], [cpuPackage(91)]];
  const source: SensorFeed = {
    url: 'http://localhost:8085/data.json',
    fetch: async () => {
      calls.push('fetch');
      return TREE;
    },
    sample: async () => {
      calls.push('sample');
      return samples.shift() ?? [];
    },
  };
  const deps: MonitorDependencies = {
    config: createMonitorConfig({ output: { directory, openReports: true } }),
    logger,
    paths: buildArtifactPaths(directory, AT),
    now: () => AT,
    source,
    waitForSource: async (host: string, port: number, options: ProbeOptions) => {
      calls.push(`probe ${host}:${port} x${options.attempts}`);
    },
    runSuite: async (context) => {
      calls.push('suite');
      contexts.push(context);
      return SUITE;
    },
    openReport: async (filePath) => {
      opened.push(filePath);
      return true;
    },
    print: (line) => printed.push(line),
    ...overrides,
  };
  return { deps, calls, printed, opened, contexts, logger };
};

const withDirectory = async (run: (directory: string) => Promise<void>): Promise<void> => {
  const directory = await mkdtemp(path.join(tmpdir(), 'rigcheck-run-'));
  try {
    await run(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
};

test('formatResultLine pads component and status', () => {
  assert.equal(formatResultLine({ component: 'CPU', metric: 91, status: 'Critical' }), '  CPU  Critical    91.0');
  assert.equal(formatResultLine({ component: 'GPU', status: 'Unavailable' }), '  GPU  Unavailable n/a');
});

test('runMonitor probes, samples around the suite and writes both reports', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory);
    const outcome = await runMonitor(harness.deps);

    assert.deepEqual(harness.calls, ['probe localhost:8085 x3', 'fetch', 'sample', 'suite', 'sample']);
    assert.deepEqual(outcome.alerts, [
      'CPU Package: 91°C exceeds threshold 85°C',
      'RAM stress test failed: not enough free memory: 10.0 MiB free, 64.0 MiB required',
    ]);
    assert.deepEqual(outcome.readings, [cpuPackage(91)]);
    assert.equal(outcome.summaryPath, path.join(directory, 'hardware-report-20240506-123000.html'));
    assert.equal(outcome.treePath, path.join(directory, 'sensor-tree-20240506-123000.html'));

    const summary = await readFile(outcome.summaryPath, 'utf8');
    assert.ok(summary.includes('<li>CPU Package: 91°C exceeds threshold 85°C</li>'));
    const tree = await readFile(path.join(directory, 'sensor-tree-20240506-123000.html'), 'utf8');
    assert.ok(tree.includes('<span class="node-name">CPU Package</span>'));

    assert.deepEqual(harness.opened, [outcome.summaryPath, outcome.treePath]);
    assert.deepEqual(harness.printed, [
      'Stress results:',
      '  CPU  Critical    91.0',
      '  RAM  Error       n/a',
      '  Disk OK          12.5',
      '  GPU  Unavailable n/a',
    ]);
    assert.deepEqual(harness.logger.messages('warn'), [
      '2 alert(s) raised',
      'CPU Package: 91°C exceeds threshold 85°C',
      'RAM stress test failed: not enough free memory: 10.0 MiB free, 64.0 MiB required',
    ]);
  });
});

test('runMonitor hands the stress suite the configured context', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory);
    await runMonitor(harness.deps);
    assert.equal(harness.contexts.length, 1);
    const [context] = harness.contexts;
    assert.equal(context.config, harness.deps.config.stress);
    assert.equal(context.thresholds, harness.deps.config.thresholds);
    assert.equal(context.logger, harness.logger);
  });
});

test('runMonitor skips the tree report when the background fetch fails', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory);
    const failing: SensorFeed = {
      url: 'http://localhost:8085/data.json',
      fetch: async () => {
        throw new SourceUnavailableError('sensor source responded 500 Internal Server Error');
      },
      sample: async () => [],
    };
    const outcome = await runMonitor({ ...harness.deps, source: failing });

    assert.equal(outcome.treePath, undefined);
    assert.deepEqual(outcome.alerts, SUITE.errors);
    assert.deepEqual(harness.opened, [outcome.summaryPath]);
    const warnings = harness.logger.messages('warn');
    assert.equal(warnings[0], 'sensor tree fetch failed');
    assert.equal(warnings[1], 'sensor tree report skipped');
    await assert.rejects(stat(path.join(directory, 'sensor-tree-20240506-123000.html')));
  });
});

test('runMonitor does not open reports when disabled', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory);
    const config = createMonitorConfig({ output: { directory, openReports: false } });
    await runMonitor({ ...harness.deps, config });
    assert.deepEqual(harness.opened, []);
  });
});

test('runMonitor fails before sampling when the source never comes up', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory, {
      waitForSource: async () => {
        throw new SourceUnavailableError('sensor source not reachable at localhost:8085 after 3 attempts');
      },
    });
    await assert.rejects(runMonitor(harness.deps), SourceUnavailableError);
    assert.deepEqual(harness.calls, []);
    await assert.rejects(stat(harness.deps.paths.summary));
  });
});

test('runMonitor propagates a summary write failure', async () => {
  await withDirectory(async (directory) => {
    const harness = createHarness(directory);
    const paths = buildArtifactPaths(path.join(directory, 'missing'), AT);
    await assert.rejects(runMonitor({ ...harness.deps, paths }), /ENOENT/);
    assert.deepEqual(harness.opened, []);
  });
});
