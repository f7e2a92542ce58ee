import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  ConfigError,
  createMonitorConfig,
  defaultMonitorConfig,
  sourceBaseUrl,
} from '../src/config';

const MiB = 1024 * 1024;

test('createMonitorConfig returns the defaults when nothing is overridden', () => {
  const config = createMonitorConfig();
  assert.equal(config.source.port, 8085);
  assert.equal(config.source.timeoutMs, 5_000);
  assert.equal(config.startup.attempts, 3);
  assert.equal(config.startup.delayMs, 2_000);
  assert.equal(config.stress.ramChunkBytes, 8 * MiB);
  assert.equal(config.stress.diskMinFreeBytes, 500 * MiB);
  assert.deepEqual(config.thresholds, defaultMonitorConfig.thresholds);
  assert.equal(sourceBaseUrl(config), 'http://localhost:8085');
});

test('createMonitorConfig merges partial overrides per section', () => {
  const config = createMonitorConfig({
    source: { port: 9090 },
    stress: { cpuDurationMs: 500 },
    thresholds: { cpuTemperature: 70 },
    output: { directory: '/tmp/out', openReports: false },
  });
  assert.equal(config.source.host, 'localhost');
  assert.equal(config.source.port, 9090);
  assert.equal(config.stress.cpuDurationMs, 500);
  assert.equal(config.stress.ramDurationMs, 10_000);
  assert.equal(config.thresholds.cpuTemperature, 70);
  assert.equal(config.thresholds.gpuTemperature, 90);
  assert.deepEqual(config.thresholds.voltage, { min: 0.8, max: 1.5 });
  assert.deepEqual(config.output, { directory: '/tmp/out', openReports: false });
});

test('createMonitorConfig freezes every section', () => {
  const config = createMonitorConfig();
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.stress), true);
  assert.equal(Object.isFrozen(config.thresholds.voltage), true);
  assert.equal(Reflect.set(config.thresholds, 'cpuTemperature', 10), false);
  assert.equal(config.thresholds.cpuTemperature, 85);
});

test('createMonitorConfig leaves the defaults untouched', () => {
  createMonitorConfig({ thresholds: { voltage: { min: 1, max: 2 } } });
  assert.deepEqual(defaultMonitorConfig.thresholds.voltage, { min: 0.8, max: 1.5 });
});

test('createMonitorConfig rejects an out-of-range port with its path', () => {
  assert.throws(
    () => createMonitorConfig({ source: { port: 0 } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.code, 'invalid-config');
      assert.equal(error.issues.length, 1);
      assert.ok(error.issues[0].startsWith('source.port: '));
      assert.ok(error.message.startsWith('invalid configuration: source.port: '));
      return true;
    },
  );
});

test('createMonitorConfig rejects an inverted voltage range', () => {
  assert.throws(
    () => createMonitorConfig({ thresholds: { voltage: { min: 1.5, max: 0.8 } } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.issues, ['thresholds.voltage: voltage min must be below max']);
      return true;
    },
  );
});

test('createMonitorConfig rejects a memory fraction above one', () => {
  assert.throws(
    () => createMonitorConfig({ stress: { ramFraction: 1.5 } }),
    (error: unknown) => error instanceof ConfigError && error.issues[0].startsWith('stress.ramFraction: '),
  );
});
