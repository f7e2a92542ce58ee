import { SensorSource, waitForSource } from '@rigcheck/sensors';
import type { ProbeOptions, RawSensorNode, SensorReading } from '@rigcheck/sensors';
import { runStressSuite, systemProbes } from '@rigcheck/stress';
import type { StressContext, StressResult, StressSuiteResult, SystemProbes } from '@rigcheck/stress';
import { evaluateAlerts, formatMetric, renderSummaryReport, renderTreeReport } from '@rigcheck/report';
import { startBackgroundTask } from './background';
import { sourceBaseUrl } from './config';
import type { MonitorConfig } from './config';
import { openInViewer } from './launcher';
import type { ArtifactPaths } from './lib';
import type { Logger } from './logging';
import { writeReport } from './reports';
import { formatTimestamp } from './time';

export type SensorFeed = {
  url: string;
  fetch: () => Promise<RawSensorNode>;
  sample: () => Promise<SensorReading[]>;
};

export type MonitorDependencies = {
  config: MonitorConfig;
  logger: Logger;
  paths: ArtifactPaths;
  now?: () => Date;
  source?: SensorFeed;
  waitForSource?: (host: string, port: number, options: ProbeOptions) => Promise<void>;
  runSuite?: (context: StressContext) => Promise<StressSuiteResult>;
  probes?: SystemProbes;
  openReport?: (filePath: string, logger: Logger) => Promise<boolean>;
  print?: (line: string) => void;
};

export type MonitorOutcome = {
  summaryPath: string;
  treePath?: string;
  readings: SensorReading[];
  results: StressResult[];
  alerts: string[];
};

export const formatResultLine = (result: StressResult): string => {
  return `  ${result.component.padEnd(4)} ${result.status.padEnd(11)} ${formatMetric(result.metric)}`;
};

export const runMonitor = async (deps: MonitorDependencies): Promise<MonitorOutcome> => {
  const { config, logger, paths } = deps;
  const now = deps.now ?? (() => new Date());
  const print = deps.print ?? ((line: string) => console.log(line));
  const source =
    deps.source ??
    new SensorSource({
      baseUrl: sourceBaseUrl(config),
      timeoutMs: config.source.timeoutMs,
      thresholds: config.thresholds,
      logger,
    });

  await (deps.waitForSource ?? waitForSource)(config.source.host, config.source.port, {
    attempts: config.startup.attempts,
    delayMs: config.startup.delayMs,
    timeoutMs: config.startup.probeTimeoutMs,
    logger,
  });

  const tree = startBackgroundTask('sensor tree fetch', () => source.fetch(), logger);

  logger.info('taking baseline sensor sample');
  const baseline = await source.sample();
  logger.info(`baseline sample has ${baseline.length} readings`);

  const context: StressContext = {
    config: config.stress,
    thresholds: config.thresholds,
    logger,
    sample: () => source.sample(),
    probes: deps.probes ?? systemProbes,
  };
  const suite = await (deps.runSuite ?? runStressSuite)(context);

  logger.info('taking final sensor sample');
  const readings = await source.sample();
  const alerts = evaluateAlerts(readings, suite.errors, config.thresholds.voltage);

  const root = await tree.settle();
  const generatedAt = formatTimestamp(now());

  const summaryPath = await writeReport(
    paths.summary,
    renderSummaryReport({
      generatedAt,
      source: source.url,
      readings,
      baseline,
      results: suite.results,
      alerts,
    }),
    logger,
  );

  let treePath: string | undefined;
  if (root) {
    try {
      treePath = await writeReport(
        paths.tree,
        renderTreeReport({ generatedAt, source: source.url, root }),
        logger,
      );
    } catch (error) {
      logger.warn(`could not write sensor tree report ${paths.tree}`, error);
    }
  } else {
    logger.warn('sensor tree report skipped');
  }

  print('Stress results:');
  for (const result of suite.results) {
    print(formatResultLine(result));
  }
  if (alerts.length === 0) {
    logger.info('no alerts');
  } else {
    logger.warn(`${alerts.length} alert(s) raised`);
    for (const alert of alerts) {
      logger.warn(alert);
    }
  }

  if (config.output.openReports) {
    const open = deps.openReport ?? ((filePath: string, log: Logger) => openInViewer(filePath, log));
    await open(summaryPath, logger);
    if (treePath) {
      await open(treePath, logger);
    }
  }

  return { summaryPath, treePath, readings, results: suite.results, alerts };
};
