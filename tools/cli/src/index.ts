import { createMonitorConfig } from './config';
import { ensureOutputDirectory } from './environment';
import { UsageError, buildArtifactPaths, parseArgs, parseRunOptions, usage } from './lib';
import type { RunOptions } from './lib';
import { createLogger } from './logging';
import { runMonitor } from './pipeline';

const run = async (): Promise<number> => {
  let options: RunOptions;
  try {
    options = parseRunOptions(parseArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${usage()}`);
      return 1;
    }
    throw error;
  }
  if (options.help) {
    console.log(usage());
    return 0;
  }

  const config = createMonitorConfig({
    output: { directory: options.outputDirectory, openReports: options.openReports },
  });

  await ensureOutputDirectory(config.output.directory);
  const paths = buildArtifactPaths(config.output.directory, new Date());
  const logger = createLogger({ filePath: paths.log });
  logger.info(`writing reports to ${config.output.directory}`);

  try {
    const outcome = await runMonitor({ config, logger, paths });
    logger.info(`summary report: ${outcome.summaryPath}`);
    return 0;
  } catch (error) {
    logger.error('monitoring run failed', error);
    return 1;
  }
};

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(String(error));
    process.exitCode = 1;
  });
