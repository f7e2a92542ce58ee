import path from 'node:path';
import { fileStamp } from './time';

export const usage = (): string => {
  return `rigcheck [options]

Polls the local hardware monitor, runs CPU/RAM/Disk/GPU stress tests and
writes HTML reports.

Options:
  --out <dir>   directory for reports and the log file (default: ./reports)
  --no-open     do not open the generated reports
  --help        show this message
`;
};

export const parseArgs = (args: string[]): Record<string, string> => {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const key = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      result[key] = 'true';
    } else {
      result[key] = value;
      i += 1;
    }
  }
  return result;
};

export type RunOptions = {
  help: boolean;
  outputDirectory: string;
  openReports: boolean;
};

export class UsageError extends Error {
  readonly code = 'usage';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const parseRunOptions = (args: Record<string, string>): RunOptions => {
  if (args.out === 'true') {
    throw new UsageError('--out requires a directory');
  }
  return {
    help: args.help !== undefined,
    outputDirectory: path.resolve(args.out ?? 'reports'),
    openReports: args['no-open'] === undefined,
  };
};

export type ArtifactPaths = {
  summary: string;
  tree: string;
  log: string;
};

export const buildArtifactPaths = (directory: string, startedAt: Date): ArtifactPaths => {
  const stamp = fileStamp(startedAt);
  return {
    summary: path.join(directory, `hardware-report-${stamp}.html`),
    tree: path.join(directory, `sensor-tree-${stamp}.html`),
    log: path.join(directory, `rigcheck-${stamp}.log`),
  };
};
