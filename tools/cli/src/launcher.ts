import { spawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import type { Logger } from './logging';

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type ViewerCommand = {
  command: string;
  args: string[];
};

export const viewerCommand = (filePath: string, platform: NodeJS.Platform): ViewerCommand => {
  if (platform === 'win32') {
    return { command: 'cmd', args: ['/c', 'start', '""', filePath] };
  }
  if (platform === 'darwin') {
    return { command: 'open', args: [filePath] };
  }
  return { command: 'xdg-open', args: [filePath] };
};

export const openInViewer = (
  filePath: string,
  logger: Logger,
  platform: NodeJS.Platform = process.platform,
  spawnProcess: SpawnProcess = spawn,
): Promise<boolean> => {
  const { command, args } = viewerCommand(filePath, platform);
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawnProcess(command, args, { detached: true, stdio: 'ignore', windowsHide: true });
    } catch (error) {
      logger.warn(`could not open ${filePath} with ${command}`, error);
      resolve(false);
      return;
    }
    child.once('error', (error) => {
      logger.warn(`could not open ${filePath} with ${command}`, error);
      resolve(false);
    });
    child.once('spawn', () => {
      child.unref();
      logger.info(`opened ${filePath}`);
      resolve(true);
    });
  });
};
