import { writeFile } from 'node:fs/promises';
import type { Logger } from './logging';

export const writeReport = async (filePath: string, html: string, logger: Logger): Promise<string> => {
  await writeFile(filePath, html, 'utf8');
  logger.info(`wrote ${filePath}`);
  return filePath;
};
