import { constants } from 'node:fs';
import fs from 'node:fs/promises';

export class EnvironmentError extends Error {
  readonly code = 'environment';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnvironmentError';
  }
}

export const ensureOutputDirectory = async (directory: string): Promise<void> => {
  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.access(directory, constants.W_OK);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EnvironmentError(`output directory ${directory} is not writable: ${reason}`, {
      cause: error,
    });
  }
};
