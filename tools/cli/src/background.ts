import type { Logger } from './logging';

export type BackgroundTask<T> = {
  settle: () => Promise<T | undefined>;
};

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Start `work` now and collect it later. The failure is held until
 * `settle()`, which logs it as a warning and yields undefined.
 */
export const startBackgroundTask = <T>(
  label: string,
  work: () => Promise<T>,
  logger: Logger,
): BackgroundTask<T> => {
  const pending: Promise<Settled<T>> = work().then(
    (value) => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error }),
  );
  return {
    settle: async () => {
      const outcome = await pending;
      if (outcome.ok) {
        return outcome.value;
      }
      logger.warn(`${label} failed`, outcome.error);
      return undefined;
    },
  };
};
