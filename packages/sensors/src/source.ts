import net from 'node:net';
import { fetch } from 'undici';
import { z } from 'zod';
import { flattenSensorTree } from './classify';
import { SourceUnavailableError } from './errors';
import type {
  ProbeOptions,
  RawSensorNode,
  SensorLogger,
  SensorReading,
  SensorSourceOptions,
  SensorThresholds,
} from './types';

export const DEFAULT_SOURCE_TIMEOUT_MS = 5_000;

type WireSensorNode = {
  Text: string;
  Value?: string | null;
  Min?: string | null;
  Max?: string | null;
  Children: WireSensorNode[];
};

const wireNodeSchema: z.ZodType<WireSensorNode> = z.lazy(() =>
  z.object({
    Text: z.string(),
    Value: z.string().nullish(),
    Min: z.string().nullish(),
    Max: z.string().nullish(),
    Children: z.array(wireNodeSchema),
  }),
);

const toRawNode = (wire: WireSensorNode): RawSensorNode => {
  const node: RawSensorNode = {
    name: wire.Text,
    value: wire.Value ?? '',
    children: wire.Children.map(toRawNode),
  };
  if (wire.Min) {
    node.min = wire.Min;
  }
  if (wire.Max) {
    node.max = wire.Max;
  }
  return node;
};

export const decodeSensorTree = (payload: unknown): RawSensorNode => {
  const result = wireNodeSchema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'value';
    throw new SourceUnavailableError(
      `malformed sensor tree at ${path}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return toRawNode(result.data);
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return 'request timed out';
    }
    return error.message;
  }
  return String(error);
};

const silentLogger: SensorLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export class SensorSource {
  private baseUrl: string;
  private timeoutMs: number;
  private thresholds: SensorThresholds;
  private logger: SensorLogger;

  constructor(options: SensorSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
    this.thresholds = options.thresholds;
    this.logger = options.logger ?? silentLogger;
  }

  get url(): string {
    return `${this.baseUrl}/data.json`;
  }

  async fetch(): Promise<RawSensorNode> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let payload: unknown;
    try {
      const response = await fetch(this.url, { method: 'GET', signal: controller.signal });
      if (!response.ok) {
        throw new SourceUnavailableError(
          `sensor source responded ${response.status} ${response.statusText}`,
        );
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      throw new SourceUnavailableError(
        `sensor source unavailable at ${this.url}: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }
    return decodeSensorTree(payload);
  }

  async sample(): Promise<SensorReading[]> {
    const root = await this.fetch();
    return flattenSensorTree(root, this.thresholds, this.logger);
  }
}

export const probePort = (host: string, port: number, timeoutMs: number): Promise<boolean> => {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const finish = (reachable: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(reachable);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const waitForSource = async (
  host: string,
  port: number,
  options: ProbeOptions,
): Promise<void> => {
  const logger = options.logger ?? silentLogger;
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    if (await probePort(host, port, options.timeoutMs)) {
      logger.info(`sensor source reachable at ${host}:${port}`);
      return;
    }
    logger.warn(`sensor source not reachable at ${host}:${port} (attempt ${attempt}/${attempts})`);
    if (attempt < attempts) {
      await sleep(options.delayMs);
    }
  }
  throw new SourceUnavailableError(
    `sensor source not reachable at ${host}:${port} after ${attempts} attempts`,
  );
};
