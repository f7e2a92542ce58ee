import path from 'node:path';
import si from 'systeminformation';
import type { MemorySnapshot, SystemProbes } from './types';

export type VolumeSpace = {
  mount: string;
  available: number;
};

const DRIVE_LETTER = /^[a-z]:$/i;

// A bare drive letter resolves to the cwd on that drive, not its root.
const normalizeMount = (mount: string, pathApi: path.PlatformPath): string => {
  const rooted = DRIVE_LETTER.test(mount) ? `${mount}${pathApi.sep}` : mount;
  const resolved = pathApi.resolve(rooted);
  return pathApi.sep === '\\' ? resolved.toLowerCase() : resolved;
};

const containsPath = (mount: string, target: string, sep: string): boolean => {
  if (target === mount) {
    return true;
  }
  const prefix = mount.endsWith(sep) ? mount : `${mount}${sep}`;
  return target.startsWith(prefix);
};

export const findVolume = <T extends VolumeSpace>(
  volumes: T[],
  directory: string,
  pathApi: path.PlatformPath = path,
): T | undefined => {
  const target = normalizeMount(directory, pathApi);
  return volumes
    .filter((volume) => volume.mount && containsPath(normalizeMount(volume.mount, pathApi), target, pathApi.sep))
    .sort((a, b) => normalizeMount(b.mount, pathApi).length - normalizeMount(a.mount, pathApi).length)[0];
};

export const readMemorySnapshot = async (): Promise<MemorySnapshot> => {
  const mem = await si.mem();
  return { freeBytes: mem.available, totalBytes: mem.total };
};

export const readFreeDiskSpace = async (directory: string): Promise<number> => {
  const match = findVolume(await si.fsSize(), directory);
  if (!match) {
    throw new Error(`no mounted filesystem found for ${directory}`);
  }
  return match.available;
};

export const systemProbes: SystemProbes = {
  memory: readMemorySnapshot,
  freeDiskSpace: readFreeDiskSpace,
};
