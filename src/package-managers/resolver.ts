import * as path from 'path';
import { LockfileMapping, PackageManager } from '../types';
import { isFile } from '../utils/fs';
import { Logger, silentLogger } from '../utils/logger';

export interface ResolverConfig {
  lockfiles: readonly LockfileMapping[];
  defaultManager: PackageManager;
}

/**
 * Returns the first configured lockfile present in `directory`, in mapping order.
 */
export function findLockfile(
  directory: string,
  config: Pick<ResolverConfig, 'lockfiles'>,
): { path: string; manager: PackageManager } | null {
  for (const { file, manager } of config.lockfiles) {
    const fullPath = path.join(directory, file);
    if (isFile(fullPath)) {
      return { path: fullPath, manager };
    }
  }
  return null;
}

export function resolvePackageManager(
  directory: string,
  config: ResolverConfig,
  logger: Logger = silentLogger,
): PackageManager {
  const lockfile = findLockfile(directory, config);
  if (!lockfile) {
    logger.debug(`No lockfile in ${directory}, defaulting to ${config.defaultManager}`);
    return config.defaultManager;
  }
  logger.debug(`Found ${path.basename(lockfile.path)} in ${directory}, using ${lockfile.manager}`);
  return lockfile.manager;
}
