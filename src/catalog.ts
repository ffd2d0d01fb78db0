import * as path from 'path';
import { RunpickConfig } from './config';
import { locateManifests, LocateOptions, MANIFEST_FILENAME } from './manifest/locator';
import { parseManifest } from './manifest/parser';
import { resolvePackageManager } from './package-managers/resolver';
import {
  CatalogSource,
  CommandSpec,
  ManifestRecord,
  PackageManager,
  SelectableItem,
  TaskCatalog,
} from './types';
import { Logger, silentLogger } from './utils/logger';

export const ROOT_MARKER = '(root)';

export interface CatalogOptions {
  logger?: Logger;
}

export function buildItems(commands: readonly CommandSpec[], scripts: Map<string, string>): SelectableItem[] {
  const items: SelectableItem[] = commands.map(({ id, description }) => ({
    kind: 'command',
    id,
    description,
  }));
  for (const [name, command] of scripts) {
    items.push({ kind: 'script', name, command });
  }
  return items;
}

export function sourceTitle(record: Pick<ManifestRecord, 'projectName' | 'isRoot'>): string {
  return [record.projectName, record.isRoot ? ROOT_MARKER : undefined].filter(Boolean).join(' ');
}

/**
 * Builds one source per located manifest directory (nearest first).
 * The outermost directory's lockfile decides the manager for every source.
 */
export function buildCatalog(
  directories: readonly string[],
  config: RunpickConfig,
  options: CatalogOptions = {},
): TaskCatalog {
  const logger = options.logger ?? silentLogger;

  if (directories.length === 0) {
    return { manager: config.defaultManager, sources: [] };
  }

  const topmost = directories[directories.length - 1];
  const manager: PackageManager = resolvePackageManager(topmost, config, logger);

  const rootManifest = path.join(topmost, MANIFEST_FILENAME);
  const sources: CatalogSource[] = directories.map((directory) => {
    const filepath = path.join(directory, MANIFEST_FILENAME);
    const record: ManifestRecord = {
      filepath,
      manager,
      isRoot: filepath === rootManifest,
      ...parseManifest(filepath, logger),
    };
    return {
      title: sourceTitle(record),
      items: buildItems(config.commands, record.scripts),
      workingDirectory: directory,
      manager,
      manifest: record,
    };
  });

  return { manager, sources };
}

export function collectTasks(
  startDirectory: string,
  config: RunpickConfig,
  options: CatalogOptions & LocateOptions = {},
): TaskCatalog {
  const logger = options.logger ?? silentLogger;
  const directories = locateManifests(startDirectory, options);
  logger.debug(`Located ${directories.length} manifest(s) from ${startDirectory}`);
  return buildCatalog(directories, config, { logger });
}
