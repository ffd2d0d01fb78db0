import { toExecutionRequest } from './executor';
import { TaskSelector } from './selector';
import { ExecutionRequest, TaskCatalog } from './types';

export { loadConfig, parseConfig, defaultConfig, DEFAULT_COMMANDS, DEFAULT_LOCKFILES } from './config';
export type { RunpickConfig, LoadConfigOptions } from './config';
export { buildCatalog, buildItems, collectTasks, sourceTitle, ROOT_MARKER } from './catalog';
export {
  locateManifests,
  resolveCeiling,
  resolveStartDirectory,
  MANIFEST_FILENAME,
  MAX_MANIFESTS,
} from './manifest/locator';
export { parseManifest, readManifest, decodeManifest } from './manifest/parser';
export type { ManifestParseResult } from './manifest/parser';
export { resolvePackageManager, findLockfile } from './package-managers/resolver';
export { toExecutionRequest, runTask } from './executor';
export { InquirerSelector } from './selector';
export type { TaskSelector, SelectOptions } from './selector';
export { RunpickError, ConfigError, TaskLaunchError } from './errors';
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
export * from './types';

/**
 * Hands the catalog to the selector and turns its choice into an execution request.
 * `undefined` when nothing was chosen.
 */
export async function selectTask(
  catalog: TaskCatalog,
  selector: TaskSelector,
): Promise<ExecutionRequest | undefined> {
  // The prompt names the nearest project's manager
  const manager = catalog.sources[0]?.manager ?? catalog.manager;
  const selection = await selector.select(catalog.sources, { manager });
  if (!selection) {
    return undefined;
  }
  return toExecutionRequest(selection.source, selection.item);
}
