import { cosmiconfigSync } from 'cosmiconfig';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { CommandSpec, LockfileMapping } from './types';
import { Logger, silentLogger } from './utils/logger';

export const MODULE_NAME = 'runpick';

export const DEFAULT_LOCKFILES: readonly LockfileMapping[] = [
  { file: 'package-lock.json', manager: 'npm' },
  { file: 'bun.lock', manager: 'bun' },
  { file: 'bun.lockb', manager: 'bun' },
  { file: 'yarn.lock', manager: 'yarn' },
  { file: 'pnpm-lock.yaml', manager: 'pnpm' },
];

export const DEFAULT_COMMANDS: readonly CommandSpec[] = [
  { id: 'install', description: 'Install packages' },
  { id: 'outdated', description: 'Outdated packages' },
];

const ManagerIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9@._-]+$/, 'must be a single executable name, e.g. "pnpm"');

export const RunpickConfigSchema = z
  .object({
    lockfiles: z
      .array(z.object({ file: z.string().min(1), manager: ManagerIdSchema }).strict())
      .default(() => DEFAULT_LOCKFILES.map((l) => ({ ...l }))),
    defaultManager: ManagerIdSchema.default('npm'),
    commands: z
      .array(
        z
          .object({
            id: z.string().trim().min(1),
            description: z.string().default(''),
          })
          .strict(),
      )
      .default(() => DEFAULT_COMMANDS.map((c) => ({ ...c }))),
  })
  .strict();

export type RunpickConfig = z.infer<typeof RunpickConfigSchema>;

export const defaultConfig: RunpickConfig = RunpickConfigSchema.parse({});

export function parseConfig(raw: unknown, source: string): RunpickConfig {
  const result = RunpickConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  logger?: Logger;
}

/**
 * Loads runpick configuration. An explicit `configPath` must exist and be valid;
 * a file found by searching upward from `searchFrom` falls back to defaults
 * with a warning when it cannot be used.
 */
export function loadConfig(
  searchFrom: string = process.cwd(),
  options: LoadConfigOptions = {},
): RunpickConfig {
  const logger = options.logger ?? silentLogger;
  const explorer = cosmiconfigSync(MODULE_NAME, { searchStrategy: 'global' });

  if (options.configPath) {
    const configPath = options.configPath;
    const loaded = (() => {
      try {
        return explorer.load(configPath);
      } catch (error) {
        throw new ConfigError(
          `Failed to load configuration file ${configPath}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    })();
    return parseConfig(loaded?.config, configPath);
  }

  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      logger.debug(`Using configuration from ${result.filepath}`);
      return parseConfig(result.config, result.filepath);
    }
  } catch (error) {
    logger.warn(`Failed to load configuration file: ${errorMessage(error)}`);
  }
  return defaultConfig;
}
