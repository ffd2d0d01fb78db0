import * as fs from 'fs';
import { errorMessage } from '../errors';
import { ManifestData } from '../types';
import { Logger, silentLogger } from '../utils/logger';

export type ManifestParseResult =
  | { success: true; manifest: ManifestData }
  | { success: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function emptyManifest(): ManifestData {
  return { projectName: undefined, scripts: new Map() };
}

export function decodeManifest(raw: string): ManifestParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    return { success: false, error: `Invalid JSON: ${errorMessage(e)}` };
  }
  if (!isPlainObject(json)) {
    return { success: false, error: 'Manifest is not a JSON object' };
  }

  const manifest = emptyManifest();
  if (typeof json.name === 'string') {
    manifest.projectName = json.name;
  }
  if (isPlainObject(json.scripts)) {
    for (const [name, command] of Object.entries(json.scripts)) {
      if (typeof command === 'string') {
        manifest.scripts.set(name, command);
      }
    }
  }
  return { success: true, manifest };
}

export function readManifest(filepath: string): ManifestParseResult {
  let raw: string;
  try {
    raw = fs.readFileSync(filepath, 'utf8');
  } catch (e: unknown) {
    return { success: false, error: `Unable to read ${filepath}: ${errorMessage(e)}` };
  }
  return decodeManifest(raw);
}

/**
 * Reads a package.json into its name and scripts.
 * Unreadable or malformed manifests yield an empty record instead of an error.
 */
export function parseManifest(filepath: string, logger: Logger = silentLogger): ManifestData {
  const result = readManifest(filepath);
  if (!result.success) {
    logger.debug(`${result.error}; offering fixed commands only`);
    return emptyManifest();
  }
  return result.manifest;
}
