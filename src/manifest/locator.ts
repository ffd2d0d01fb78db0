import * as os from 'os';
import * as path from 'path';
import { isFile } from '../utils/fs';

export const MANIFEST_FILENAME = 'package.json';
export const MAX_MANIFESTS = 2;

export interface StartOptions {
  /** The file the user is working on; its directory wins over `path`. */
  file?: string;
  path?: string;
}

export interface LocateOptions {
  homeDir?: string;
  manifestName?: string;
  limit?: number;
}

export function resolveStartDirectory(options: StartOptions = {}): string {
  if (options.file) {
    return path.dirname(path.resolve(options.file));
  }
  return path.resolve(options.path ?? process.cwd());
}

function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  // `..cache` is a child; only `..` itself or `../x` leaves the parent
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * The upward walk stops at the home directory for anything inside it,
 * otherwise at the filesystem root.
 */
export function resolveCeiling(start: string, homeDir: string = os.homedir()): string {
  const resolvedStart = path.resolve(start);
  const resolvedHome = path.resolve(homeDir);
  if (isWithin(resolvedStart, resolvedHome)) {
    return resolvedHome;
  }
  return path.parse(resolvedStart).root;
}

/**
 * Directories holding a manifest, nearest first. The ceiling itself is never inspected.
 */
export function locateManifests(start: string, options: LocateOptions = {}): string[] {
  const manifestName = options.manifestName ?? MANIFEST_FILENAME;
  const limit = options.limit ?? MAX_MANIFESTS;
  const ceiling = resolveCeiling(start, options.homeDir);
  const found: string[] = [];

  let current = path.resolve(start);
  while (found.length < limit && current !== ceiling) {
    if (isFile(path.join(current, manifestName))) {
      found.push(current);
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return found;
}
