import * as fs from 'fs';

/**
 * True when `filePath` is a regular file. Stat failures (EACCES and friends) count as absent.
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch {
    return false;
  }
}
