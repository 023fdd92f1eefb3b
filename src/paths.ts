import { resolve, relative, sep } from 'node:path';

/**
 * Path of `filePath` as shown in a reference: relative to `cwd` when the file
 * lives under it, absolute otherwise.
 */
export function displayPath(cwd: string, filePath: string): string {
  const absRoot = resolve(cwd);
  const absPath = resolve(absRoot, filePath);
  const prefix = absRoot.endsWith(sep) ? absRoot : absRoot + sep;
  if (!absPath.startsWith(prefix) || absPath === absRoot) {
    return absPath;
  }
  return relative(absRoot, absPath);
}
