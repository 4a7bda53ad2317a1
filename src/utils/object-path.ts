import { FolderDiscoveryMode, ObjectRef } from '../types/migration.interface';

export const PATH_SEPARATOR = '/';

export const DIRECTORY_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'application/directory',
  'application/x-directory',
]);

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Cumulative parent prefixes of `name`, shortest first, each ending in `/`.
 * The leaf segment is dropped, so `a/b/c.txt` yields `a/` and `a/b/`.
 */
export function folderPrefixes(name: string): string[] {
  const segments = name.split(PATH_SEPARATOR).slice(0, -1);
  const prefixes: string[] = [];
  let current = '';
  for (const segment of segments) {
    if (!segment) {
      continue;
    }
    current += segment + PATH_SEPARATOR;
    prefixes.push(current);
  }
  return prefixes;
}

export function toFolderName(name: string): string {
  return name.endsWith(PATH_SEPARATOR) ? name : name + PATH_SEPARATOR;
}

export function isFolderPlaceholder(ref: ObjectRef, mode: FolderDiscoveryMode): boolean {
  if (mode === 'content-type') {
    return DIRECTORY_CONTENT_TYPES.has(ref.contentType.toLowerCase());
  }
  return ref.name.endsWith(PATH_SEPARATOR);
}

// ETags arrive quoted on the wire (`"d41d8cd9..."`).
export function normalizeChecksum(etag: string | undefined): string {
  if (!etag) {
    return '';
  }
  return etag.trim().replace(/^"(.*)"$/, '$1').toLowerCase();
}
