/**
 * Local directory listing
 *
 * Lists the candidate documents of one directory (non-recursive), filtered by
 * extension and sorted by name.
 *
 * @module services/documents/directory
 */

import fs from 'fs';
import path from 'path';
import {
  pathNotDirectoryError,
  pathNotFoundError,
  permissionDeniedError,
} from '../../server/errors.js';
import { DEFAULT_DOCUMENT_TYPES } from '../../utils/validation.js';
import type { DirectoryEntry, DirectoryListing } from '../collaborators/types.js';

/**
 * @throws MCPError PATH_NOT_FOUND, PATH_NOT_DIRECTORY or PERMISSION_DENIED
 */
export function listDocumentDirectory(
  directoryPath: string,
  fileTypes: readonly string[] = DEFAULT_DOCUMENT_TYPES
): DirectoryListing {
  const directory = path.resolve(directoryPath);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(directory);
  } catch (error) {
    throw translateFsError(error, directory);
  }
  if (!stats.isDirectory()) {
    throw pathNotDirectoryError(directory);
  }

  const extensions = new Set(fileTypes.map((t) => `.${t.toLowerCase()}`));

  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    throw translateFsError(error, directory);
  }

  const files: DirectoryEntry[] = dirents
    .filter((d) => extensions.has(path.extname(d.name).toLowerCase()))
    .map((d) => {
      const entryPath = path.join(directory, d.name);
      const isDir = d.isDirectory();
      return {
        name: d.name,
        path: entryPath,
        is_dir: isDir,
        size_bytes: isDir ? 0 : fileSize(entryPath),
      };
    })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return { path: directory, files };
}

/**
 * Size of a listed file, or 0 when it cannot be stat'ed (a dangling symlink,
 * or a file removed after readdir). Such an entry fails later, at its read.
 */
function fileSize(entryPath: string): number {
  try {
    return fs.statSync(entryPath).size;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Directory] Cannot stat ${entryPath}: ${message}`);
    return 0;
  }
}

export function translateFsError(error: unknown, target: string): Error {
  const code = error instanceof Error ? Reflect.get(error, 'code') : undefined;
  if (code === 'ENOENT') return pathNotFoundError(target);
  if (code === 'EACCES' || code === 'EPERM') return permissionDeniedError(target);
  return error instanceof Error ? error : new Error(String(error));
}
