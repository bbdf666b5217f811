import type { LocalPath, ServerPath } from '../value-objects/ids';

/**
 * Immutable (local path, server path) pair. Every other entity refers to an
 * item through one of these.
 */
export type ItemPath = Readonly<{
  localPath: LocalPath;
  serverPath: ServerPath;
}>;

export function createItemPath(localPath: LocalPath, serverPath: ServerPath): ItemPath {
  return Object.freeze({ localPath, serverPath });
}
