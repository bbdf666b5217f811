import type { ChangesetId, LocalPath, ServerPath, WorkspaceName, OwnerName } from '../value-objects/ids';
import type { ItemType } from './pending-change';

export type RecursionType = 'none' | 'one_level' | 'full';

export type VersionSpec =
  | { type: 'latest' }
  | { type: 'changeset'; changeset: ChangesetId }
  | { type: 'workspace'; name: WorkspaceName; ownerName: OwnerName };

export interface DownloadRequest {
  serverPath: ServerPath;
  recursion: RecursionType;
  version: VersionSpec;
  /** Return operations even for items the server believes are current. */
  force?: boolean;
}

/**
 * Server instruction for bringing one local item to a version.
 * A null target deletes the source; a source different from the target moves it.
 */
export interface GetOperation {
  serverItem: ServerPath;
  sourceLocalItem: LocalPath | null;
  targetLocalItem: LocalPath | null;
  itemType: ItemType;
  version: number;
  /** sha256 of the content at `version`, when the server knows it. */
  contentHash?: string;
}

export interface LocalVersionUpdate {
  serverItem: ServerPath;
  localItem: LocalPath | null;
  version: number;
}
