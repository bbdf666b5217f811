import type { LocalPath, ServerPath } from '../value-objects/ids';
import type { ChangeTypeMask, ItemType } from './pending-change';

/**
 * What the server knows about one item of a workspace: which version is
 * on disk, which is latest and what change is pending on it.
 */
export interface ExtendedItem {
  targetServerItem: ServerPath;
  sourceServerItem?: ServerPath;
  localItem: LocalPath | null;
  itemType: ItemType;
  /** 0 when the item was never downloaded into the workspace. */
  localVersion: number;
  latestVersion: number;
  /** Non-zero when the item is deleted on the server. */
  deletionId: number;
  changeType: ChangeTypeMask;
}
