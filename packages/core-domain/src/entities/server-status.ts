import type { LocalPath, ServerPath } from '../value-objects/ids';
import type { ItemType } from './pending-change';

export const SERVER_STATUS_KINDS = [
  'unversioned',
  'checked_out_for_edit',
  'scheduled_for_addition',
  'scheduled_for_deletion',
  'out_of_date',
  'deleted',
  'up_to_date',
  'renamed',
  'renamed_checked_out',
  'undeleted',
] as const;

export type ServerStatusKind = (typeof SERVER_STATUS_KINDS)[number];

/**
 * Classification of one item against the server. Computed for a single
 * operation and never cached.
 */
export interface ServerStatus {
  kind: ServerStatusKind;
  /** Server path of the item; null only for unversioned items. */
  targetItem: ServerPath | null;
  localVersion: number;
  latestVersion: number;
  itemType: ItemType;
}

export interface ClassifiedItem {
  localPath: LocalPath;
  localItemExists: boolean;
  status: ServerStatus;
}
