import type { LocalPath, ServerPath } from '../value-objects/ids';

export type ItemType = 'file' | 'folder';

export const ChangeType = {
  None: 0,
  Add: 1 << 0,
  Edit: 1 << 1,
  Encoding: 1 << 2,
  Rename: 1 << 3,
  Delete: 1 << 4,
  Undelete: 1 << 5,
} as const;

export type ChangeTypeFlag = (typeof ChangeType)[keyof typeof ChangeType];

/** Bitwise OR of {@link ChangeType} flags. */
export type ChangeTypeMask = number;

export function changeTypeMask(...flags: ChangeTypeFlag[]): ChangeTypeMask {
  return flags.reduce<number>((mask, flag) => mask | flag, ChangeType.None);
}

export function hasChangeType(mask: ChangeTypeMask, ...flags: ChangeTypeFlag[]): boolean {
  return flags.some((flag) => (mask & flag) !== 0);
}

export interface PendingChange {
  serverItem: ServerPath;
  localItem: LocalPath;
  itemType: ItemType;
  changeType: ChangeTypeMask;
  /** Version the change was pended against. */
  version: number;
  /** Server path before a pending rename. */
  sourceServerItem?: ServerPath;
}
