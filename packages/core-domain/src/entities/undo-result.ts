import type { LocalPath, ServerPath } from '../value-objects/ids';
import type { GetOperation } from './get-operation';
import type { ItemFailure } from './checkin-result';

/** Server answer to an undo request. */
export interface UndoResponse {
  /** Local changes that bring the undone items back to their baseline. */
  operations: GetOperation[];
  failures: ItemFailure[];
}

export interface UndoResult {
  undone: ServerPath[];
  failed: ServerPath[];
  /** Local path before the undo → local path after it. Only reverted renames appear here. */
  remap: Map<LocalPath, LocalPath>;
}
