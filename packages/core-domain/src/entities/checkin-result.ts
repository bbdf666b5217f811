import type { ChangesetId, ServerPath } from '../value-objects/ids';

export type FailureSeverity = 'error' | 'warning';

/** Server-reported failure for one item of a batch call. */
export interface ItemFailure {
  item: ServerPath | null;
  code: string;
  message: string;
  severity: FailureSeverity;
}

export type WorkItemActionType = 'associate' | 'resolve';

export interface WorkItemAction {
  workItemId: number;
  action: WorkItemActionType;
}

export interface CheckinNote {
  name: string;
  value: string;
  required: boolean;
}

export interface PolicyOverride {
  comment: string;
  policyFailures: string[];
}

export interface CheckinResult {
  /** null when nothing was committed. */
  changesetId: ChangesetId | null;
  failures: ItemFailure[];
}
