import type {
  ChangesetId,
  CheckinNote,
  CheckinResult,
  DownloadRequest,
  ExtendedItem,
  GetOperation,
  ItemFailure,
  ItemPath,
  LocalVersionUpdate,
  OwnerName,
  PendingChange,
  PolicyOverride,
  RecursionType,
  ServerPath,
  UndoResponse,
  WorkItemAction,
  WorkspaceInfo,
} from "@vc-reconcile/core-domain";

export type CheckinSubmission = {
  items: ServerPath[];
  comment: string;
  workItemActions: WorkItemAction[];
  checkinNotes: CheckinNote[];
  policyOverride: PolicyOverride | null;
};

export type PendKind = "add" | "delete";

/**
 * Everything the engine needs from the version-control server. Calls throw
 * a TransportError when the request itself fails; item-level problems come
 * back as ItemFailure values.
 */
export interface ServerGateway {
  queryPendingChanges(
    workspace: WorkspaceInfo,
    paths: ItemPath[],
    recursion: RecursionType
  ): Promise<PendingChange[]>;

  /** One entry per input path, null when the server has no record of it. */
  queryExtendedItems(workspace: WorkspaceInfo, paths: ItemPath[]): Promise<(ExtendedItem | null)[]>;

  upload(workspace: WorkspaceInfo, change: PendingChange, content: Uint8Array): Promise<void>;

  checkin(workspace: WorkspaceInfo, submission: CheckinSubmission): Promise<CheckinResult>;

  get(workspace: WorkspaceInfo, requests: DownloadRequest[]): Promise<GetOperation[]>;

  downloadItem(workspace: WorkspaceInfo, operation: GetOperation): Promise<Uint8Array>;

  updateLocalVersions(workspace: WorkspaceInfo, updates: LocalVersionUpdate[]): Promise<void>;

  undo(workspace: WorkspaceInfo, items: ServerPath[]): Promise<UndoResponse>;

  pendChanges(workspace: WorkspaceInfo, kind: PendKind, items: ItemPath[]): Promise<ItemFailure[]>;

  updateWorkItems(owner: OwnerName, actions: WorkItemAction[], changesetId: ChangesetId): Promise<void>;
}
