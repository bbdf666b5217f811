import type {
  ChangesetId,
  CheckinResult,
  DownloadRequest,
  ExtendedItem,
  GetOperation,
  ItemFailure,
  ItemPath,
  ItemType,
  LocalVersionUpdate,
  OwnerName,
  PendingChange,
  RecursionType,
  ServerPath,
  UndoResponse,
  VersionSpec,
  WorkItemAction,
  WorkspaceInfo,
} from "@vc-reconcile/core-domain";
import { ChangeType, hasChangeType } from "@vc-reconcile/core-domain";

import type { CheckinSubmission, PendKind, ServerGateway } from "../ports/server-gateway";
import { RemoteServerError } from "../application/errors";
import { NO_PENDING_CHANGE_CODE } from "../services/undo-pending-changes";
import { hashBytes } from "../adapters/node-file-hasher";
import { bytes } from "./memory-file-system";

type ServerItem = {
  serverPath: ServerPath;
  localPath: string;
  itemType: ItemType;
  latestVersion: number;
  localVersion: number;
  deletionId: number;
  changeType: number;
  /** Where the item was before a pending rename. */
  renamedFrom?: { serverPath: ServerPath; localPath: string };
  contents: Map<number, Uint8Array>;
};

export type SeedItem = {
  serverPath: ServerPath;
  localPath: string;
  itemType?: ItemType;
  version?: number;
  localVersion?: number;
  deletionId?: number;
  changeType?: number;
  content?: string;
  renamedFrom?: { serverPath: ServerPath; localPath: string };
};

export type GatewayMethod = keyof ServerGateway;

export type RecordedCall = {
  method: GatewayMethod;
  workspace: string | null;
  args: unknown[];
};

function hashOf(data: Uint8Array): string {
  return hashBytes(data).value;
}

/**
 * Stateful in-process server: items, versions and pending changes live in
 * memory. Failures are scripted per item or per method.
 */
export class FakeServerGateway implements ServerGateway {
  readonly items = new Map<ServerPath, ServerItem>();
  readonly calls: RecordedCall[] = [];
  readonly uploaded = new Map<ServerPath, Uint8Array>();
  readonly submissions: CheckinSubmission[] = [];

  readonly failUpload = new Set<ServerPath>();
  readonly failCheckin = new Map<ServerPath, string>();
  readonly failDownload = new Set<ServerPath>();
  readonly failUndo = new Set<ServerPath>();
  readonly failPend = new Set<string>();

  private readonly transportFailures = new Map<GatewayMethod, { error: Error; workspace?: string }>();
  private nextChangeset: ChangesetId;

  constructor(firstChangeset: ChangesetId = 100) {
    this.nextChangeset = firstChangeset;
  }

  seed(item: SeedItem): this {
    const version = item.version ?? 1;
    const contents = new Map<number, Uint8Array>();
    if (item.content !== undefined) contents.set(version, bytes(item.content));
    this.items.set(item.serverPath, {
      serverPath: item.serverPath,
      localPath: item.localPath,
      itemType: item.itemType ?? "file",
      latestVersion: version,
      localVersion: item.localVersion ?? version,
      deletionId: item.deletionId ?? 0,
      changeType: item.changeType ?? ChangeType.None,
      renamedFrom: item.renamedFrom,
      contents,
    });
    return this;
  }

  /** Adds content for an older or newer version of an existing item. */
  setContent(serverPath: ServerPath, version: number, content: string): this {
    this.mustGet(serverPath).contents.set(version, bytes(content));
    return this;
  }

  /** Every call to `method` throws `error` (for one workspace when named). */
  failOn(method: GatewayMethod, error: Error, workspace?: string): this {
    this.transportFailures.set(method, { error, workspace });
    return this;
  }

  callsTo(method: GatewayMethod): RecordedCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  private mustGet(serverPath: ServerPath): ServerItem {
    const item = this.items.get(serverPath);
    if (!item) throw new Error(`unknown item ${serverPath}`);
    return item;
  }

  private enter(method: GatewayMethod, workspace: WorkspaceInfo | null, ...args: unknown[]) {
    this.calls.push({ method, workspace: workspace?.name ?? null, args });
    const failure = this.transportFailures.get(method);
    if (failure && (failure.workspace === undefined || failure.workspace === workspace?.name)) {
      throw failure.error;
    }
  }

  async queryPendingChanges(workspace: WorkspaceInfo, paths: ItemPath[], recursion: RecursionType): Promise<PendingChange[]> {
    this.enter("queryPendingChanges", workspace, paths, recursion);
    const out: PendingChange[] = [];
    for (const p of paths) {
      const item = this.items.get(p.serverPath);
      if (!item || item.changeType === ChangeType.None) continue;
      out.push({
        serverItem: item.serverPath,
        localItem: item.localPath,
        itemType: item.itemType,
        changeType: item.changeType,
        version: item.localVersion,
        sourceServerItem: item.renamedFrom?.serverPath,
      });
    }
    return out;
  }

  async queryExtendedItems(workspace: WorkspaceInfo, paths: ItemPath[]): Promise<(ExtendedItem | null)[]> {
    this.enter("queryExtendedItems", workspace, paths);
    return paths.map((p) => {
      const item = this.items.get(p.serverPath);
      if (!item) return null;
      return {
        targetServerItem: item.serverPath,
        sourceServerItem: item.renamedFrom?.serverPath,
        localItem: item.localPath,
        itemType: item.itemType,
        localVersion: item.localVersion,
        latestVersion: item.latestVersion,
        deletionId: item.deletionId,
        changeType: item.changeType,
      };
    });
  }

  async upload(workspace: WorkspaceInfo, change: PendingChange, content: Uint8Array): Promise<void> {
    this.enter("upload", workspace, change.serverItem);
    if (this.failUpload.has(change.serverItem)) {
      throw new RemoteServerError(`upload rejected for ${change.serverItem}`, 400);
    }
    this.uploaded.set(change.serverItem, content);
  }

  async checkin(workspace: WorkspaceInfo, submission: CheckinSubmission): Promise<CheckinResult> {
    this.enter("checkin", workspace, submission);
    this.submissions.push(submission);

    const failures: ItemFailure[] = [];
    const accepted: ServerItem[] = [];
    for (const serverPath of submission.items) {
      const code = this.failCheckin.get(serverPath);
      if (code !== undefined) {
        failures.push({ item: serverPath, code, message: `checkin rejected: ${code}`, severity: "error" });
        continue;
      }
      accepted.push(this.mustGet(serverPath));
    }

    if (accepted.length === 0) return { changesetId: null, failures };

    const changeset = this.nextChangeset++;
    for (const item of accepted) {
      if (hasChangeType(item.changeType, ChangeType.Delete)) {
        item.deletionId = changeset;
      } else {
        const content = this.uploaded.get(item.serverPath) ?? item.contents.get(item.localVersion);
        if (content) item.contents.set(changeset, content);
        item.latestVersion = changeset;
        item.localVersion = changeset;
      }
      item.changeType = ChangeType.None;
      item.renamedFrom = undefined;
    }
    return { changesetId: changeset, failures };
  }

  private resolveVersion(item: ServerItem, spec: VersionSpec): number {
    switch (spec.type) {
      case "latest":
        return item.latestVersion;
      case "changeset":
        return spec.changeset;
      case "workspace":
        return item.localVersion;
    }
  }

  async get(workspace: WorkspaceInfo, requests: DownloadRequest[]): Promise<GetOperation[]> {
    this.enter("get", workspace, requests);
    const ops: GetOperation[] = [];
    for (const req of requests) {
      const item = this.items.get(req.serverPath);
      if (!item) continue;
      const version = this.resolveVersion(item, req.version);
      if (!req.force && version === item.localVersion) continue;

      const content = item.contents.get(version);
      ops.push({
        serverItem: item.serverPath,
        sourceLocalItem: item.localPath,
        targetLocalItem: item.localPath,
        itemType: item.itemType,
        version,
        contentHash: content ? hashOf(content) : undefined,
      });
    }
    return ops;
  }

  async downloadItem(workspace: WorkspaceInfo, operation: GetOperation): Promise<Uint8Array> {
    this.enter("downloadItem", workspace, operation.serverItem, operation.version);
    if (this.failDownload.has(operation.serverItem)) {
      throw new RemoteServerError(`download failed for ${operation.serverItem}`, 500);
    }
    const content = this.items.get(operation.serverItem)?.contents.get(operation.version);
    if (!content) throw new RemoteServerError(`no content for ${operation.serverItem};C${operation.version}`, 404);
    return content;
  }

  async updateLocalVersions(workspace: WorkspaceInfo, updates: LocalVersionUpdate[]): Promise<void> {
    this.enter("updateLocalVersions", workspace, updates);
    for (const u of updates) {
      const item = this.items.get(u.serverItem);
      if (item) item.localVersion = u.version;
    }
  }

  async undo(workspace: WorkspaceInfo, serverPaths: ServerPath[]): Promise<UndoResponse> {
    this.enter("undo", workspace, serverPaths);
    const operations: GetOperation[] = [];
    const failures: ItemFailure[] = [];

    for (const serverPath of serverPaths) {
      const item = this.items.get(serverPath);
      if (!item || item.changeType === ChangeType.None) {
        failures.push({ item: serverPath, code: NO_PENDING_CHANGE_CODE, message: "no pending change", severity: "error" });
        continue;
      }
      if (this.failUndo.has(serverPath)) {
        failures.push({ item: serverPath, code: "undo_rejected", message: "undo rejected", severity: "error" });
        continue;
      }

      if (hasChangeType(item.changeType, ChangeType.Add)) {
        // the local file stays behind as an unversioned file
        this.items.delete(serverPath);
        continue;
      }

      const from = item.localPath;
      const content = item.contents.get(item.localVersion);
      if (item.renamedFrom) {
        this.items.delete(serverPath);
        item.serverPath = item.renamedFrom.serverPath;
        item.localPath = item.renamedFrom.localPath;
        item.renamedFrom = undefined;
        this.items.set(item.serverPath, item);
      }
      item.changeType = ChangeType.None;

      operations.push({
        serverItem: item.serverPath,
        sourceLocalItem: from,
        targetLocalItem: item.localPath,
        itemType: item.itemType,
        version: item.localVersion,
        contentHash: content ? hashOf(content) : undefined,
      });
    }
    return { operations, failures };
  }

  async pendChanges(workspace: WorkspaceInfo, kind: PendKind, items: ItemPath[]): Promise<ItemFailure[]> {
    this.enter("pendChanges", workspace, kind, items);
    const failures: ItemFailure[] = [];
    for (const p of items) {
      if (this.failPend.has(p.serverPath)) {
        failures.push({ item: p.serverPath, code: "pend_rejected", message: `cannot pend ${kind}`, severity: "error" });
        continue;
      }
      if (kind === "add") {
        this.items.set(p.serverPath, {
          serverPath: p.serverPath,
          localPath: p.localPath,
          itemType: "file",
          latestVersion: 0,
          localVersion: 0,
          deletionId: 0,
          changeType: ChangeType.Add,
          contents: new Map(),
        });
        continue;
      }
      const item = this.items.get(p.serverPath);
      if (!item) {
        failures.push({ item: p.serverPath, code: "item_not_found", message: "no such item", severity: "error" });
        continue;
      }
      item.changeType |= ChangeType.Delete;
    }
    return failures;
  }

  async updateWorkItems(owner: OwnerName, actions: WorkItemAction[], changesetId: ChangesetId): Promise<void> {
    this.enter("updateWorkItems", null, owner, actions, changesetId);
  }
}
