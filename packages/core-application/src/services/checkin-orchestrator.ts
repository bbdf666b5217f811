import path from "node:path";

import type {
  ChangesetId,
  CheckinNote,
  PendingChange,
  PolicyOverride,
  ServerPath,
  WorkItemAction,
  WorkspaceInfo,
} from "@vc-reconcile/core-domain";
import { ChangeType, hasChangeType, workspaceKey } from "@vc-reconcile/core-domain";

import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import type { ProgressSink } from "../ports/progress-sink";
import type { Logger } from "../ports/logger";
import { NULL_PROGRESS } from "../ports/progress-sink";
import { silentLogger } from "../ports/logger";
import {
  ItemFailureError,
  ProtocolViolationError,
  WorkspaceFailureError,
  describeError,
  type SyncError,
} from "../application/errors";
import { PHASE } from "../application/messages";
import { findMappingRoot, isWithin, type WorkspaceGroup, type WorkspaceMapper } from "./workspace-mapper";

/* ---------------- session parameters ---------------- */

export type ServerCheckinParameters = {
  workItemActions: WorkItemAction[];
  checkinNotes: CheckinNote[];
  /** Names of checkin policies that failed evaluation. */
  policyFailures: string[];
  overrideComment: string | null;
};

export type UploadFailurePolicy = "skip_item" | "abort_workspace";

/**
 * Everything one commit needs, passed explicitly. Server-specific parts are
 * keyed by server URI.
 */
export type CheckinSession = {
  message: string;
  servers?: Record<string, Partial<ServerCheckinParameters>>;
  uploadFailurePolicy?: UploadFailurePolicy;
};

export function parametersForServer(session: CheckinSession, serverUri: string): ServerCheckinParameters {
  const p = session.servers?.[serverUri] ?? {};
  return {
    workItemActions: p.workItemActions ?? [],
    checkinNotes: p.checkinNotes ?? [],
    policyFailures: p.policyFailures ?? [],
    overrideComment: p.overrideComment ?? null,
  };
}

export function policyOverrideOf(params: ServerCheckinParameters): PolicyOverride | null {
  if (params.policyFailures.length === 0 || !params.overrideComment?.trim()) return null;
  return { comment: params.overrideComment, policyFailures: params.policyFailures };
}

export type ValidationIssue = {
  serverUri: string;
  severity: "error" | "warning";
  message: string;
};

export function validateCheckinParameters(session: CheckinSession): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const serverUri of Object.keys(session.servers ?? {})) {
    const params = parametersForServer(session, serverUri);

    for (const note of params.checkinNotes) {
      if (note.required && note.value.trim().length === 0) {
        issues.push({ serverUri, severity: "error", message: `Checkin note '${note.name}' is required` });
      }
    }

    if (params.policyFailures.length > 0) {
      const names = params.policyFailures.join(", ");
      if (policyOverrideOf(params) === null) {
        issues.push({ serverUri, severity: "error", message: `Checkin policies failed: ${names}` });
      } else {
        issues.push({ serverUri, severity: "warning", message: `Checkin policies overridden: ${names}` });
      }
    }
  }
  return issues;
}

/* ---------------- outcome ---------------- */

export type CheckinOutcome = {
  errors: SyncError[];
  changesets: { workspace: string; changesetId: ChangesetId }[];
  committed: ServerPath[];
  /** Locations the caller should refresh once the call returns. */
  invalidate: { paths: string[]; directories: string[] };
  orphans: string[];
  canceled: boolean;
};

type WorkspaceRun = {
  errors: SyncError[];
  changesets: CheckinOutcome["changesets"];
  committed: ServerPath[];
  paths: Set<string>;
  directories: Set<string>;
  canceled: boolean;
};

function needsUpload(change: PendingChange): boolean {
  return change.itemType === "file" && hasChangeType(change.changeType, ChangeType.Edit, ChangeType.Add);
}

export class CheckinOrchestrator {
  constructor(
    private readonly deps: {
      mapper: WorkspaceMapper;
      gateway: ServerGateway;
      fs: LocalFileSystem;
      logger?: Logger;
    }
  ) {}

  private get logger() {
    return this.deps.logger ?? silentLogger;
  }

  async commit(
    localPaths: string[],
    session: CheckinSession,
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<CheckinOutcome> {
    const { groups, orphans } = await this.deps.mapper.partition(localPaths, { allowNonExisting: true });
    const issues = validateCheckinParameters(session);

    const run: WorkspaceRun = {
      errors: [],
      changesets: [],
      committed: [],
      paths: new Set(),
      directories: new Set(),
      canceled: false,
    };

    for (const group of groups) {
      if (progress.isCanceled()) {
        run.canceled = true;
        break;
      }

      const blocking = issues.filter((i) => i.serverUri === group.workspace.serverUri && i.severity === "error");
      if (blocking.length > 0) {
        const reason = new Error(blocking.map((i) => i.message).join("; "));
        run.errors.push(new WorkspaceFailureError(group.workspace, "Checkin parameter validation", reason));
        continue;
      }

      await this.commitWorkspace(group, session, progress, run);
      if (run.canceled) break;
    }

    return {
      errors: run.errors,
      changesets: run.changesets,
      committed: run.committed,
      invalidate: { paths: [...run.paths], directories: [...run.directories] },
      orphans,
      canceled: run.canceled,
    };
  }

  private async commitWorkspace(
    group: WorkspaceGroup,
    session: CheckinSession,
    progress: ProgressSink,
    run: WorkspaceRun
  ): Promise<void> {
    const { workspace, paths } = group;
    const { gateway } = this.deps;
    const key = workspaceKey(workspace);
    let phase: string = PHASE.loadingPendingChanges;

    try {
      progress.setPhase(phase);
      const pending = await gateway.queryPendingChanges(workspace, paths, "none");
      if (pending.length === 0) {
        this.logger.debug("nothing pending", { workspace: key });
        return;
      }

      phase = PHASE.uploadingFiles;
      progress.setPhase(phase);
      const checkIn: PendingChange[] = [];
      for (const change of pending) {
        if (progress.isCanceled()) {
          run.canceled = true;
          return;
        }
        if (needsUpload(change)) {
          progress.setItem(change.localItem);
          const uploaded = await this.uploadOne(workspace, change, session.uploadFailurePolicy ?? "skip_item", run);
          if (!uploaded) continue;
        }
        checkIn.push(change);
      }
      progress.setItem("");

      if (checkIn.length === 0) return;

      phase = PHASE.checkingIn;
      progress.setPhase(phase);
      const params = parametersForServer(session, workspace.serverUri);
      const result = await gateway.checkin(workspace, {
        items: checkIn.map((c) => c.serverItem),
        comment: session.message,
        workItemActions: params.workItemActions,
        checkinNotes: params.checkinNotes,
        policyOverride: policyOverrideOf(params),
      });

      const failedItems = new Set<string>();
      for (const f of result.failures) {
        if (f.item !== null) failedItems.add(f.item);
        run.errors.push(new ItemFailureError("checkin", f.item ?? key, f.message, undefined, f.code));
      }

      // nothing is marked locally unless the server produced a changeset
      if (result.changesetId === null) return;
      const committed = checkIn.filter((c) => !failedItems.has(c.serverItem));

      run.changesets.push({ workspace: key, changesetId: result.changesetId });
      this.logger.info("checked in", { workspace: key, changeset: result.changesetId, items: committed.length });

      await this.afterCommit(workspace, committed, run);

      phase = PHASE.updatingWorkItems;
      progress.setPhase(phase);
      await gateway.updateWorkItems(workspace.ownerName, params.workItemActions, result.changesetId);
    } catch (err) {
      if (err instanceof ProtocolViolationError) throw err;
      this.logger.warn("checkin aborted for workspace", { workspace: key, phase, error: describeError(err) });
      run.errors.push(new WorkspaceFailureError(workspace, phase, err));
    }
  }

  /** Returns false when the item has to leave the batch. */
  private async uploadOne(
    workspace: WorkspaceInfo,
    change: PendingChange,
    policy: UploadFailurePolicy,
    run: WorkspaceRun
  ): Promise<boolean> {
    try {
      const content = await this.deps.fs.readFile(change.localItem);
      if (content === null) throw new Error("local file not found");
      await this.deps.gateway.upload(workspace, change, content);
      return true;
    } catch (err) {
      if (policy === "abort_workspace") throw err;
      this.logger.warn("upload failed", { item: change.localItem, error: describeError(err) });
      run.errors.push(new ItemFailureError("upload", change.localItem, describeError(err), err));
      return false;
    }
  }

  /** Local bookkeeping for committed items. Failures here are per item; the changeset stands. */
  private async afterCommit(workspace: WorkspaceInfo, committed: PendingChange[], run: WorkspaceRun) {
    const { fs } = this.deps;

    for (const change of committed) {
      const local = change.localItem;
      run.committed.push(change.serverItem);
      run.paths.add(local);
      run.directories.add(path.dirname(local));

      // ancestors may have been checked in implicitly along with the item
      if (hasChangeType(change.changeType, ChangeType.Add, ChangeType.Rename)) {
        const root = findMappingRoot(workspace, local);
        if (root !== null) {
          for (let dir = path.dirname(local); isWithin(dir, root); dir = path.dirname(dir)) {
            run.directories.add(dir);
            if (dir === root) break;
          }
        }
      }

      if (
        change.itemType !== "file" ||
        !hasChangeType(change.changeType, ChangeType.Edit, ChangeType.Add, ChangeType.Rename)
      ) {
        continue;
      }
      try {
        if (await fs.exists(local)) await fs.setReadOnly([local], true);
      } catch (err) {
        this.logger.warn("could not mark committed file read-only", { item: local, error: describeError(err) });
        run.errors.push(new ItemFailureError("finalize", local, describeError(err), err));
      }
    }
  }
}
