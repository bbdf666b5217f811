import path from "node:path";

import type { ClassifiedItem, DownloadRequest, ServerPath, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { workspaceKey } from "@vc-reconcile/core-domain";

import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import type { ProgressSink } from "../ports/progress-sink";
import type { Logger } from "../ports/logger";
import { NULL_PROGRESS } from "../ports/progress-sink";
import { silentLogger } from "../ports/logger";
import {
  ProtocolViolationError,
  WorkspaceFailureError,
  describeError,
  type SyncError,
} from "../application/errors";
import { PHASE } from "../application/messages";
import type { WorkspaceGroup, WorkspaceMapper, PartitionOptions } from "./workspace-mapper";
import type { StatusClassifier } from "./status-classifier";
import { rejectStatus } from "./status-classifier";
import type { ApplyOperationsEngine } from "./apply-operations";
import type { UndoOptions, UndoPendingChanges } from "./undo-pending-changes";

export type RollbackOutcome = {
  errors: SyncError[];
  /** Local path before the rollback → path after it, for reverted renames. */
  remap: Map<string, string>;
  /** Existing directories the caller should refresh. */
  refreshDirectories: string[];
  orphans: string[];
  canceled: boolean;
};

type RollbackRun = RollbackOutcome & { refresh: Set<string> };

const MISSING_FILE_DELETION = "rollback of missing file deletion";

export class RollbackOrchestrator {
  constructor(
    private readonly deps: {
      mapper: WorkspaceMapper;
      classifier: StatusClassifier;
      gateway: ServerGateway;
      applier: ApplyOperationsEngine;
      undo: UndoPendingChanges;
      fs: LocalFileSystem;
      logger?: Logger;
    }
  ) {}

  private get logger() {
    return this.deps.logger ?? silentLogger;
  }

  /**
   * Runs `body` for each workspace in turn. A failure aborts only the
   * workspace it happened in; protocol violations abort everything.
   */
  private async forEachWorkspace(
    localPaths: string[],
    options: PartitionOptions,
    progress: ProgressSink,
    body: (group: WorkspaceGroup, run: RollbackRun) => Promise<void>
  ): Promise<RollbackOutcome> {
    const { groups, orphans } = await this.deps.mapper.partition(localPaths, options);
    const run: RollbackRun = {
      errors: [],
      remap: new Map(),
      refreshDirectories: [],
      refresh: new Set(),
      orphans,
      canceled: false,
    };

    for (const group of groups) {
      if (progress.isCanceled()) {
        run.canceled = true;
        break;
      }
      try {
        await body(group, run);
        this.logger.debug("rollback finished for workspace", {
          workspace: workspaceKey(group.workspace),
          items: group.paths.length,
        });
      } catch (err) {
        if (err instanceof ProtocolViolationError) throw err;
        this.logger.warn("rollback aborted for workspace", {
          workspace: workspaceKey(group.workspace),
          error: describeError(err),
        });
        run.errors.push(new WorkspaceFailureError(group.workspace, "Rollback", err));
      }
      if (run.canceled) break;
    }

    return {
      errors: run.errors,
      remap: run.remap,
      refreshDirectories: [...run.refresh],
      orphans: run.orphans,
      canceled: run.canceled,
    };
  }

  private async download(
    workspace: WorkspaceInfo,
    requests: DownloadRequest[],
    progress: ProgressSink,
    run: RollbackRun
  ): Promise<void> {
    if (requests.length === 0) return;

    progress.setPhase(PHASE.preparingForDownload);
    const operations = await this.deps.gateway.get(workspace, requests);

    progress.setPhase(PHASE.downloading);
    const result = await this.deps.applier.execute(workspace, operations, "force", progress);
    run.errors.push(...result.errors);
    if (result.canceled) run.canceled = true;
  }

  private async undo(
    workspace: WorkspaceInfo,
    serverPaths: ServerPath[],
    options: UndoOptions,
    progress: ProgressSink,
    run: RollbackRun
  ) {
    const result = await this.deps.undo.execute(workspace, serverPaths, options, progress);
    run.errors.push(...result.errors);
    for (const [from, to] of result.remap) run.remap.set(from, to);
    if (result.canceled) run.canceled = true;
    return result;
  }

  /** Flow A: force every item back to the workspace version. */
  async rollbackModifiedWithoutCheckout(
    localPaths: string[],
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<RollbackOutcome> {
    progress.setDeterminate(true);
    return this.forEachWorkspace(localPaths, { allowNonExisting: false }, progress, async ({ workspace, paths }, run) => {
      const requests: DownloadRequest[] = paths.map((p) => ({
        serverPath: p.serverPath,
        recursion: "none",
        version: { type: "workspace", name: workspace.name, ownerName: workspace.ownerName },
        force: true,
      }));
      await this.download(workspace, requests, progress, run);
      for (const p of paths) progress.itemCompleted(p.localPath);
    });
  }

  /**
   * Flow B: a tracked file vanished locally. Pending changes on it are undone,
   * unchanged items are downloaded again at the version the workspace had.
   */
  async rollbackMissingFileDeletion(
    localPaths: string[],
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<RollbackOutcome> {
    return this.forEachWorkspace(localPaths, { allowNonExisting: true }, progress, async ({ workspace, paths }, run) => {
      const download: DownloadRequest[] = [];
      const undo: ServerPath[] = [];

      const targetOf = (entry: ClassifiedItem): ServerPath => {
        if (entry.status.targetItem === null) {
          throw new ProtocolViolationError(MISSING_FILE_DELETION, entry.status.kind, entry.localPath);
        }
        return entry.status.targetItem;
      };
      const scheduleUndo = (entry: ClassifiedItem) => {
        undo.push(targetOf(entry));
      };
      const scheduleDownload = (entry: ClassifiedItem) => {
        download.push({
          serverPath: targetOf(entry),
          recursion: "none",
          version: { type: "changeset", changeset: entry.status.localVersion },
          force: true,
        });
      };
      const reject = rejectStatus(MISSING_FILE_DELETION);

      await this.deps.classifier.visitByStatus(workspace, paths, {
        unversioned: reject,
        checked_out_for_edit: scheduleUndo,
        scheduled_for_addition: scheduleUndo,
        scheduled_for_deletion: reject,
        out_of_date: scheduleDownload,
        deleted: reject,
        up_to_date: scheduleDownload,
        renamed: scheduleUndo,
        renamed_checked_out: scheduleUndo,
        undeleted: scheduleDownload,
      });

      await this.download(workspace, download, progress, run);
      if (run.canceled) return;
      await this.undo(workspace, undo, {}, progress, run);
    });
  }

  /** Flow C: undo pending changes and report where each item ended up. */
  async rollbackChanges(
    localPaths: string[],
    progress: ProgressSink = NULL_PROGRESS,
    options: UndoOptions = {}
  ): Promise<RollbackOutcome> {
    progress.setDeterminate(true);
    return this.forEachWorkspace(localPaths, { allowNonExisting: true }, progress, async ({ workspace, paths }, run) => {
      const result = await this.undo(
        workspace,
        paths.map((p) => p.serverPath),
        options,
        progress,
        run
      );

      for (const p of paths) {
        const subject = result.remap.get(p.localPath) ?? p.localPath;
        progress.itemCompleted(subject);

        const parent = path.dirname(subject);
        if (await this.deps.fs.exists(parent)) run.refresh.add(parent);
      }
    });
  }
}
