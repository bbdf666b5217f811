import path from "node:path";

import type { GetOperation, LocalVersionUpdate, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { workspaceKey } from "@vc-reconcile/core-domain";

import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import type { FileHasher } from "../ports/file-hasher";
import type { ProgressSink } from "../ports/progress-sink";
import type { Logger } from "../ports/logger";
import { NULL_PROGRESS } from "../ports/progress-sink";
import { silentLogger } from "../ports/logger";
import { ItemFailureError, describeError } from "../application/errors";

/**
 * - force: local content is overwritten or removed even if the file is writable
 * - preserve_local: a writable local file is treated as locally modified and left alone
 */
export type DownloadMode = "force" | "preserve_local";

export type ApplyResult = {
  errors: ItemFailureError[];
  applied: GetOperation[];
  canceled: boolean;
};

function describeOperation(op: GetOperation): string {
  return op.targetLocalItem ?? op.sourceLocalItem ?? op.serverItem;
}

class LocalChangesWouldBeLost extends Error {
  constructor(localPath: string) {
    super(`local file is writable and may contain changes: ${localPath}`);
    this.name = "LocalChangesWouldBeLost";
  }
}

export class ApplyOperationsEngine {
  constructor(
    private readonly deps: {
      gateway: ServerGateway;
      fs: LocalFileSystem;
      hasher: FileHasher;
      logger?: Logger;
    }
  ) {}

  async execute(
    workspace: WorkspaceInfo,
    operations: GetOperation[],
    mode: DownloadMode,
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<ApplyResult> {
    const logger = this.deps.logger ?? silentLogger;
    const errors: ItemFailureError[] = [];
    const applied: GetOperation[] = [];
    let canceled = false;

    for (const op of operations) {
      if (progress.isCanceled()) {
        canceled = true;
        break;
      }
      progress.setItem(describeOperation(op));

      try {
        await this.applyOne(workspace, op, mode);
        applied.push(op);
      } catch (err) {
        logger.warn("get operation failed", { item: describeOperation(op), error: describeError(err) });
        errors.push(new ItemFailureError("download", describeOperation(op), describeError(err), err));
      }
    }
    progress.setItem("");

    // the server only learns about versions that actually reached the disk
    const updates: LocalVersionUpdate[] = applied.map((op) => ({
      serverItem: op.serverItem,
      localItem: op.targetLocalItem,
      version: op.version,
    }));
    if (updates.length > 0) {
      try {
        await this.deps.gateway.updateLocalVersions(workspace, updates);
      } catch (err) {
        // the disk already changed; callers still need `applied`
        logger.warn("local version update failed", { workspace: workspaceKey(workspace), error: describeError(err) });
        errors.push(
          new ItemFailureError("download", workspaceKey(workspace), `local versions not recorded: ${describeError(err)}`, err)
        );
      }
    }

    return { errors, applied, canceled };
  }

  private async guardLocal(localPath: string, mode: DownloadMode) {
    if (mode === "force") return;
    const { fs } = this.deps;
    if ((await fs.exists(localPath)) && !(await fs.isDirectory(localPath)) && (await fs.isWritable(localPath))) {
      throw new LocalChangesWouldBeLost(localPath);
    }
  }

  private async applyOne(workspace: WorkspaceInfo, op: GetOperation, mode: DownloadMode): Promise<void> {
    const { fs } = this.deps;
    const source = op.sourceLocalItem;
    const target = op.targetLocalItem;

    if (target === null) {
      if (source !== null && (await fs.exists(source))) {
        await this.guardLocal(source, mode);
        await fs.remove(source);
      }
      return;
    }

    if (source !== null && source !== target && (await fs.exists(source))) {
      await this.guardLocal(target, mode);
      await fs.move(source, target);
    }

    if (op.itemType === "folder") {
      await fs.mkdirp(target);
      return;
    }

    await this.writeFileContent(workspace, op, target, mode);
  }

  private async writeFileContent(workspace: WorkspaceInfo, op: GetOperation, target: string, mode: DownloadMode) {
    const { fs, hasher, gateway } = this.deps;
    const exists = await fs.exists(target);

    if (exists && op.contentHash !== undefined) {
      const local = await hasher.hashFile(target);
      if (local.value === op.contentHash) {
        if (await fs.isWritable(target)) await fs.setReadOnly([target], true);
        return;
      }
    }

    await this.guardLocal(target, mode);
    const content = await gateway.downloadItem(workspace, op);

    if (exists) {
      const current = await fs.readFile(target);
      if (current !== null && sameBytes(current, content)) {
        if (await fs.isWritable(target)) await fs.setReadOnly([target], true);
        return;
      }
      await fs.setReadOnly([target], false);
    } else {
      await fs.mkdirp(path.dirname(target));
    }

    await fs.writeFile(target, content);
    await fs.setReadOnly([target], true);
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
