import type { ItemFailure, ServerPath, UndoResult, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { workspaceKey } from "@vc-reconcile/core-domain";

import type { ServerGateway } from "../ports/server-gateway";
import type { ProgressSink } from "../ports/progress-sink";
import type { Logger } from "../ports/logger";
import { NULL_PROGRESS } from "../ports/progress-sink";
import { silentLogger } from "../ports/logger";
import { ItemFailureError } from "../application/errors";
import { PHASE } from "../application/messages";
import type { ApplyOperationsEngine } from "./apply-operations";

/** Failure code the server uses for "nothing pending on this item". */
export const NO_PENDING_CHANGE_CODE = "item_not_pending";

export type UndoOutcome = UndoResult & {
  errors: ItemFailureError[];
  canceled: boolean;
};

export type UndoOptions = {
  tolerateNoChanges?: boolean;
};

export function emptyUndoOutcome(): UndoOutcome {
  return { undone: [], failed: [], remap: new Map(), errors: [], canceled: false };
}

export class UndoPendingChanges {
  constructor(
    private readonly deps: {
      gateway: ServerGateway;
      applier: ApplyOperationsEngine;
      logger?: Logger;
    }
  ) {}

  /**
   * One undo call for the batch, then the returned operations are applied
   * locally. Moves that were applied become remap entries.
   */
  async execute(
    workspace: WorkspaceInfo,
    serverPaths: ServerPath[],
    options: UndoOptions = {},
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<UndoOutcome> {
    const logger = this.deps.logger ?? silentLogger;
    if (serverPaths.length === 0) return emptyUndoOutcome();

    progress.setPhase(PHASE.undoingPendingChanges);
    const response = await this.deps.gateway.undo(workspace, serverPaths);

    const reported = options.tolerateNoChanges
      ? response.failures.filter((f) => f.code !== NO_PENDING_CHANGE_CODE)
      : response.failures;

    const errors = reported.map((f) => toUndoError(workspace, f));
    const failed = new Set(reported.map((f) => f.item).filter((i): i is ServerPath => i !== null));

    const applyResult = await this.deps.applier.execute(workspace, response.operations, "force", progress);
    errors.push(...applyResult.errors);

    const remap = new Map<string, string>();
    for (const op of applyResult.applied) {
      const { sourceLocalItem: from, targetLocalItem: to } = op;
      if (from !== null && to !== null && from !== to) remap.set(from, to);
    }

    logger.debug("undo finished", {
      workspace: workspaceKey(workspace),
      requested: serverPaths.length,
      failed: failed.size,
      remapped: remap.size,
    });

    return {
      undone: serverPaths.filter((p) => !failed.has(p)),
      failed: [...failed],
      remap,
      errors,
      canceled: applyResult.canceled,
    };
  }
}

function toUndoError(workspace: WorkspaceInfo, failure: ItemFailure): ItemFailureError {
  return new ItemFailureError("undo", failure.item ?? workspaceKey(workspace), failure.message, undefined, failure.code);
}
