import type { ItemFailure, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { workspaceKey } from "@vc-reconcile/core-domain";

import type { PendKind, ServerGateway } from "../ports/server-gateway";
import type { ProgressSink } from "../ports/progress-sink";
import type { Logger } from "../ports/logger";
import { NULL_PROGRESS } from "../ports/progress-sink";
import { silentLogger } from "../ports/logger";
import {
  ItemFailureError,
  MappingNotFoundError,
  ProtocolViolationError,
  WorkspaceFailureError,
  describeError,
  type SyncError,
} from "../application/errors";
import { PHASE } from "../application/messages";
import type { PartitionOptions, WorkspaceMapper } from "./workspace-mapper";

export type ScheduleOutcome = {
  errors: SyncError[];
  orphans: string[];
};

export class ScheduleChanges {
  constructor(
    private readonly deps: {
      mapper: WorkspaceMapper;
      gateway: ServerGateway;
      logger?: Logger;
    }
  ) {}

  /** Unmapped paths are reported together as one MappingNotFoundError. */
  async scheduleUnversionedFilesForAddition(
    localPaths: string[],
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<ScheduleOutcome> {
    progress.setPhase(PHASE.schedulingForAddition);
    const outcome = await this.pend("add", localPaths, { allowNonExisting: false });
    if (outcome.orphans.length > 0) {
      outcome.errors.push(new MappingNotFoundError(outcome.orphans));
    }
    return outcome;
  }

  async scheduleMissingFileForDeletion(
    localPaths: string[],
    progress: ProgressSink = NULL_PROGRESS
  ): Promise<ScheduleOutcome> {
    progress.setPhase(PHASE.schedulingForDeletion);
    return this.pend("delete", localPaths, { allowNonExisting: true });
  }

  private async pend(kind: PendKind, localPaths: string[], options: PartitionOptions): Promise<ScheduleOutcome> {
    const logger = this.deps.logger ?? silentLogger;
    const { groups, orphans } = await this.deps.mapper.partition(localPaths, options);
    const errors: SyncError[] = [];

    for (const { workspace, paths } of groups) {
      try {
        const failures = await this.deps.gateway.pendChanges(workspace, kind, paths);
        errors.push(...failures.map((f) => toScheduleError(workspace, f)));
      } catch (err) {
        if (err instanceof ProtocolViolationError) throw err;
        logger.warn(`pend ${kind} failed`, { workspace: workspaceKey(workspace), error: describeError(err) });
        errors.push(new WorkspaceFailureError(workspace, `Pend ${kind}`, err));
      }
    }

    return { errors, orphans };
  }
}

function toScheduleError(workspace: WorkspaceInfo, failure: ItemFailure): ItemFailureError {
  return new ItemFailureError("schedule", failure.item ?? workspaceKey(workspace), failure.message, undefined, failure.code);
}
