import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import type { FileHasher } from "../ports/file-hasher";
import type { WorkspaceStore } from "../ports/workspace-store";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { silentLogger } from "../ports/logger";

import { RetryingServerGateway } from "../adapters/retrying-server-gateway";
import { WorkspaceMapper } from "../services/workspace-mapper";
import { StatusClassifier } from "../services/status-classifier";
import { ApplyOperationsEngine } from "../services/apply-operations";
import { UndoPendingChanges } from "../services/undo-pending-changes";
import { CheckinOrchestrator } from "../services/checkin-orchestrator";
import { RollbackOrchestrator } from "../services/rollback-orchestrator";
import { ScheduleChanges } from "../services/schedule-changes";

export type EngineDeps = {
  gateway: ServerGateway;
  fs: LocalFileSystem;
  hasher: FileHasher;
  workspaces: WorkspaceStore;
  logger?: Logger;
  /** When set, gateway calls are retried with this policy. */
  retry?: { policy: RetryPolicy; sleeper?: Sleeper };
};

export type ReconcileEngine = ReturnType<typeof createReconcileEngine>;

/** Wires the services together around one gateway and one file system. */
export function createReconcileEngine(deps: EngineDeps) {
  const logger = deps.logger ?? silentLogger;
  const gateway = deps.retry
    ? new RetryingServerGateway(deps.gateway, deps.retry.policy, { sleeper: deps.retry.sleeper, logger })
    : deps.gateway;

  const mapper = new WorkspaceMapper({ workspaces: deps.workspaces, fs: deps.fs });
  const classifier = new StatusClassifier({ gateway, fs: deps.fs });
  const applier = new ApplyOperationsEngine({ gateway, fs: deps.fs, hasher: deps.hasher, logger });
  const undo = new UndoPendingChanges({ gateway, applier, logger });

  return {
    mapper,
    classifier,
    applier,
    undo,
    checkin: new CheckinOrchestrator({ mapper, gateway, fs: deps.fs, logger }),
    rollback: new RollbackOrchestrator({ mapper, classifier, gateway, applier, undo, fs: deps.fs, logger }),
    schedule: new ScheduleChanges({ mapper, gateway, logger }),
  };
}
