import type {
  ChangesetId,
  CheckinResult,
  DownloadRequest,
  ExtendedItem,
  GetOperation,
  ItemFailure,
  ItemPath,
  LocalVersionUpdate,
  OwnerName,
  PendingChange,
  RecursionType,
  ServerPath,
  UndoResponse,
  WorkItemAction,
  WorkspaceInfo,
} from "@vc-reconcile/core-domain";

import type { CheckinSubmission, PendKind, ServerGateway } from "../ports/server-gateway";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { withRetry } from "../application/with-retry";
import { describeError } from "../application/errors";
import { sleep } from "../infra/sleep";

/**
 * Gateway decorator that retries transport failures according to a policy.
 * The orchestrators never retry on their own.
 *
 * Only calls that can be repeated safely are retried. A checkin, undo, pend or
 * work item update that timed out may still have landed on the server, so
 * those go through once.
 */
export class RetryingServerGateway implements ServerGateway {
  constructor(
    private readonly inner: ServerGateway,
    private readonly policy: RetryPolicy,
    private readonly deps: { sleeper?: Sleeper; logger?: Logger } = {}
  ) {}

  private run<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const logger = this.deps.logger ?? silentLogger;
    const policy: RetryPolicy = {
      ...this.policy,
      shouldRetry: (err, ctx) => {
        const retry = this.policy.shouldRetry(err, ctx);
        if (retry) {
          logger.debug(`retrying ${name}`, { attempt: ctx.attempt, error: describeError(err) });
        }
        return retry;
      },
    };
    return withRetry(fn, policy, this.deps.sleeper ?? sleep);
  }

  queryPendingChanges(workspace: WorkspaceInfo, paths: ItemPath[], recursion: RecursionType): Promise<PendingChange[]> {
    return this.run("queryPendingChanges", () => this.inner.queryPendingChanges(workspace, paths, recursion));
  }

  queryExtendedItems(workspace: WorkspaceInfo, paths: ItemPath[]): Promise<(ExtendedItem | null)[]> {
    return this.run("queryExtendedItems", () => this.inner.queryExtendedItems(workspace, paths));
  }

  upload(workspace: WorkspaceInfo, change: PendingChange, content: Uint8Array): Promise<void> {
    return this.run("upload", () => this.inner.upload(workspace, change, content));
  }

  checkin(workspace: WorkspaceInfo, submission: CheckinSubmission): Promise<CheckinResult> {
    return this.inner.checkin(workspace, submission);
  }

  get(workspace: WorkspaceInfo, requests: DownloadRequest[]): Promise<GetOperation[]> {
    return this.run("get", () => this.inner.get(workspace, requests));
  }

  downloadItem(workspace: WorkspaceInfo, operation: GetOperation): Promise<Uint8Array> {
    return this.run("downloadItem", () => this.inner.downloadItem(workspace, operation));
  }

  updateLocalVersions(workspace: WorkspaceInfo, updates: LocalVersionUpdate[]): Promise<void> {
    return this.run("updateLocalVersions", () => this.inner.updateLocalVersions(workspace, updates));
  }

  undo(workspace: WorkspaceInfo, items: ServerPath[]): Promise<UndoResponse> {
    return this.inner.undo(workspace, items);
  }

  pendChanges(workspace: WorkspaceInfo, kind: PendKind, items: ItemPath[]): Promise<ItemFailure[]> {
    return this.inner.pendChanges(workspace, kind, items);
  }

  updateWorkItems(owner: OwnerName, actions: WorkItemAction[], changesetId: ChangesetId): Promise<void> {
    return this.inner.updateWorkItems(owner, actions, changesetId);
  }
}
