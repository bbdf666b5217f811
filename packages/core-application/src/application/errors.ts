import type { ServerStatusKind, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { workspaceKey } from "@vc-reconcile/core-domain";

/* ---------------- transport (thrown by gateways) ---------------- */

export class TransportError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "TransportError";
  }
}

export class NetworkError extends TransportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NetworkError";
  }
}

export class RemoteRateLimitedError extends TransportError {
  constructor(message: string, public retryAfterSeconds?: number, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteRateLimitedError";
  }
}

export class RemoteServerError extends TransportError {
  constructor(message: string, public statusCode?: number, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteServerError";
  }
}

/* ---------------- fatal ---------------- */

/**
 * The server reported a status the running operation cannot be applied to.
 * Never collected: it aborts the whole operation.
 */
export class ProtocolViolationError extends Error {
  constructor(
    public readonly operation: string,
    public readonly kind: ServerStatusKind,
    public readonly localPath: string
  ) {
    super(`Server returned status ${kind} when running ${operation}: ${localPath}`);
    this.name = "ProtocolViolationError";
  }
}

/* ---------------- collected ---------------- */

export type ItemOperation = "upload" | "checkin" | "finalize" | "download" | "undo" | "schedule";

export class ItemFailureError extends Error {
  constructor(
    public readonly operation: ItemOperation,
    public readonly item: string,
    message: string,
    public cause?: unknown,
    public readonly code?: string
  ) {
    super(`${operation} failed for ${item}: ${message}`);
    this.name = "ItemFailureError";
  }
}

export class WorkspaceFailureError extends Error {
  public readonly workspace: string;

  constructor(workspace: WorkspaceInfo, public readonly phase: string, public cause?: unknown) {
    super(`${phase} failed for workspace ${workspaceKey(workspace)}: ${describeError(cause)}`);
    this.name = "WorkspaceFailureError";
    this.workspace = workspaceKey(workspace);
  }
}

export class MappingNotFoundError extends Error {
  constructor(public readonly paths: string[]) {
    super(`Server mapping not found for:\n${paths.join("\n")}`);
    this.name = "MappingNotFoundError";
  }
}

export type SyncError = ItemFailureError | WorkspaceFailureError | MappingNotFoundError;

/* ---------------- config ---------------- */

export class ConfigError extends Error {
  constructor(message: string, public readonly filePath: string, public cause?: unknown) {
    super(`${filePath}: ${message}`);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
