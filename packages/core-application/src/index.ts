// Public API of the core-application package: ports, services, Node
// adapters and the engine factory.

// Ports (interfaces)
export * from "./ports/server-gateway";
export * from "./ports/local-file-system";
export * from "./ports/progress-sink";
export * from "./ports/workspace-store";
export * from "./ports/logger";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type { RetryContext, RetryPolicy, RetrySettings, Sleeper } from "./ports/retry-policy";

// Application
export * from "./application/errors";
export * from "./application/messages";
export * from "./application/config";
export * from "./application/with-retry";
export * from "./application/default-network-retry-policy";
export * from "./application/create-engine";
export * from "./application/open-engine";

// Services
export * from "./services/workspace-mapper";
export * from "./services/status-classifier";
export * from "./services/apply-operations";
export * from "./services/undo-pending-changes";
export * from "./services/checkin-orchestrator";
export * from "./services/rollback-orchestrator";
export * from "./services/schedule-changes";

// Node adapters
export * from "./adapters/node-local-file-system";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-workspace-store";
export * from "./adapters/console-logger";
export * from "./adapters/retrying-server-gateway";
