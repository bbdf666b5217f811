import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import type { FileHasher } from "../ports/file-hasher";
import type { Sleeper } from "../ports/retry-policy";

import { NodeWorkspaceStore } from "../adapters/node-workspace-store";
import { NodeLocalFileSystem } from "../adapters/node-local-file-system";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { ConsoleLogger } from "../adapters/console-logger";
import { createReconcileEngine } from "./create-engine";
import { defaultNetworkRetryPolicy } from "./default-network-retry-policy";

export type OpenEngineOptions = {
  /** Directory holding `.vc-reconcile/config.json`. */
  rootDir: string;
  gateway: ServerGateway;
  fs?: LocalFileSystem;
  hasher?: FileHasher;
  sleeper?: Sleeper;
};

/**
 * Builds an engine from the configuration file: workspaces from the store,
 * a console logger at the configured level, and gateway retries with the
 * configured settings.
 */
export async function openReconcileEngine(options: OpenEngineOptions) {
  const store = new NodeWorkspaceStore(options.rootDir);
  const config = await store.loadConfig();
  const logger = new ConsoleLogger(config.logLevel);

  const engine = createReconcileEngine({
    gateway: options.gateway,
    fs: options.fs ?? new NodeLocalFileSystem(),
    hasher: options.hasher ?? new NodeFileHasher(),
    workspaces: store,
    logger,
    retry: { policy: defaultNetworkRetryPolicy(config.retry), sleeper: options.sleeper },
  });

  return { ...engine, config, logger };
}
