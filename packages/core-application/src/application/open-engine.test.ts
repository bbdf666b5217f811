import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { openReconcileEngine } from "./open-engine";
import { NetworkError } from "./errors";
import { configFilePath } from "../adapters/node-workspace-store";
import { FakeServerGateway } from "../test-support/fake-server-gateway";
import { MemoryFileSystem } from "../test-support/memory-file-system";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "vc-reconcile-open-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

async function writeConfig(config: unknown) {
  const fp = configFilePath(root);
  await fs.mkdir(path.dirname(fp), { recursive: true });
  await fs.writeFile(fp, JSON.stringify(config), "utf-8");
}

describe("openReconcileEngine", () => {
  it("applies the configured retry settings and log level", async () => {
    await writeConfig({
      workspaces: [
        {
          name: "w",
          ownerName: "dev",
          serverUri: "https://tfs.example.test/collection",
          workingFolders: [{ serverPath: "$/proj", localPath: "ws" }],
        },
      ],
      retry: { maxAttempts: 2, baseDelayMs: 0, jitterRatio: 0 },
      logLevel: "warn",
    });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const gateway = new FakeServerGateway().failOn("queryPendingChanges", new NetworkError("offline"));
    const delays: number[] = [];
    const memory = new MemoryFileSystem();

    const engine = await openReconcileEngine({
      rootDir: root,
      gateway,
      fs: memory,
      hasher: memory,
      sleeper: async (ms) => void delays.push(ms),
    });
    const r = await engine.checkin.commit([path.join(root, "ws", "a.txt")], { message: "m" });

    expect(engine.config.logLevel).toBe("warn");
    expect(gateway.callsTo("queryPendingChanges")).toHaveLength(2);
    expect(delays).toEqual([0]);
    expect(r.errors.map((e) => e.message)).toEqual(["Loading pending changes failed for workspace w;dev: offline"]);
    expect(warn).toHaveBeenCalledWith("[vc-reconcile] checkin aborted for workspace", {
      workspace: "w;dev",
      phase: "Loading pending changes",
      error: "offline",
    });
    expect(debug).not.toHaveBeenCalled();
  });

  it("starts with no workspaces when there is no configuration file", async () => {
    const engine = await openReconcileEngine({ rootDir: root, gateway: new FakeServerGateway() });

    const r = await engine.rollback.rollbackChanges([path.join(root, "a.txt")]);

    expect(engine.config.workspaces).toEqual([]);
    expect(r.orphans).toEqual([path.join(root, "a.txt")]);
  });
});
