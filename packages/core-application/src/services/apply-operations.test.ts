import { describe, it, expect } from "vitest";
import type { GetOperation, WorkspaceInfo } from "@vc-reconcile/core-domain";

import { ApplyOperationsEngine } from "./apply-operations";
import { ItemFailureError, NetworkError } from "../application/errors";
import { FakeServerGateway } from "../test-support/fake-server-gateway";
import { MemoryFileSystem, sha256 } from "../test-support/memory-file-system";

const ws: WorkspaceInfo = {
  name: "w",
  ownerName: "dev",
  serverUri: "https://tfs.example.test",
  baselineVersion: 3,
  workingFolders: [{ serverPath: "$/proj", localPath: "/ws", type: "map" }],
};

function op(overrides: Partial<GetOperation> & Pick<GetOperation, "serverItem">): GetOperation {
  return {
    sourceLocalItem: null,
    targetLocalItem: null,
    itemType: "file",
    version: 3,
    ...overrides,
  };
}

function setup() {
  const fs = new MemoryFileSystem();
  const gateway = new FakeServerGateway()
    .seed({ serverPath: "$/proj/a.txt", localPath: "/ws/a.txt", version: 3, content: "server a" })
    .seed({ serverPath: "$/proj/b.txt", localPath: "/ws/b.txt", version: 3, content: "server b" });
  const engine = new ApplyOperationsEngine({ gateway, fs, hasher: fs });
  return { fs, gateway, engine };
}

describe("apply-operations", () => {
  it("downloads new files, creating parents and marking them read-only", async () => {
    const { fs, engine, gateway } = setup();
    gateway.seed({ serverPath: "$/proj/sub/c.txt", localPath: "/ws/sub/c.txt", version: 3, content: "c" });

    const r = await engine.execute(ws, [op({ serverItem: "$/proj/sub/c.txt", targetLocalItem: "/ws/sub/c.txt" })], "force");

    expect(r.errors).toEqual([]);
    expect(fs.text("/ws/sub/c.txt")).toBe("c");
    expect(fs.isReadOnly("/ws/sub/c.txt")).toBe(true);
    expect(gateway.callsTo("updateLocalVersions")[0]?.args[0]).toEqual([
      { serverItem: "$/proj/sub/c.txt", localItem: "/ws/sub/c.txt", version: 3 },
    ]);
  });

  it("overwrites a writable local file in force mode", async () => {
    const { fs, engine } = setup();
    fs.addFile("/ws/a.txt", "local edit", { readOnly: false });

    const r = await engine.execute(ws, [op({ serverItem: "$/proj/a.txt", sourceLocalItem: "/ws/a.txt", targetLocalItem: "/ws/a.txt" })], "force");

    expect(r.errors).toEqual([]);
    expect(fs.text("/ws/a.txt")).toBe("server a");
    expect(fs.isReadOnly("/ws/a.txt")).toBe(true);
  });

  it("keeps a writable local file in preserve_local mode", async () => {
    const { fs, engine, gateway } = setup();
    fs.addFile("/ws/a.txt", "local edit", { readOnly: false });

    const r = await engine.execute(ws, [op({ serverItem: "$/proj/a.txt", targetLocalItem: "/ws/a.txt" })], "preserve_local");

    expect(r.errors).toHaveLength(1);
    expect(r.errors[0]).toBeInstanceOf(ItemFailureError);
    expect(r.errors[0]?.item).toBe("/ws/a.txt");
    expect(fs.text("/ws/a.txt")).toBe("local edit");
    expect(gateway.callsTo("downloadItem")).toEqual([]);
    expect(gateway.callsTo("updateLocalVersions")).toEqual([]);
  });

  it("skips the transfer when the local hash already matches", async () => {
    const { fs, engine, gateway } = setup();
    fs.addFile("/ws/a.txt", "server a");

    const r = await engine.execute(
      ws,
      [op({ serverItem: "$/proj/a.txt", targetLocalItem: "/ws/a.txt", contentHash: sha256("server a") })],
      "force"
    );

    expect(r.applied).toHaveLength(1);
    expect(gateway.callsTo("downloadItem")).toEqual([]);
    expect(fs.mutations).toEqual([]);
  });

  it("deletes the source when the operation has no target", async () => {
    const { fs, engine } = setup();
    fs.addFile("/ws/old.txt", "x");

    await engine.execute(ws, [op({ serverItem: "$/proj/old.txt", sourceLocalItem: "/ws/old.txt" })], "force");

    expect(await fs.exists("/ws/old.txt")).toBe(false);
  });

  it("moves the source to the target before writing content", async () => {
    const { fs, engine } = setup();
    fs.addFile("/ws/renamed.txt", "server a");

    await engine.execute(
      ws,
      [op({ serverItem: "$/proj/a.txt", sourceLocalItem: "/ws/renamed.txt", targetLocalItem: "/ws/a.txt", contentHash: sha256("server a") })],
      "force"
    );

    expect(await fs.exists("/ws/renamed.txt")).toBe(false);
    expect(fs.text("/ws/a.txt")).toBe("server a");
    expect(fs.mutations).toEqual(["move /ws/renamed.txt -> /ws/a.txt"]);
  });

  it("creates folders", async () => {
    const { fs, engine } = setup();
    await engine.execute(ws, [op({ serverItem: "$/proj/dir", targetLocalItem: "/ws/dir", itemType: "folder" })], "force");
    expect(await fs.isDirectory("/ws/dir")).toBe(true);
  });

  it("collects a failed item and continues with its siblings", async () => {
    const { fs, engine, gateway } = setup();
    gateway.failDownload.add("$/proj/a.txt");

    const r = await engine.execute(
      ws,
      [
        op({ serverItem: "$/proj/a.txt", targetLocalItem: "/ws/a.txt" }),
        op({ serverItem: "$/proj/b.txt", targetLocalItem: "/ws/b.txt" }),
      ],
      "force"
    );

    expect(r.errors.map((e) => e.item)).toEqual(["/ws/a.txt"]);
    expect(r.applied.map((o) => o.serverItem)).toEqual(["$/proj/b.txt"]);
    expect(fs.text("/ws/b.txt")).toBe("server b");
    expect(gateway.callsTo("updateLocalVersions")[0]?.args[0]).toEqual([
      { serverItem: "$/proj/b.txt", localItem: "/ws/b.txt", version: 3 },
    ]);
  });

  it("stops at the next item once canceled", async () => {
    const { fs, engine } = setup();
    let checks = 0;
    const progress = {
      setPhase: () => {},
      setItem: () => {},
      setDeterminate: () => {},
      itemCompleted: () => {},
      isCanceled: () => ++checks > 1,
    };

    const r = await engine.execute(
      ws,
      [
        op({ serverItem: "$/proj/a.txt", targetLocalItem: "/ws/a.txt" }),
        op({ serverItem: "$/proj/b.txt", targetLocalItem: "/ws/b.txt" }),
      ],
      "force",
      progress
    );

    expect(r.canceled).toBe(true);
    expect(r.applied.map((o) => o.serverItem)).toEqual(["$/proj/a.txt"]);
    expect(await fs.exists("/ws/b.txt")).toBe(false);
  });

  it("reports applied operations even when the version update fails", async () => {
    const { fs, engine, gateway } = setup();
    gateway.failOn("updateLocalVersions", new NetworkError("offline"));

    const r = await engine.execute(ws, [op({ serverItem: "$/proj/a.txt", targetLocalItem: "/ws/a.txt" })], "force");

    expect(fs.text("/ws/a.txt")).toBe("server a");
    expect(r.applied.map((o) => o.serverItem)).toEqual(["$/proj/a.txt"]);
    expect(r.errors.map((e) => e.message)).toEqual(["download failed for w;dev: local versions not recorded: offline"]);
  });
});
