import { describe, it, expect } from "vitest";
import type { WorkspaceInfo } from "@vc-reconcile/core-domain";
import { ChangeType } from "@vc-reconcile/core-domain";

import { ScheduleChanges } from "./schedule-changes";
import { WorkspaceMapper } from "./workspace-mapper";
import { MappingNotFoundError, NetworkError } from "../application/errors";
import { FakeServerGateway } from "../test-support/fake-server-gateway";
import { MemoryFileSystem } from "../test-support/memory-file-system";

const W: WorkspaceInfo = {
  name: "w",
  ownerName: "dev",
  serverUri: "https://tfs.example.test/collection",
  baselineVersion: 5,
  workingFolders: [{ serverPath: "$/proj", localPath: "/ws", type: "map" }],
};

function setup() {
  const fs = new MemoryFileSystem().addFile("/ws/new.txt", "fresh", { readOnly: false });
  const gateway = new FakeServerGateway();
  const mapper = new WorkspaceMapper({ workspaces: { listWorkspaces: async () => [W] }, fs });
  return { fs, gateway, schedule: new ScheduleChanges({ mapper, gateway }) };
}

describe("scheduleUnversionedFilesForAddition", () => {
  it("pends an add for existing mapped files", async () => {
    const { gateway, schedule } = setup();

    const r = await schedule.scheduleUnversionedFilesForAddition(["/ws/new.txt"]);

    expect(r.errors).toEqual([]);
    expect(gateway.callsTo("pendChanges")[0]?.args).toEqual([
      "add",
      [{ localPath: "/ws/new.txt", serverPath: "$/proj/new.txt" }],
    ]);
    expect(gateway.items.get("$/proj/new.txt")?.changeType).toBe(ChangeType.Add);
  });

  it("reports unmapped and missing paths in one mapping error", async () => {
    const { gateway, schedule } = setup();

    const r = await schedule.scheduleUnversionedFilesForAddition(["/ws/new.txt", "/elsewhere/x.txt", "/ws/absent.txt"]);

    expect(r.orphans).toEqual(["/elsewhere/x.txt", "/ws/absent.txt"]);
    expect(r.errors).toHaveLength(1);
    expect(r.errors[0]).toBeInstanceOf(MappingNotFoundError);
    expect(r.errors[0]?.message).toBe("Server mapping not found for:\n/elsewhere/x.txt\n/ws/absent.txt");
    expect(gateway.callsTo("pendChanges")).toHaveLength(1);
  });

  it("collects a transport failure per workspace", async () => {
    const { gateway, schedule } = setup();
    gateway.failOn("pendChanges", new NetworkError("offline"));

    const r = await schedule.scheduleUnversionedFilesForAddition(["/ws/new.txt"]);

    expect(r.errors.map((e) => e.message)).toEqual(["Pend add failed for workspace w;dev: offline"]);
  });
});

describe("scheduleMissingFileForDeletion", () => {
  it("pends a delete for files that are gone locally", async () => {
    const { gateway, schedule } = setup();
    gateway.seed({ serverPath: "$/proj/gone.txt", localPath: "/ws/gone.txt", version: 5 });

    const r = await schedule.scheduleMissingFileForDeletion(["/ws/gone.txt"]);

    expect(r.errors).toEqual([]);
    expect(r.orphans).toEqual([]);
    expect(gateway.items.get("$/proj/gone.txt")?.changeType).toBe(ChangeType.Delete);
  });

  it("turns server refusals into item errors", async () => {
    const { gateway, schedule } = setup();
    gateway.seed({ serverPath: "$/proj/locked.txt", localPath: "/ws/locked.txt", version: 5 });
    gateway.failPend.add("$/proj/locked.txt");

    const r = await schedule.scheduleMissingFileForDeletion(["/ws/locked.txt", "/ws/unknown.txt"]);

    expect(r.errors.map((e) => e.message)).toEqual([
      "schedule failed for $/proj/locked.txt: cannot pend delete",
      "schedule failed for $/proj/unknown.txt: no such item",
    ]);
  });
});
