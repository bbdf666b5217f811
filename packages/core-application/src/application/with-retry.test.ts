import { describe, it, expect } from "vitest";
import type { ItemPath, PendingChange, RecursionType, WorkspaceInfo } from "@vc-reconcile/core-domain";

import { computeBackoffMs, withRetry } from "./with-retry";
import { defaultNetworkRetryPolicy, isRetryableTransportError } from "./default-network-retry-policy";
import { NetworkError, RemoteRateLimitedError, RemoteServerError } from "./errors";
import type { RetryPolicy } from "../ports/retry-policy";
import { RetryingServerGateway } from "../adapters/retrying-server-gateway";
import { FakeServerGateway } from "../test-support/fake-server-gateway";

const noJitter = () => 0.5;

function recordingSleeper() {
  const delays: number[] = [];
  return { delays, sleeper: async (ms: number) => void delays.push(ms) };
}

function failing(times: number, error: () => Error) {
  let calls = 0;
  const fn = async () => {
    calls++;
    if (calls <= times) throw error();
    return "ok";
  };
  return { fn, calls: () => calls };
}

const policy: RetryPolicy = defaultNetworkRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0.2 });

describe("computeBackoffMs", () => {
  it("doubles per attempt and caps at the maximum", () => {
    expect(computeBackoffMs(policy, 1, noJitter)).toBe(100);
    expect(computeBackoffMs(policy, 3, noJitter)).toBe(400);
    expect(computeBackoffMs(policy, 6, noJitter)).toBe(1000);
  });

  it("applies jitter in both directions", () => {
    expect(computeBackoffMs(policy, 6, () => 1)).toBe(1200);
    expect(computeBackoffMs(policy, 6, () => 0)).toBe(800);
  });
});

describe("withRetry", () => {
  it("retries transport failures until the call succeeds", async () => {
    const { delays, sleeper } = recordingSleeper();
    const f = failing(2, () => new NetworkError("reset"));

    await expect(withRetry(f.fn, policy, sleeper, noJitter)).resolves.toBe("ok");
    expect(f.calls()).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("gives up after the last attempt", async () => {
    const { delays, sleeper } = recordingSleeper();
    const f = failing(5, () => new RemoteServerError("unavailable", 503));

    await expect(withRetry(f.fn, policy, sleeper, noJitter)).rejects.toThrow("unavailable");
    expect(f.calls()).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("does not retry client errors", async () => {
    const { delays, sleeper } = recordingSleeper();
    const f = failing(1, () => new RemoteServerError("bad request", 400));

    await expect(withRetry(f.fn, policy, sleeper, noJitter)).rejects.toThrow("bad request");
    expect(f.calls()).toBe(1);
    expect(delays).toEqual([]);
  });

  it("waits as long as the server asks, beyond the backoff cap", async () => {
    const { delays, sleeper } = recordingSleeper();
    const f = failing(1, () => new RemoteRateLimitedError("slow down", 7));

    await withRetry(f.fn, policy, sleeper, noJitter);
    expect(delays).toEqual([7000]);
  });
});

describe("isRetryableTransportError", () => {
  it("accepts network, rate limit and server-side failures only", () => {
    expect(isRetryableTransportError(new NetworkError("x"))).toBe(true);
    expect(isRetryableTransportError(new RemoteRateLimitedError("x"))).toBe(true);
    expect(isRetryableTransportError(new RemoteServerError("x", 502))).toBe(true);
    expect(isRetryableTransportError(new RemoteServerError("x"))).toBe(true);
    expect(isRetryableTransportError(new RemoteServerError("x", 404))).toBe(false);
    expect(isRetryableTransportError(new Error("x"))).toBe(false);
  });
});

class FlakyGateway extends FakeServerGateway {
  failuresLeft = 2;

  async queryPendingChanges(workspace: WorkspaceInfo, paths: ItemPath[], recursion: RecursionType): Promise<PendingChange[]> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new NetworkError("connection reset");
    }
    return super.queryPendingChanges(workspace, paths, recursion);
  }
}

const W: WorkspaceInfo = {
  name: "w",
  ownerName: "dev",
  serverUri: "https://tfs.example.test/collection",
  baselineVersion: 1,
  workingFolders: [{ serverPath: "$/proj", localPath: "/ws", type: "map" }],
};

describe("RetryingServerGateway", () => {
  it("retries a flaky call transparently", async () => {
    const inner = new FlakyGateway();
    const { delays, sleeper } = recordingSleeper();
    const gateway = new RetryingServerGateway(inner, policy, { sleeper });

    await expect(gateway.queryPendingChanges(W, [], "none")).resolves.toEqual([]);
    expect(inner.failuresLeft).toBe(0);
    expect(delays).toHaveLength(2);
  });

  it("passes non-retryable failures straight through", async () => {
    const inner = new FakeServerGateway().failOn("undo", new RemoteServerError("forbidden", 403));
    const { delays, sleeper } = recordingSleeper();
    const gateway = new RetryingServerGateway(inner, policy, { sleeper });

    await expect(gateway.undo(W, ["$/proj/a.txt"])).rejects.toThrow("forbidden");
    expect(inner.callsTo("undo")).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("sends calls that change server state only once", async () => {
    const inner = new FakeServerGateway()
      .failOn("checkin", new NetworkError("timed out"))
      .failOn("updateWorkItems", new RemoteServerError("unavailable", 503));
    const { delays, sleeper } = recordingSleeper();
    const gateway = new RetryingServerGateway(inner, policy, { sleeper });
    const submission = { items: ["$/proj/a.txt"], comment: "c", workItemActions: [], checkinNotes: [], policyOverride: null };

    await expect(gateway.checkin(W, submission)).rejects.toThrow("timed out");
    await expect(gateway.updateWorkItems("dev", [], 100)).rejects.toThrow("unavailable");
    expect(inner.callsTo("checkin")).toHaveLength(1);
    expect(inner.callsTo("updateWorkItems")).toHaveLength(1);
    expect(delays).toEqual([]);
  });
});
