import { type } from "arktype";

import type { WorkspaceInfo } from "@vc-reconcile/core-domain";
import type { RetrySettings } from "../ports/retry-policy";
import type { LogLevel } from "../ports/logger";

const workingFolderSchema = type({
  serverPath: "string",
  localPath: "string",
  "type?": "'map' | 'cloak'",
});

const workspaceSchema = type({
  name: "string > 0",
  ownerName: "string > 0",
  serverUri: "string",
  "computer?": "string",
  "comment?": "string",
  workingFolders: workingFolderSchema.array(),
  "baselineVersion?": "number.integer >= 0",
});

export const engineConfigSchema = type({
  workspaces: workspaceSchema.array(),
  "retry?": {
    "maxAttempts?": "number.integer >= 1",
    "baseDelayMs?": "number >= 0",
    "maxDelayMs?": "number >= 0",
    "jitterRatio?": "0 <= number <= 1",
  },
  "logLevel?": "'debug' | 'info' | 'warn' | 'error'",
});

export type EngineConfigInput = typeof engineConfigSchema.infer;

export type EngineConfig = {
  workspaces: WorkspaceInfo[];
  retry: Partial<RetrySettings>;
  logLevel: LogLevel;
};

export const CONFIG_DIR_NAME = ".vc-reconcile";
export const CONFIG_FILE_NAME = "config.json";

export function emptyEngineConfig(): EngineConfig {
  return { workspaces: [], retry: {}, logLevel: "info" };
}

/** Validates raw JSON and fills defaults. Returns the validation summary on failure. */
export function parseEngineConfig(raw: unknown): { ok: true; config: EngineConfig } | { ok: false; summary: string } {
  const out = engineConfigSchema(raw);
  if (out instanceof type.errors) {
    return { ok: false, summary: out.summary };
  }

  return {
    ok: true,
    config: {
      workspaces: out.workspaces.map((w) => ({
        name: w.name,
        ownerName: w.ownerName,
        serverUri: w.serverUri,
        computer: w.computer,
        comment: w.comment,
        baselineVersion: w.baselineVersion ?? 0,
        workingFolders: w.workingFolders.map((f) => ({
          serverPath: f.serverPath,
          localPath: f.localPath,
          type: f.type ?? "map",
        })),
      })),
      retry: out.retry ?? {},
      logLevel: out.logLevel ?? "info",
    },
  };
}
