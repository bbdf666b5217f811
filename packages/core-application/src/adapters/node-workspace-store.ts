import fs from "node:fs/promises";
import path from "node:path";

import type { WorkspaceInfo } from "@vc-reconcile/core-domain";
import type { WorkspaceStore } from "../ports/workspace-store";
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  emptyEngineConfig,
  parseEngineConfig,
  type EngineConfig,
} from "../application/config";
import { ConfigError } from "../application/errors";

export function configFilePath(rootDir: string) {
  return path.join(rootDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Reads workspaces from `<rootDir>/.vc-reconcile/config.json`. Working folder
 * local paths are resolved against `rootDir`.
 */
export class NodeWorkspaceStore implements WorkspaceStore {
  constructor(private readonly rootDir: string) {}

  async loadConfig(): Promise<EngineConfig> {
    const fp = configFilePath(this.rootDir);

    let raw: string;
    try {
      raw = await fs.readFile(fp, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return emptyEngineConfig();
      throw new ConfigError("cannot read config file", fp, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError("config file is not valid JSON", fp, err);
    }

    const parsed = parseEngineConfig(json);
    if (!parsed.ok) throw new ConfigError(parsed.summary, fp);

    const root = path.resolve(this.rootDir);
    return {
      ...parsed.config,
      workspaces: parsed.config.workspaces.map((w) => ({
        ...w,
        workingFolders: w.workingFolders.map((f) => ({
          ...f,
          localPath: path.resolve(root, f.localPath),
        })),
      })),
    };
  }

  async listWorkspaces(): Promise<WorkspaceInfo[]> {
    const config = await this.loadConfig();
    return config.workspaces;
  }

  async saveWorkspaces(workspaces: WorkspaceInfo[]): Promise<void> {
    const fp = configFilePath(this.rootDir);
    const current = await this.loadConfig();
    await fs.mkdir(path.dirname(fp), { recursive: true });
    await fs.writeFile(
      fp,
      JSON.stringify({ workspaces, retry: current.retry, logLevel: current.logLevel }, null, 2),
      "utf-8"
    );
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
