import path from "node:path";

import type { ItemPath, WorkingFolder, WorkspaceInfo } from "@vc-reconcile/core-domain";
import { createItemPath } from "@vc-reconcile/core-domain";

import type { LocalFileSystem } from "../ports/local-file-system";
import type { WorkspaceStore } from "../ports/workspace-store";

export type WorkspaceGroup = {
  workspace: WorkspaceInfo;
  paths: ItemPath[];
};

export type PartitionResult = {
  /** In order of first appearance of a workspace among the inputs. */
  groups: WorkspaceGroup[];
  orphans: string[];
};

export type PartitionOptions = {
  /** When false, paths that do not exist locally are reported as orphans. */
  allowNonExisting: boolean;
};

type Match = { workspace: WorkspaceInfo; folder: WorkingFolder };

/** True when `child` is `parent` or lies below it. Names such as `..notes` are children. */
export function isWithin(child: string, parent: string): boolean {
  if (child === parent) return true;
  const rel = path.relative(parent, child);
  return rel.length > 0 && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

function joinServerPath(serverRoot: string, relativeLocal: string): string {
  if (!relativeLocal) return serverRoot;
  const tail = relativeLocal.split(path.sep).join("/");
  return serverRoot.endsWith("/") ? `${serverRoot}${tail}` : `${serverRoot}/${tail}`;
}

/**
 * Most specific working folder across every workspace. A cloaked folder
 * still wins the match; the caller treats it as unmapped.
 */
function findBestMatch(workspaces: WorkspaceInfo[], localPath: string): Match | null {
  let best: Match | null = null;
  let bestLength = -1;

  for (const workspace of workspaces) {
    for (const folder of workspace.workingFolders) {
      const root = path.resolve(folder.localPath);
      if (!isWithin(localPath, root)) continue;
      if (root.length > bestLength) {
        best = { workspace, folder };
        bestLength = root.length;
      }
    }
  }
  return best;
}

export function resolveItemPath(workspaces: WorkspaceInfo[], localPath: string): { workspace: WorkspaceInfo; item: ItemPath } | null {
  const abs = path.resolve(localPath);
  const match = findBestMatch(workspaces, abs);
  if (!match || match.folder.type === "cloak") return null;

  const rel = path.relative(path.resolve(match.folder.localPath), abs);
  return { workspace: match.workspace, item: createItemPath(abs, joinServerPath(match.folder.serverPath, rel)) };
}

/** Local root of the mapped working folder that owns `localPath`. */
export function findMappingRoot(workspace: WorkspaceInfo, localPath: string): string | null {
  const match = findBestMatch([workspace], path.resolve(localPath));
  if (!match || match.folder.type === "cloak") return null;
  return path.resolve(match.folder.localPath);
}

export class WorkspaceMapper {
  constructor(
    private readonly deps: {
      workspaces: WorkspaceStore;
      fs: LocalFileSystem;
    }
  ) {}

  async partition(localPaths: Iterable<string>, options: PartitionOptions): Promise<PartitionResult> {
    const workspaces = await this.deps.workspaces.listWorkspaces();

    const groups = new Map<WorkspaceInfo, ItemPath[]>();
    const orphans: string[] = [];
    const seen = new Set<string>();

    for (const p of localPaths) {
      const abs = path.resolve(p);
      if (seen.has(abs)) continue;
      seen.add(abs);

      const resolved = resolveItemPath(workspaces, abs);
      if (!resolved) {
        orphans.push(abs);
        continue;
      }

      if (!options.allowNonExisting && !(await this.deps.fs.exists(abs))) {
        orphans.push(abs);
        continue;
      }

      const list = groups.get(resolved.workspace) ?? [];
      list.push(resolved.item);
      groups.set(resolved.workspace, list);
    }

    return {
      groups: [...groups.entries()].map(([workspace, paths]) => ({ workspace, paths })),
      orphans,
    };
  }
}
