import type { WorkspaceInfo } from "@vc-reconcile/core-domain";

export interface WorkspaceStore {
  listWorkspaces(): Promise<WorkspaceInfo[]>;
}
