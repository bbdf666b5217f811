import type { LocalPath, OwnerName, ServerPath, WorkspaceName } from '../value-objects/ids';

export type WorkingFolderType = 'map' | 'cloak';

export interface WorkingFolder {
  serverPath: ServerPath;
  localPath: LocalPath;
  type: WorkingFolderType;
}

export interface WorkspaceInfo {
  name: WorkspaceName;
  ownerName: OwnerName;
  serverUri: string;
  computer?: string;
  comment?: string;
  workingFolders: WorkingFolder[];
  /** Changeset the workspace was last synced to. */
  baselineVersion: number;
}

export function workspaceKey(workspace: Pick<WorkspaceInfo, 'name' | 'ownerName'>): string {
  return `${workspace.name};${workspace.ownerName}`;
}
