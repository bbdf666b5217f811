export type WorkspaceName = string;
export type OwnerName = string;

/** Server-assigned revision number produced by a successful checkin. */
export type ChangesetId = number;

export type ServerPath = string;
export type LocalPath = string;
