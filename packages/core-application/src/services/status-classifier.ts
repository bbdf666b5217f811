import type {
  ClassifiedItem,
  ExtendedItem,
  ItemPath,
  ServerStatus,
  ServerStatusKind,
  WorkspaceInfo,
} from "@vc-reconcile/core-domain";
import { ChangeType, hasChangeType } from "@vc-reconcile/core-domain";

import type { ServerGateway } from "../ports/server-gateway";
import type { LocalFileSystem } from "../ports/local-file-system";
import { ProtocolViolationError } from "../application/errors";

/* ---------------- classification ---------------- */

function determineKind(item: ExtendedItem | null): ServerStatusKind {
  if (!item) return "unversioned";

  const chg = item.changeType;
  if (item.localVersion === 0 && chg === ChangeType.None) return "unversioned";

  if (hasChangeType(chg, ChangeType.Add)) return "scheduled_for_addition";
  if (hasChangeType(chg, ChangeType.Delete)) return "scheduled_for_deletion";
  if (hasChangeType(chg, ChangeType.Undelete)) return "undeleted";
  if (hasChangeType(chg, ChangeType.Rename)) {
    return hasChangeType(chg, ChangeType.Edit) ? "renamed_checked_out" : "renamed";
  }
  if (hasChangeType(chg, ChangeType.Edit, ChangeType.Encoding)) return "checked_out_for_edit";

  if (item.deletionId !== 0) return "deleted";
  if (item.localVersion < item.latestVersion) return "out_of_date";
  return "up_to_date";
}

export function classifyItem(item: ExtendedItem | null): ServerStatus {
  const kind = determineKind(item);
  if (!item || kind === "unversioned") {
    return {
      kind: "unversioned",
      targetItem: item?.targetServerItem ?? null,
      localVersion: item?.localVersion ?? 0,
      latestVersion: item?.latestVersion ?? 0,
      itemType: item?.itemType ?? "file",
    };
  }

  return {
    kind,
    targetItem: item.targetServerItem,
    localVersion: item.localVersion,
    latestVersion: item.latestVersion,
    itemType: item.itemType,
  };
}

/* ---------------- dispatch ---------------- */

/**
 * One handler per status kind. Leaving a kind out is a type error, so a
 * new kind cannot be skipped silently by an existing flow.
 */
export type StatusVisitor<R = void> = {
  [K in ServerStatusKind]: (entry: ClassifiedItem) => R;
};

export function dispatchStatus<R>(entry: ClassifiedItem, visitor: StatusVisitor<R>): R {
  return visitor[entry.status.kind](entry);
}

/** Handler for kinds the calling flow can never accept. */
export function rejectStatus(operation: string) {
  return (entry: ClassifiedItem): never => {
    throw new ProtocolViolationError(operation, entry.status.kind, entry.localPath);
  };
}

export class StatusClassifier {
  constructor(
    private readonly deps: {
      gateway: ServerGateway;
      fs: LocalFileSystem;
    }
  ) {}

  /**
   * Classifies the whole batch with one server query. Nothing is dispatched
   * until every item has a status.
   */
  async classify(workspace: WorkspaceInfo, paths: ItemPath[]): Promise<ClassifiedItem[]> {
    if (paths.length === 0) return [];

    const items = await this.deps.gateway.queryExtendedItems(workspace, paths);
    if (items.length !== paths.length) {
      throw new Error(`Extended item query returned ${items.length} entries for ${paths.length} paths`);
    }

    const out: ClassifiedItem[] = [];
    for (const [i, p] of paths.entries()) {
      out.push({
        localPath: p.localPath,
        localItemExists: await this.deps.fs.exists(p.localPath),
        status: classifyItem(items[i] ?? null),
      });
    }
    return out;
  }

  async visitByStatus<R>(workspace: WorkspaceInfo, paths: ItemPath[], visitor: StatusVisitor<R>): Promise<R[]> {
    const classified = await this.classify(workspace, paths);
    return classified.map((entry) => dispatchStatus(entry, visitor));
  }
}
