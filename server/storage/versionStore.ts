import {
  scheduleVersions,
  cards,
  type ScheduleVersion,
  type InsertScheduleVersion,
  type VersionKind,
  type ListVersionsFilter,
} from "@shared/schema";
import { and, asc, desc, eq, inArray, ne, sql, type SQL } from "drizzle-orm";
import { formatScheduleDate } from "@shared/utils/dateUtils";
import type { Database } from "../db";
import {
  NotFoundError,
  ValidationError,
  isUniqueViolation,
  versionImmutable,
  type VersionImmutable,
} from "../errors";
import { createLogger } from "../logger";
import type { ReferenceDataProvider } from "./referenceData";

const log = createLogger("versions");

const ACTIVE_VERSION_CONSTRAINT = "schedule_versions_active_uq";

export interface MissingGroups {
  status: "missing_groups";
  code: "MISSING_GROUPS";
  message: string;
  groupIds: string[];
}

export interface ExistingActive {
  status: "existing_active";
  code: "EXISTING_ACTIVE_VERSION";
  message: string;
  activeVersionId: string;
}

export type PreCommitResult = { status: "ready" } | MissingGroups | ExistingActive;

export type CommitResult =
  | { status: "committed"; versionId: string; replacedVersionId: string | null }
  | MissingGroups
  | ExistingActive
  | VersionImmutable;

export type SwitchAsPendingResult = { status: "ok"; versionId: string } | VersionImmutable;

// Helpers shared by every write path that touches cards of a version

export async function findVersion(executor: Database, versionId: string): Promise<ScheduleVersion | undefined> {
  const [version] = await executor.select().from(scheduleVersions).where(eq(scheduleVersions.id, versionId));
  return version;
}

export async function requireVersion(executor: Database, versionId: string): Promise<ScheduleVersion> {
  const version = await findVersion(executor, versionId);
  if (!version) {
    throw new NotFoundError("Schedule version", versionId);
  }
  return version;
}

/**
 * Reads the version under a share lock. Writers to its cards call this inside
 * their transaction; commit updates the row and has to wait for them.
 */
export async function lockVersion(tx: Database, versionId: string): Promise<ScheduleVersion> {
  const [version] = await tx
    .select()
    .from(scheduleVersions)
    .where(eq(scheduleVersions.id, versionId))
    .for("share");
  if (!version) {
    throw new NotFoundError("Schedule version", versionId);
  }
  return version;
}

/**
 * A version stays editable until it is both committed and accepted.
 */
export function isEditable(version: ScheduleVersion): boolean {
  return !(version.isCommitted && version.status === "accepted");
}

export async function findCommittedVersion(
  executor: Database,
  buildingId: number,
  kind: VersionKind,
): Promise<ScheduleVersion | undefined> {
  const [version] = await executor
    .select()
    .from(scheduleVersions)
    .where(
      and(
        eq(scheduleVersions.buildingId, buildingId),
        eq(scheduleVersions.kind, kind),
        eq(scheduleVersions.isCommitted, true),
      ),
    )
    .limit(1);
  return version;
}

export async function touchVersion(executor: Database, versionId: string): Promise<void> {
  await executor
    .update(scheduleVersions)
    .set({ lastModifiedAt: sql`CURRENT_TIMESTAMP` })
    .where(eq(scheduleVersions.id, versionId));
}

export async function insertVersion(
  executor: Database,
  version: Pick<InsertScheduleVersion, "buildingId" | "scheduleDate" | "kind" | "createdBy">,
): Promise<ScheduleVersion> {
  const [created] = await executor
    .insert(scheduleVersions)
    .values({ ...version, status: "pending", isCommitted: false })
    .returning();
  return created;
}

function missingGroupsResult(groupIds: string[]): MissingGroups {
  return {
    status: "missing_groups",
    code: "MISSING_GROUPS",
    message: `${groupIds.length} active group(s) have no card in this version`,
    groupIds,
  };
}

function existingActiveResult(activeVersionId: string): ExistingActive {
  return {
    status: "existing_active",
    code: "EXISTING_ACTIVE_VERSION",
    message: "Another version of this kind is already active; confirm the replacement explicitly",
    activeVersionId,
  };
}

export class VersionStore {
  constructor(
    private readonly db: Database,
    private readonly referenceData: ReferenceDataProvider,
  ) {}

  async create(version: Pick<InsertScheduleVersion, "buildingId" | "scheduleDate" | "kind" | "createdBy">): Promise<ScheduleVersion> {
    const created = await insertVersion(this.db, version);
    const day = created.scheduleDate ? ` for ${formatScheduleDate(created.scheduleDate)}` : "";
    log.info(`created ${created.kind} version ${created.id}${day} in building ${created.buildingId} by ${created.createdBy}`);
    return created;
  }

  async get(versionId: string, buildingId?: number): Promise<ScheduleVersion> {
    const version = await requireVersion(this.db, versionId);
    if (buildingId !== undefined && version.buildingId !== buildingId) {
      throw new NotFoundError("Schedule version", versionId);
    }
    return version;
  }

  async list(filter: ListVersionsFilter): Promise<ScheduleVersion[]> {
    const conditions: SQL[] = [eq(scheduleVersions.buildingId, filter.buildingId)];
    if (filter.status) conditions.push(eq(scheduleVersions.status, filter.status));
    if (filter.kind) conditions.push(eq(scheduleVersions.kind, filter.kind));
    if (filter.isCommitted !== undefined) conditions.push(eq(scheduleVersions.isCommitted, filter.isCommitted));
    if (filter.scheduleDate) conditions.push(eq(scheduleVersions.scheduleDate, filter.scheduleDate));

    const byDate = filter.dateSort === "asc"
      ? sql`${scheduleVersions.scheduleDate} ASC NULLS FIRST`
      : sql`${scheduleVersions.scheduleDate} DESC NULLS LAST`;

    return await this.db
      .select()
      .from(scheduleVersions)
      .where(and(...conditions))
      .orderBy(byDate, desc(scheduleVersions.createdAt))
      .limit(filter.limit)
      .offset(filter.offset);
  }

  /**
   * Committed versions a commit of `versionId` would replace.
   */
  async replaceCandidates(versionId: string): Promise<ScheduleVersion[]> {
    const version = await requireVersion(this.db, versionId);
    return await this.db
      .select()
      .from(scheduleVersions)
      .where(
        and(
          eq(scheduleVersions.buildingId, version.buildingId),
          eq(scheduleVersions.kind, version.kind),
          eq(scheduleVersions.isCommitted, true),
          ne(scheduleVersions.id, version.id),
        ),
      )
      .orderBy(asc(scheduleVersions.createdAt));
  }

  /**
   * Active groups of the building that have no current draft or accepted card
   * in the version, ordered by group name.
   */
  async missingGroups(executor: Database, version: ScheduleVersion): Promise<string[]> {
    const activeGroups = await this.referenceData.activeGroups(executor, version.buildingId);
    const covered = await executor
      .selectDistinct({ groupId: cards.groupId })
      .from(cards)
      .where(
        and(
          eq(cards.scheduleVersionId, version.id),
          eq(cards.isCurrent, true),
          inArray(cards.status, ["accepted", "draft"]),
        ),
      );

    const coveredIds = new Set(covered.map((row) => row.groupId));
    return activeGroups.filter((group) => !coveredIds.has(group.id)).map((group) => group.id);
  }

  private async evaluate(executor: Database, version: ScheduleVersion, targetVersionId: string | null): Promise<PreCommitResult> {
    const missing = await this.missingGroups(executor, version);
    if (missing.length > 0) {
      return missingGroupsResult(missing);
    }

    const active = await findCommittedVersion(executor, version.buildingId, version.kind);
    if (active && active.id !== version.id && active.id !== targetVersionId) {
      return existingActiveResult(active.id);
    }
    return { status: "ready" };
  }

  async preCommitCheck(versionId: string): Promise<PreCommitResult> {
    return await this.db.transaction(async (tx) => {
      const version = await requireVersion(tx, versionId);
      const result = await this.evaluate(tx, version, null);
      if (result.status !== "ready") {
        log.warn(`pre-commit of ${versionId}: ${result.message}`);
      }
      return result;
    }, { isolationLevel: "repeatable read" });
  }

  /**
   * Makes `pendingVersionId` the committed version of its building and kind,
   * demoting `targetVersionId` (the one it replaces) to pending. Coverage is
   * re-checked inside the same repeatable-read transaction before anything is written.
   */
  async commit(pendingVersionId: string, targetVersionId: string | null): Promise<CommitResult> {
    if (targetVersionId === pendingVersionId) {
      throw new ValidationError("A version cannot replace itself");
    }

    try {
      return await this.db.transaction(async (tx): Promise<CommitResult> => {
        const pending = await requireVersion(tx, pendingVersionId);
        if (pending.isCommitted) {
          return versionImmutable("Schedule version is already committed");
        }

        if (targetVersionId) {
          const target = await requireVersion(tx, targetVersionId);
          if (target.buildingId !== pending.buildingId || target.kind !== pending.kind) {
            throw new ValidationError("Target version belongs to another building or kind");
          }
        }

        const check = await this.evaluate(tx, pending, targetVersionId);
        if (check.status !== "ready") {
          return check;
        }

        if (targetVersionId) {
          await tx
            .update(scheduleVersions)
            .set({ isCommitted: false, status: "pending", lastModifiedAt: sql`CURRENT_TIMESTAMP` })
            .where(eq(scheduleVersions.id, targetVersionId));
        }

        await tx
          .update(scheduleVersions)
          .set({ isCommitted: true, status: "accepted", lastModifiedAt: sql`CURRENT_TIMESTAMP` })
          .where(eq(scheduleVersions.id, pendingVersionId));

        log.info(`committed version ${pendingVersionId}${targetVersionId ? `, replacing ${targetVersionId}` : ""}`);
        return { status: "committed", versionId: pendingVersionId, replacedVersionId: targetVersionId };
      }, { isolationLevel: "repeatable read" });
    } catch (error) {
      // Another commit for the same building and kind won the race
      if (isUniqueViolation(error, ACTIVE_VERSION_CONSTRAINT)) {
        const pending = await requireVersion(this.db, pendingVersionId);
        const active = await findCommittedVersion(this.db, pending.buildingId, pending.kind);
        if (active) {
          log.warn(`commit of ${pendingVersionId} lost to ${active.id}`);
          return existingActiveResult(active.id);
        }
      }
      throw error;
    }
  }

  async switchAsPending(versionId: string): Promise<SwitchAsPendingResult> {
    const [updated] = await this.db
      .update(scheduleVersions)
      .set({ status: "pending", lastModifiedAt: sql`CURRENT_TIMESTAMP` })
      .where(and(eq(scheduleVersions.id, versionId), eq(scheduleVersions.isCommitted, false)))
      .returning({ id: scheduleVersions.id });

    if (updated) {
      return { status: "ok", versionId: updated.id };
    }

    await requireVersion(this.db, versionId);
    log.warn(`switch-as-pending refused for committed version ${versionId}`);
    return versionImmutable("Committed versions cannot be switched back to pending");
  }
}
