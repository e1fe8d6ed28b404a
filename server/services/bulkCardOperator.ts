import { cards, type ParsedLesson } from "@shared/schema";
import { and, eq, inArray } from "drizzle-orm";
import type { Database } from "../db";
import { versionImmutable, type ConflictPair, type VersionImmutable } from "../errors";
import { createLogger } from "../logger";
import type { ReferenceDataProvider } from "../storage/referenceData";
import { insertCard, resolveLessons, retireCurrentCard } from "../storage/cardStore";
import { isEditable, lockVersion, touchVersion } from "../storage/versionStore";
import { insertSkippingConflicts } from "./conflictDetector";

const log = createLogger("bulk");

export interface SkippedLesson extends ConflictPair {
  groupName: string;
}

export type BulkAddResult =
  | { status: "added"; cardIds: string[]; missingGroups: string[]; skippedLessons: SkippedLesson[] }
  | VersionImmutable;

export type BulkDeleteResult = { status: "deleted"; count: number; cardIds: string[] } | VersionImmutable;

export class BulkCardOperator {
  constructor(
    private readonly db: Database,
    private readonly referenceData: ReferenceDataProvider,
  ) {}

  /**
   * Gives every named group a fresh draft card carrying a copy of `lessons`.
   * Unknown group names and lessons that would double-book a teacher are
   * reported back instead of failing the batch.
   */
  async bulkAdd(versionId: string, userId: string, groupNames: string[], lessons: ParsedLesson[]): Promise<BulkAddResult> {
    return await this.db.transaction(async (tx): Promise<BulkAddResult> => {
      const version = await lockVersion(tx, versionId);
      if (!isEditable(version)) {
        log.warn(`bulk add into ${versionId} refused: version is committed`);
        return versionImmutable();
      }
      const drafts = resolveLessons(version, lessons);

      const activeGroups = await this.referenceData.activeGroups(tx, version.buildingId);
      const byName = new Map(activeGroups.map((group) => [group.name, group]));

      const wanted = [...new Set(groupNames)];
      const missingGroups = wanted.filter((name) => !byName.has(name));

      const cardIds: string[] = [];
      const skippedLessons: SkippedLesson[] = [];
      for (const name of wanted) {
        const group = byName.get(name);
        if (!group) continue;

        await retireCurrentCard(tx, versionId, group.id);
        const card = await insertCard(tx, { versionId, groupId: group.id, status: "draft", createdBy: userId });
        const { skipped } = await insertSkippingConflicts(tx, versionId, card.id, drafts);

        cardIds.push(card.id);
        skippedLessons.push(
          ...skipped.map((lesson) => ({
            groupName: group.name,
            weekday: lesson.weekday,
            position: lesson.position,
            teacherId: lesson.teacherId,
          })),
        );
      }
      await touchVersion(tx, versionId);

      if (missingGroups.length > 0) {
        log.warn(`bulk add into ${versionId}: unknown group(s) ${missingGroups.join(", ")}`);
      }
      log.info(`bulk added ${cardIds.length} card(s) to ${versionId}, ${skippedLessons.length} lesson(s) skipped`);
      return { status: "added", cardIds, missingGroups, skippedLessons };
    });
  }

  async bulkDelete(cardIds: string[], versionId: string): Promise<BulkDeleteResult> {
    return await this.db.transaction(async (tx): Promise<BulkDeleteResult> => {
      const version = await lockVersion(tx, versionId);
      if (!isEditable(version)) {
        log.warn(`bulk delete in ${versionId} refused: version is committed`);
        return versionImmutable();
      }

      const deleted = await tx
        .delete(cards)
        .where(and(eq(cards.scheduleVersionId, versionId), inArray(cards.id, cardIds)))
        .returning({ id: cards.id });
      await touchVersion(tx, versionId);

      log.info(`deleted ${deleted.length} card(s) from ${versionId}`);
      return { status: "deleted", count: deleted.length, cardIds: deleted.map((card) => card.id) };
    });
  }
}
