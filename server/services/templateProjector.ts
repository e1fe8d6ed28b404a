import { cards, disciplines, groups, lessonEntries, teachers } from "@shared/schema";
import { weekdayName, weekdayOf } from "@shared/utils/dateUtils";
import { and, asc, eq, or, ne, type SQL } from "drizzle-orm";
import type { Database } from "../db";
import {
  TeacherDoubleBookedError,
  ValidationError,
  doubleBooked,
  versionImmutable,
  type DoubleBooked,
  type VersionImmutable,
} from "../errors";
import { createLogger } from "../logger";
import { insertCard, retireCurrentCard } from "../storage/cardStore";
import { findCommittedVersion, isEditable, lockVersion, touchVersion } from "../storage/versionStore";
import { checkAndInsert, type LessonDraft } from "./conflictDetector";

const log = createLogger("projector");

export interface ProjectedLesson {
  cardId: string;
  groupId: string;
  groupName: string;
  weekday: number;
  position: number;
  disciplineId: string;
  disciplineTitle: string;
  teacherId: string;
  teacherFio: string;
  room: string;
  isForce: boolean;
}

export type ProjectionResult =
  | { status: "projected"; versionId: string; sourceVersionId: string | null; lessons: ProjectedLesson[] }
  | DoubleBooked
  | VersionImmutable;

export interface TemplateActuality {
  diffGroups: string[];
  diffTeachers: string[];
  diffDisciplines: string[];
}

interface TemplateRow extends LessonDraft {
  groupId: string;
  groupName: string;
  disciplineTitle: string;
  teacherFio: string;
}

export class TemplateProjector {
  constructor(private readonly db: Database) {}

  /**
   * Copies one weekday of the building's committed standard version into
   * `targetVersionId`, one fresh draft card per group. Lessons whose group,
   * teacher or discipline has been deactivated are left behind.
   */
  async projectWeekday(buildingId: number, weekday: number, targetVersionId: string, userId: string): Promise<ProjectionResult> {
    try {
      return await this.db.transaction(async (tx): Promise<ProjectionResult> => {
        const target = await lockVersion(tx, targetVersionId);
        if (target.buildingId !== buildingId) {
          throw new ValidationError(`Version ${targetVersionId} does not belong to building ${buildingId}`);
        }
        if (!isEditable(target)) {
          log.warn(`projection into ${targetVersionId} refused: version is committed`);
          return versionImmutable();
        }

        let targetWeekday = weekday;
        if (target.kind === "replacement") {
          if (!target.scheduleDate) {
            throw new ValidationError(`Replacement version ${target.id} has no schedule date`);
          }
          targetWeekday = weekdayOf(target.scheduleDate);
        }

        const standard = await findCommittedVersion(tx, buildingId, "standard");
        if (!standard) {
          log.info(`no committed standard version for building ${buildingId}, nothing to project`);
          return { status: "projected", versionId: target.id, sourceVersionId: null, lessons: [] };
        }

        const rows = await this.templateRows(tx, standard.id, buildingId, weekday);
        const byGroup = new Map<string, TemplateRow[]>();
        for (const row of rows) {
          const list = byGroup.get(row.groupId) ?? [];
          list.push({ ...row, weekday: targetWeekday });
          byGroup.set(row.groupId, list);
        }

        const lessons: ProjectedLesson[] = [];
        for (const [groupId, groupRows] of byGroup) {
          await retireCurrentCard(tx, target.id, groupId);
          const card = await insertCard(tx, { versionId: target.id, groupId, status: "draft", createdBy: userId });
          await checkAndInsert(tx, target.id, card.id, groupRows);
          lessons.push(...groupRows.map((row) => ({ ...row, cardId: card.id })));
        }
        await touchVersion(tx, target.id);

        log.info(`projected ${weekdayName(weekday)}: ${lessons.length} lesson(s) for ${byGroup.size} group(s) into ${target.id}`);
        return { status: "projected", versionId: target.id, sourceVersionId: standard.id, lessons };
      });
    } catch (error) {
      if (error instanceof TeacherDoubleBookedError) {
        log.warn(`projection into ${targetVersionId} rolled back: ${error.pairs.length} double-booked slot(s)`);
        return doubleBooked(error);
      }
      throw error;
    }
  }

  private async templateRows(executor: Database, standardVersionId: string, buildingId: number, weekday: number): Promise<TemplateRow[]> {
    return await executor
      .select({
        groupId: cards.groupId,
        groupName: groups.name,
        weekday: lessonEntries.weekday,
        position: lessonEntries.position,
        disciplineId: lessonEntries.disciplineId,
        disciplineTitle: disciplines.title,
        teacherId: lessonEntries.teacherId,
        teacherFio: teachers.fio,
        room: lessonEntries.room,
        isForce: lessonEntries.isForce,
      })
      .from(lessonEntries)
      .innerJoin(cards, eq(cards.id, lessonEntries.cardId))
      .innerJoin(groups, eq(groups.id, cards.groupId))
      .innerJoin(teachers, eq(teachers.id, lessonEntries.teacherId))
      .innerJoin(disciplines, eq(disciplines.id, lessonEntries.disciplineId))
      .where(
        and(
          eq(lessonEntries.scheduleVersionId, standardVersionId),
          eq(lessonEntries.isCurrent, true),
          eq(lessonEntries.weekday, weekday),
          eq(groups.buildingId, buildingId),
          eq(groups.isActive, true),
          eq(teachers.isActive, true),
          eq(disciplines.isActive, true),
        ),
      )
      .orderBy(asc(groups.name), asc(lessonEntries.position));
  }

  /**
   * Names of inactive groups, teachers and disciplines the committed standard
   * version still refers to. The next projection drops their lessons.
   */
  async checkTemplateActuality(buildingId: number): Promise<TemplateActuality> {
    const standard = await findCommittedVersion(this.db, buildingId, "standard");
    if (!standard) {
      return { diffGroups: [], diffTeachers: [], diffDisciplines: [] };
    }

    const current: SQL[] = [
      eq(lessonEntries.scheduleVersionId, standard.id),
      eq(lessonEntries.isCurrent, true),
    ];

    const staleGroups = await this.db
      .selectDistinct({ name: groups.name })
      .from(lessonEntries)
      .innerJoin(cards, eq(cards.id, lessonEntries.cardId))
      .innerJoin(groups, eq(groups.id, cards.groupId))
      .where(and(...current, or(eq(groups.isActive, false), ne(groups.buildingId, buildingId))))
      .orderBy(asc(groups.name));

    const staleTeachers = await this.db
      .selectDistinct({ name: teachers.fio })
      .from(lessonEntries)
      .innerJoin(teachers, eq(teachers.id, lessonEntries.teacherId))
      .where(and(...current, eq(teachers.isActive, false)))
      .orderBy(asc(teachers.fio));

    const staleDisciplines = await this.db
      .selectDistinct({ name: disciplines.title })
      .from(lessonEntries)
      .innerJoin(disciplines, eq(disciplines.id, lessonEntries.disciplineId))
      .where(and(...current, eq(disciplines.isActive, false)))
      .orderBy(asc(disciplines.title));

    return {
      diffGroups: staleGroups.map((row) => row.name),
      diffTeachers: staleTeachers.map((row) => row.name),
      diffDisciplines: staleDisciplines.map((row) => row.name),
    };
  }
}
