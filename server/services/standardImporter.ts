import type { StandardRow } from "@shared/schema";
import type { Database } from "../db";
import { createLogger } from "../logger";
import type { ReferenceDataProvider } from "../storage/referenceData";
import { insertCard } from "../storage/cardStore";
import { insertVersion } from "../storage/versionStore";
import { insertSkippingConflicts, type LessonDraft } from "./conflictDetector";
import type { SkippedLesson } from "./bulkCardOperator";

const log = createLogger("import");

export interface ImportReport {
  versionId: string;
  cardIds: string[];
  unknownGroups: string[];
  unknownTeachers: string[];
  unknownDisciplines: string[];
  skippedLessons: SkippedLesson[];
}

function sorted(names: Set<string>): string[] {
  return [...names].sort((a, b) => a.localeCompare(b));
}

export class StandardImporter {
  constructor(
    private readonly db: Database,
    private readonly referenceData: ReferenceDataProvider,
  ) {}

  /**
   * Builds a new pending standard version from already-normalized rows.
   * Rows naming an unknown or inactive group, teacher or discipline are
   * dropped; the names are reported.
   */
  async importStandard(buildingId: number, userId: string, rows: StandardRow[]): Promise<ImportReport> {
    return await this.db.transaction(async (tx) => {
      const activeGroups = await this.referenceData.activeGroups(tx, buildingId);
      const activeTeachers = await this.referenceData.activeTeachers(tx);
      const activeDisciplines = await this.referenceData.activeDisciplines(tx);
      const groupsByName = new Map(activeGroups.map((group) => [group.name, group]));
      const teachersByFio = new Map(activeTeachers.map((teacher) => [teacher.fio, teacher.id]));
      const disciplinesByTitle = new Map(activeDisciplines.map((discipline) => [discipline.title, discipline.id]));

      const unknownGroups = new Set<string>();
      const unknownTeachers = new Set<string>();
      const unknownDisciplines = new Set<string>();
      const lessonsByGroup = new Map<string, LessonDraft[]>();

      for (const row of rows) {
        const group = groupsByName.get(row.groupName);
        const teacherId = teachersByFio.get(row.teacherFio);
        const disciplineId = disciplinesByTitle.get(row.disciplineTitle);

        if (!group) unknownGroups.add(row.groupName);
        if (!teacherId) unknownTeachers.add(row.teacherFio);
        if (!disciplineId) unknownDisciplines.add(row.disciplineTitle);
        if (!group || !teacherId || !disciplineId) continue;

        const lessons = lessonsByGroup.get(group.name) ?? [];
        lessons.push({
          weekday: row.weekday,
          position: row.position,
          disciplineId,
          teacherId,
          room: row.room,
          isForce: false,
        });
        lessonsByGroup.set(group.name, lessons);
      }

      const version = await insertVersion(tx, { buildingId, scheduleDate: null, kind: "standard", createdBy: userId });

      const cardIds: string[] = [];
      const skippedLessons: SkippedLesson[] = [];
      for (const [groupName, lessons] of lessonsByGroup) {
        const group = groupsByName.get(groupName);
        if (!group) continue;

        const card = await insertCard(tx, { versionId: version.id, groupId: group.id, status: "draft", createdBy: userId });
        const { skipped } = await insertSkippingConflicts(tx, version.id, card.id, lessons);
        cardIds.push(card.id);
        skippedLessons.push(
          ...skipped.map((lesson) => ({
            groupName,
            weekday: lesson.weekday,
            position: lesson.position,
            teacherId: lesson.teacherId,
          })),
        );
      }

      const report: ImportReport = {
        versionId: version.id,
        cardIds,
        unknownGroups: sorted(unknownGroups),
        unknownTeachers: sorted(unknownTeachers),
        unknownDisciplines: sorted(unknownDisciplines),
        skippedLessons,
      };

      const dropped = report.unknownGroups.length + report.unknownTeachers.length + report.unknownDisciplines.length;
      if (dropped > 0) {
        log.warn(`standard import ${version.id}: ${dropped} unknown name(s), their rows were dropped`);
      }
      log.info(`imported standard version ${version.id} with ${cardIds.length} card(s)`);
      return report;
    });
  }
}
