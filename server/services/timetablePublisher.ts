import { cards, disciplines, groups, lessonEntries, teachers, type ScheduleVersion } from "@shared/schema";
import { scheduleDatesBetween, weekdayOf } from "@shared/utils/dateUtils";
import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db";
import { NotFoundError } from "../errors";
import { createLogger } from "../logger";
import { findCurrentCard } from "../storage/cardStore";
import { findCommittedVersion } from "../storage/versionStore";

const log = createLogger("publisher");

export interface PublishedLesson {
  position: number;
  disciplineTitle: string;
  teacherFio: string;
  room: string;
}

export interface PublishedDay {
  date: string;
  weekday: number;
  source: "replacement" | "standard" | null;
  versionId: string | null;
  lessons: PublishedLesson[];
}

export interface PublishedTimetable {
  buildingId: number;
  groupName: string;
  days: PublishedDay[];
}

type PublishedRow = PublishedLesson & { weekday: number };

/**
 * Read side for students: what a group actually has on each day, built from
 * committed versions only.
 */
export class TimetablePublisher {
  constructor(private readonly db: Database) {}

  /**
   * One entry per date from `dateStart` to `dateEnd` (or just `dateStart`).
   * A date covered by the committed replacement version shows the group's
   * current card there; every other date falls back to the committed
   * standard version's lessons for that weekday.
   */
  async getPublishedTimetable(
    buildingId: number,
    groupName: string,
    dateStart: string,
    dateEnd?: string,
  ): Promise<PublishedTimetable> {
    return await this.db.transaction(async (tx) => {
      const [group] = await tx
        .select({ id: groups.id })
        .from(groups)
        .where(and(eq(groups.buildingId, buildingId), eq(groups.name, groupName)));
      if (!group) {
        throw new NotFoundError("Group", groupName);
      }

      const replacement = await findCommittedVersion(tx, buildingId, "replacement");
      const standard = await findCommittedVersion(tx, buildingId, "standard");
      const dates = scheduleDatesBetween(dateStart, dateEnd ?? dateStart);

      let replacementDay: PublishedDay | null = null;
      if (replacement?.scheduleDate && dates.includes(replacement.scheduleDate)) {
        replacementDay = await this.replacementDay(tx, replacement, group.id);
      }

      const templateByWeekday = new Map<number, PublishedLesson[]>();
      if (standard) {
        for (const { weekday, ...lesson } of await this.currentLessons(tx, standard.id, group.id)) {
          const list = templateByWeekday.get(weekday) ?? [];
          list.push(lesson);
          templateByWeekday.set(weekday, list);
        }
      }

      const days = dates.map((date): PublishedDay => {
        if (replacementDay && replacementDay.date === date) {
          return replacementDay;
        }
        const weekday = weekdayOf(date);
        return {
          date,
          weekday,
          source: standard ? "standard" : null,
          versionId: standard?.id ?? null,
          lessons: templateByWeekday.get(weekday) ?? [],
        };
      });

      log.info(`served ${days.length} day(s) of ${groupName} in building ${buildingId}`);
      return { buildingId, groupName, days };
    }, { isolationLevel: "repeatable read" });
  }

  // A group without a card in the replacement version keeps its standard day
  private async replacementDay(executor: Database, replacement: ScheduleVersion, groupId: string): Promise<PublishedDay | null> {
    if (!replacement.scheduleDate || !(await findCurrentCard(executor, replacement.id, groupId))) {
      return null;
    }
    const rows = await this.currentLessons(executor, replacement.id, groupId);
    return {
      date: replacement.scheduleDate,
      weekday: weekdayOf(replacement.scheduleDate),
      source: "replacement",
      versionId: replacement.id,
      lessons: rows.map(({ weekday: _weekday, ...lesson }) => lesson),
    };
  }

  private async currentLessons(executor: Database, versionId: string, groupId: string): Promise<PublishedRow[]> {
    return await executor
      .select({
        weekday: lessonEntries.weekday,
        position: lessonEntries.position,
        disciplineTitle: disciplines.title,
        teacherFio: teachers.fio,
        room: lessonEntries.room,
      })
      .from(lessonEntries)
      .innerJoin(cards, eq(cards.id, lessonEntries.cardId))
      .innerJoin(disciplines, eq(disciplines.id, lessonEntries.disciplineId))
      .innerJoin(teachers, eq(teachers.id, lessonEntries.teacherId))
      .where(
        and(
          eq(lessonEntries.scheduleVersionId, versionId),
          eq(lessonEntries.isCurrent, true),
          eq(cards.groupId, groupId),
        ),
      )
      .orderBy(asc(lessonEntries.weekday), asc(lessonEntries.position), asc(teachers.fio));
  }
}
