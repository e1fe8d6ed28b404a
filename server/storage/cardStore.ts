import {
  cards,
  lessonEntries,
  groups,
  teachers,
  disciplines,
  type Card,
  type CardStatus,
  type ParsedLesson,
  type ScheduleVersion,
} from "@shared/schema";
import { weekdayOf } from "@shared/utils/dateUtils";
import { and, asc, count, desc, eq, inArray, type SQL } from "drizzle-orm";
import type { Database } from "../db";
import type { EngineOptions } from "../config";
import {
  NotFoundError,
  TeacherDoubleBookedError,
  ValidationError,
  doubleBooked,
  isUniqueViolation,
  versionImmutable,
  type DoubleBooked,
  type VersionImmutable,
} from "../errors";
import { createLogger } from "../logger";
import { checkAndInsert, type LessonDraft } from "../services/conflictDetector";
import { isEditable, lockVersion, requireVersion, touchVersion } from "./versionStore";

const log = createLogger("cards");

const CURRENT_CARD_CONSTRAINT = "cards_current_uq";
const ACCEPTED_CARD_CONSTRAINT = "cards_accepted_uq";

export interface LessonView {
  id: string;
  weekday: number;
  position: number;
  disciplineId: string;
  disciplineTitle: string;
  teacherId: string;
  teacherFio: string;
  room: string;
  isForce: boolean;
}

export interface CardWithLessons {
  id: string;
  groupId: string;
  groupName: string;
  status: CardStatus;
  createdBy: string;
  createdAt: Date;
  lessons: LessonView[];
}

export interface CardSummary {
  id: string;
  status: CardStatus;
  isCurrent: boolean;
  createdBy: string;
  createdAt: Date;
  lessonCount: number;
}

export interface StaleCard {
  status: "stale";
  code: "STALE_CARD";
  message: string;
  currentCardId: string | null;
}

export type SaveCardResult =
  | { status: "saved"; cardId: string; lessonCount: number }
  | DoubleBooked
  | StaleCard
  | VersionImmutable;

export type AcceptCardResult =
  | { status: "accepted"; cardId: string }
  | { status: "conflict"; code: "DUPLICATE_ACCEPTED"; message: string; acceptedCardId: string }
  | { status: "rejected"; code: "INSUFFICIENT_LESSONS"; message: string; lessonCount: number; required: number }
  | StaleCard
  | VersionImmutable;

// Write helpers shared with the projector, the bulk operator and the importer

export async function requireCard(executor: Database, cardId: string): Promise<Card> {
  const [card] = await executor.select().from(cards).where(eq(cards.id, cardId));
  if (!card) {
    throw new NotFoundError("Card", cardId);
  }
  return card;
}

export async function findCurrentCard(executor: Database, versionId: string, groupId: string): Promise<Card | undefined> {
  const [card] = await executor
    .select()
    .from(cards)
    .where(and(eq(cards.scheduleVersionId, versionId), eq(cards.groupId, groupId), eq(cards.isCurrent, true)));
  return card;
}

/**
 * Moves the current pointer of a group off its card, lessons included.
 * Returns the id of the card that was current, if any.
 */
export async function retireCurrentCard(executor: Database, versionId: string, groupId: string): Promise<string | null> {
  const retired = await executor
    .update(cards)
    .set({ isCurrent: false })
    .where(and(eq(cards.scheduleVersionId, versionId), eq(cards.groupId, groupId), eq(cards.isCurrent, true)))
    .returning({ id: cards.id });

  if (retired.length === 0) {
    return null;
  }

  const ids = retired.map((card) => card.id);
  await executor.update(lessonEntries).set({ isCurrent: false }).where(inArray(lessonEntries.cardId, ids));
  return ids[0];
}

export async function insertCard(
  executor: Database,
  card: { versionId: string; groupId: string; status: CardStatus; createdBy: string },
): Promise<Card> {
  const [created] = await executor
    .insert(cards)
    .values({
      scheduleVersionId: card.versionId,
      groupId: card.groupId,
      status: card.status,
      createdBy: card.createdBy,
      isCurrent: true,
    })
    .returning();
  return created;
}

/**
 * Pins every lesson to a weekday. A replacement version covers one day, so its
 * lessons take the weekday of the schedule date; standard lessons name their own.
 */
export function resolveLessons(version: ScheduleVersion, lessons: ParsedLesson[]): LessonDraft[] {
  let fixedWeekday: number | null = null;
  if (version.kind === "replacement") {
    if (!version.scheduleDate) {
      throw new ValidationError(`Replacement version ${version.id} has no schedule date`);
    }
    fixedWeekday = weekdayOf(version.scheduleDate);
  }

  return lessons.map((lesson, index) => {
    const weekday = fixedWeekday ?? lesson.weekday;
    if (weekday === undefined) {
      throw new ValidationError(`Lesson ${index + 1}: weekday is required for standard versions`);
    }
    if (lesson.weekday !== undefined && lesson.weekday !== weekday) {
      throw new ValidationError(`Lesson ${index + 1}: weekday ${lesson.weekday} does not match the schedule date`);
    }
    return {
      weekday,
      position: lesson.position,
      disciplineId: lesson.disciplineId,
      teacherId: lesson.teacherId,
      room: lesson.room,
      isForce: lesson.isForce,
    };
  });
}

async function lessonViews(executor: Database, condition: SQL | undefined): Promise<(LessonView & { cardId: string })[]> {
  return await executor
    .select({
      id: lessonEntries.id,
      cardId: lessonEntries.cardId,
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
    .innerJoin(disciplines, eq(disciplines.id, lessonEntries.disciplineId))
    .innerJoin(teachers, eq(teachers.id, lessonEntries.teacherId))
    .where(condition)
    .orderBy(asc(lessonEntries.weekday), asc(lessonEntries.position), asc(teachers.fio));
}

function stripCardId({ cardId: _cardId, ...lesson }: LessonView & { cardId: string }): LessonView {
  return lesson;
}

export class CardStore {
  constructor(
    private readonly db: Database,
    private readonly options: EngineOptions,
  ) {}

  async loadCurrentCards(versionId: string): Promise<CardWithLessons[]> {
    await requireVersion(this.db, versionId);

    const currentCards = await this.db
      .select({
        id: cards.id,
        groupId: cards.groupId,
        groupName: groups.name,
        status: cards.status,
        createdBy: cards.createdBy,
        createdAt: cards.createdAt,
      })
      .from(cards)
      .innerJoin(groups, eq(groups.id, cards.groupId))
      .where(and(eq(cards.scheduleVersionId, versionId), eq(cards.isCurrent, true)))
      .orderBy(asc(groups.name));

    const lessons = await lessonViews(
      this.db,
      and(eq(lessonEntries.scheduleVersionId, versionId), eq(lessonEntries.isCurrent, true)),
    );

    const byCard = new Map<string, LessonView[]>();
    for (const lesson of lessons) {
      const list = byCard.get(lesson.cardId) ?? [];
      list.push(stripCardId(lesson));
      byCard.set(lesson.cardId, list);
    }

    return currentCards.map((card) => ({ ...card, lessons: byCard.get(card.id) ?? [] }));
  }

  /**
   * Replaces the group's current card with a new `edited` card holding
   * `lessons`. The previous card is kept as history. Nothing is written when
   * any lesson would double-book a teacher.
   */
  async saveCard(cardId: string, versionId: string, userId: string, lessons: ParsedLesson[]): Promise<SaveCardResult> {
    try {
      return await this.db.transaction(async (tx): Promise<SaveCardResult> => {
        // Held until the end of the transaction so a commit cannot slip in
        const version = await lockVersion(tx, versionId);
        if (!isEditable(version)) {
          log.warn(`save of card ${cardId} refused: version ${versionId} is committed`);
          return versionImmutable();
        }
        const drafts = resolveLessons(version, lessons);

        const card = await requireCard(tx, cardId);
        if (card.scheduleVersionId !== versionId) {
          throw new ValidationError(`Card ${cardId} does not belong to version ${versionId}`);
        }
        if (!card.isCurrent) {
          const current = await findCurrentCard(tx, versionId, card.groupId);
          return this.staleResult("save", cardId, current?.id ?? null);
        }

        await retireCurrentCard(tx, versionId, card.groupId);
        const created = await insertCard(tx, {
          versionId,
          groupId: card.groupId,
          status: "edited",
          createdBy: userId,
        });
        const inserted = await checkAndInsert(tx, versionId, created.id, drafts);
        await touchVersion(tx, versionId);

        log.info(`saved card ${created.id} (replaces ${cardId}) with ${inserted.length} lesson(s)`);
        return { status: "saved", cardId: created.id, lessonCount: inserted.length };
      });
    } catch (error) {
      if (error instanceof TeacherDoubleBookedError) {
        log.warn(`save of card ${cardId} rolled back: ${error.pairs.length} double-booked slot(s)`);
        return doubleBooked(error);
      }
      // Another save of the same group committed first
      if (isUniqueViolation(error, CURRENT_CARD_CONSTRAINT)) {
        const card = await requireCard(this.db, cardId);
        const current = await findCurrentCard(this.db, versionId, card.groupId);
        return this.staleResult("save", cardId, current?.id ?? null);
      }
      throw error;
    }
  }

  private staleResult(action: "save" | "accept", cardId: string, currentCardId: string | null): StaleCard {
    log.warn(`${action} of card ${cardId} refused: card is no longer current`);
    return {
      status: "stale",
      code: "STALE_CARD",
      message: `The card was changed by someone else, reload it before you ${action} it`,
      currentCardId,
    };
  }

  async acceptCard(cardId: string): Promise<AcceptCardResult> {
    try {
      return await this.db.transaction(async (tx): Promise<AcceptCardResult> => {
        const card = await requireCard(tx, cardId);

        const acceptedCardId = await this.findAcceptedCard(tx, card.scheduleVersionId, card.groupId);
        if (acceptedCardId) {
          return this.duplicateResult(acceptedCardId);
        }

        const version = await lockVersion(tx, card.scheduleVersionId);
        if (!isEditable(version)) {
          return versionImmutable();
        }

        // Only the group's current card can be accepted
        if (!card.isCurrent) {
          const current = await findCurrentCard(tx, card.scheduleVersionId, card.groupId);
          return this.staleResult("accept", cardId, current?.id ?? null);
        }

        const [{ lessonCount }] = await tx
          .select({ lessonCount: count() })
          .from(lessonEntries)
          .where(eq(lessonEntries.cardId, cardId));
        const required = this.options.minLessonsPerAccept;
        if (lessonCount < required) {
          log.warn(`accept of card ${cardId} rejected: ${lessonCount} of ${required} lesson(s)`);
          return {
            status: "rejected",
            code: "INSUFFICIENT_LESSONS",
            message: `A card needs at least ${required} lesson(s) to be accepted`,
            lessonCount,
            required,
          };
        }

        await tx.update(cards).set({ status: "accepted" }).where(eq(cards.id, cardId));
        log.info(`accepted card ${cardId}`);
        return { status: "accepted", cardId };
      });
    } catch (error) {
      if (isUniqueViolation(error, ACCEPTED_CARD_CONSTRAINT)) {
        const card = await requireCard(this.db, cardId);
        const acceptedCardId = await this.findAcceptedCard(this.db, card.scheduleVersionId, card.groupId);
        if (acceptedCardId) {
          return this.duplicateResult(acceptedCardId);
        }
      }
      throw error;
    }
  }

  private async findAcceptedCard(executor: Database, versionId: string, groupId: string): Promise<string | null> {
    const [accepted] = await executor
      .select({ id: cards.id })
      .from(cards)
      .where(and(eq(cards.scheduleVersionId, versionId), eq(cards.groupId, groupId), eq(cards.status, "accepted")))
      .limit(1);
    return accepted?.id ?? null;
  }

  private duplicateResult(acceptedCardId: string): AcceptCardResult {
    log.warn(`accept refused: card ${acceptedCardId} is already accepted for this group`);
    return {
      status: "conflict",
      code: "DUPLICATE_ACCEPTED",
      message: "This group already has an accepted card in the version",
      acceptedCardId,
    };
  }

  async switchAsEdit(cardId: string): Promise<{ status: "ok"; cardId: string }> {
    const [updated] = await this.db
      .update(cards)
      .set({ status: "edited" })
      .where(eq(cards.id, cardId))
      .returning({ id: cards.id });
    if (!updated) {
      throw new NotFoundError("Card", cardId);
    }
    return { status: "ok", cardId: updated.id };
  }

  async history(versionId: string, groupId: string): Promise<CardSummary[]> {
    return await this.db
      .select({
        id: cards.id,
        status: cards.status,
        isCurrent: cards.isCurrent,
        createdBy: cards.createdBy,
        createdAt: cards.createdAt,
        lessonCount: count(lessonEntries.id),
      })
      .from(cards)
      .leftJoin(lessonEntries, eq(lessonEntries.cardId, cards.id))
      .where(and(eq(cards.scheduleVersionId, versionId), eq(cards.groupId, groupId)))
      .groupBy(cards.id)
      .orderBy(desc(cards.isCurrent), desc(cards.createdAt), desc(cards.id))
      .limit(this.options.historyLimit);
  }

  async content(cardId: string): Promise<LessonView[]> {
    await requireCard(this.db, cardId);
    const lessons = await lessonViews(this.db, eq(lessonEntries.cardId, cardId));
    return lessons.map(stripCardId);
  }
}
