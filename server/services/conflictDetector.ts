import { lessonEntries, type LessonEntry } from "@shared/schema";
import { and, eq, inArray } from "drizzle-orm";
import type { Database } from "../db";
import {
  TeacherDoubleBookedError,
  isUniqueViolation,
  parseUniqueViolationKey,
  type ConflictPair,
} from "../errors";

export const SLOT_CONSTRAINT = "lesson_entries_slot_uq";

/**
 * A lesson ready to be written: weekday already resolved against the version.
 */
export interface LessonDraft {
  weekday: number;
  position: number;
  disciplineId: string;
  teacherId: string;
  room: string;
  isForce: boolean;
}

function slotKey(slot: ConflictPair): string {
  return `${slot.weekday}:${slot.position}:${slot.teacherId}`;
}

function toPair(lesson: ConflictPair): ConflictPair {
  return { weekday: lesson.weekday, position: lesson.position, teacherId: lesson.teacherId };
}

async function occupiedSlots(executor: Database, versionId: string, drafts: LessonDraft[]): Promise<Set<string>> {
  const teacherIds = [...new Set(drafts.filter((draft) => !draft.isForce).map((draft) => draft.teacherId))];
  if (teacherIds.length === 0) {
    return new Set();
  }

  const rows = await executor
    .select({
      weekday: lessonEntries.weekday,
      position: lessonEntries.position,
      teacherId: lessonEntries.teacherId,
    })
    .from(lessonEntries)
    .where(
      and(
        eq(lessonEntries.scheduleVersionId, versionId),
        eq(lessonEntries.isCurrent, true),
        eq(lessonEntries.isForce, false),
        inArray(lessonEntries.teacherId, teacherIds),
      ),
    );

  return new Set(rows.map(slotKey));
}

/**
 * Splits drafts into the ones that can be written and the ones that would
 * double-book a teacher, either against current lessons of the version or
 * against an earlier draft of the same batch. Forced drafts always pass.
 */
async function partition(executor: Database, versionId: string, drafts: LessonDraft[]) {
  const taken = await occupiedSlots(executor, versionId, drafts);
  const accepted: LessonDraft[] = [];
  const rejected: LessonDraft[] = [];

  for (const draft of drafts) {
    if (draft.isForce) {
      accepted.push(draft);
      continue;
    }
    const key = slotKey(draft);
    if (taken.has(key)) {
      rejected.push(draft);
    } else {
      taken.add(key);
      accepted.push(draft);
    }
  }

  return { accepted, rejected };
}

export async function findConflicts(executor: Database, versionId: string, drafts: LessonDraft[]): Promise<ConflictPair[]> {
  const { rejected } = await partition(executor, versionId, drafts);
  const unique = new Map<string, ConflictPair>();
  for (const lesson of rejected) {
    unique.set(slotKey(lesson), toPair(lesson));
  }
  return [...unique.values()];
}

function rowsFor(versionId: string, cardId: string, drafts: LessonDraft[]) {
  return drafts.map((draft) => ({
    weekday: draft.weekday,
    position: draft.position,
    disciplineId: draft.disciplineId,
    teacherId: draft.teacherId,
    room: draft.room,
    isForce: draft.isForce,
    cardId,
    scheduleVersionId: versionId,
    isCurrent: true,
  }));
}

function pairFromViolation(detail: string | undefined): ConflictPair[] {
  const key = parseUniqueViolationKey(detail);
  if (!key) return [];

  const weekday = Number(key.weekday);
  const position = Number(key.position);
  const teacherId = key.teacher_id;
  if (!Number.isInteger(weekday) || !Number.isInteger(position) || !teacherId) return [];
  return [{ weekday, position, teacherId }];
}

/**
 * Strict insert: any double-booking aborts by throwing, which rolls back
 * the surrounding transaction.
 */
export async function checkAndInsert(
  executor: Database,
  versionId: string,
  cardId: string,
  drafts: LessonDraft[],
): Promise<LessonEntry[]> {
  const pairs = await findConflicts(executor, versionId, drafts);
  if (pairs.length > 0) {
    throw new TeacherDoubleBookedError(pairs);
  }
  if (drafts.length === 0) {
    return [];
  }

  try {
    return await executor.insert(lessonEntries).values(rowsFor(versionId, cardId, drafts)).returning();
  } catch (error) {
    // A concurrent writer took the slot after our pre-check
    if (isUniqueViolation(error, SLOT_CONSTRAINT)) {
      throw new TeacherDoubleBookedError(pairFromViolation(error.detail));
    }
    throw error;
  }
}

/**
 * Lenient insert: conflicting drafts are left out and reported back.
 */
export async function insertSkippingConflicts(
  executor: Database,
  versionId: string,
  cardId: string,
  drafts: LessonDraft[],
): Promise<{ inserted: LessonEntry[]; skipped: LessonDraft[] }> {
  const { accepted, rejected } = await partition(executor, versionId, drafts);
  if (accepted.length === 0) {
    return { inserted: [], skipped: rejected };
  }

  const inserted = await executor
    .insert(lessonEntries)
    .values(rowsFor(versionId, cardId, accepted))
    .onConflictDoNothing()
    .returning();

  if (inserted.length === accepted.length) {
    return { inserted, skipped: rejected };
  }

  // Rows dropped by the database itself were claimed concurrently
  const written = new Set(inserted.filter((row) => !row.isForce).map(slotKey));
  const lost = accepted.filter((draft) => !draft.isForce && !written.has(slotKey(draft)));
  return { inserted, skipped: [...rejected, ...lost] };
}
