/**
 * Teacher double-booking checks on lesson writes
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { lessonEntries } from "@shared/schema";
import { eq } from "drizzle-orm";
import type { Database } from "../server/db";
import { TeacherDoubleBookedError } from "../server/errors";
import {
  checkAndInsert,
  findConflicts,
  insertSkippingConflicts,
  type LessonDraft,
} from "../server/services/conflictDetector";
import { insertCard, retireCurrentCard } from "../server/storage/cardStore";
import { insertVersion } from "../server/storage/versionStore";
import { createTestDatabase, seedFixture, type Fixture, type TestDatabase } from "./helpers/testDatabase";

describe("ConflictDetector", () => {
  let testDb: TestDatabase;
  let db: Database;
  let fx: Fixture;
  let versionId: string;
  let cardG1: string;
  let cardG2: string;

  const lesson = (overrides: Partial<LessonDraft> = {}): LessonDraft => ({
    weekday: 1,
    position: 1,
    disciplineId: fx.math.id,
    teacherId: fx.smith.id,
    room: "101",
    isForce: false,
    ...overrides,
  });

  beforeEach(async () => {
    testDb = await createTestDatabase();
    db = testDb.db;
    fx = await seedFixture(db);

    const version = await insertVersion(db, { buildingId: 1, scheduleDate: null, kind: "standard", createdBy: "tester" });
    versionId = version.id;
    cardG1 = (await insertCard(db, { versionId, groupId: fx.g1.id, status: "draft", createdBy: "tester" })).id;
    cardG2 = (await insertCard(db, { versionId, groupId: fx.g2.id, status: "draft", createdBy: "tester" })).id;
  });

  afterEach(async () => {
    await testDb.client.close();
  });

  describe("strict mode", () => {
    test("rejects a second non-forced lesson of the same teacher at the same slot", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);

      await expect(checkAndInsert(db, versionId, cardG2, [lesson({ room: "202" })])).rejects.toMatchObject({
        code: "TEACHER_DOUBLE_BOOKED",
        pairs: [{ weekday: 1, position: 1, teacherId: fx.smith.id }],
      });
    });

    test("throws a TeacherDoubleBookedError so the caller can roll back", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);

      await expect(checkAndInsert(db, versionId, cardG2, [lesson()])).rejects.toBeInstanceOf(TeacherDoubleBookedError);
      const rows = await db.select().from(lessonEntries).where(eq(lessonEntries.cardId, cardG2));
      expect(rows).toHaveLength(0);
    });

    test("lets a forced lesson share the slot, in either order", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);
      await checkAndInsert(db, versionId, cardG2, [lesson({ isForce: true })]);

      await checkAndInsert(db, versionId, cardG1, [lesson({ position: 2, isForce: true })]);
      await checkAndInsert(db, versionId, cardG2, [lesson({ position: 2 })]);

      const rows = await db.select().from(lessonEntries).where(eq(lessonEntries.scheduleVersionId, versionId));
      expect(rows).toHaveLength(4);
    });

    test("treats another weekday or position as a free slot", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);

      const inserted = await checkAndInsert(db, versionId, cardG2, [lesson({ weekday: 2 }), lesson({ position: 3 })]);

      expect(inserted).toHaveLength(2);
    });

    test("ignores lessons of cards that are no longer current", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);
      await retireCurrentCard(db, versionId, fx.g1.id);

      const inserted = await checkAndInsert(db, versionId, cardG2, [lesson()]);

      expect(inserted.map((row) => row.teacherId)).toEqual([fx.smith.id]);
    });

    test("writes nothing for an empty batch", async () => {
      expect(await checkAndInsert(db, versionId, cardG1, [])).toEqual([]);
    });
  });

  describe("findConflicts", () => {
    test("reports a collision inside one batch once", async () => {
      const pairs = await findConflicts(db, versionId, [lesson(), lesson({ room: "b" }), lesson({ room: "c" })]);

      expect(pairs).toEqual([{ weekday: 1, position: 1, teacherId: fx.smith.id }]);
    });

    test("is empty when only forced lessons collide", async () => {
      const pairs = await findConflicts(db, versionId, [lesson({ isForce: true }), lesson({ isForce: true })]);

      expect(pairs).toEqual([]);
    });
  });

  describe("lenient mode", () => {
    test("skips conflicting lessons and writes the rest", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);

      const { inserted, skipped } = await insertSkippingConflicts(db, versionId, cardG2, [
        lesson(),
        lesson({ position: 2, teacherId: fx.jones.id }),
      ]);

      expect(inserted.map((row) => row.position)).toEqual([2]);
      expect(skipped).toEqual([lesson()]);
    });

    test("returns everything as skipped when nothing fits", async () => {
      await checkAndInsert(db, versionId, cardG1, [lesson()]);

      const { inserted, skipped } = await insertSkippingConflicts(db, versionId, cardG2, [lesson()]);

      expect(inserted).toEqual([]);
      expect(skipped).toHaveLength(1);
    });
  });
});
