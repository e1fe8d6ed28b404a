/**
 * Schedule version lifecycle: creation, listing, pre-commit checks and the
 * active-version switch
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type { Database } from "../server/db";
import { TimetableEngine } from "../server/engine";
import { NotFoundError, ValidationError } from "../server/errors";
import { lockVersion } from "../server/storage/versionStore";
import {
  createTestDatabase,
  deactivateGroup,
  seedFixture,
  seedGroup,
  type Fixture,
  type TestDatabase,
} from "./helpers/testDatabase";
import { expectOutcome } from "./helpers/outcomes";

const MISSING_ID = "00000000-0000-4000-8000-000000000000";

describe("VersionStore", () => {
  let testDb: TestDatabase;
  let db: Database;
  let fx: Fixture;
  let engine: TimetableEngine;

  async function coveredStandard(): Promise<string> {
    const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");
    await engine.bulkAdd({ versionId: version.id, groupNames: ["G1", "G2"] }, "methodist-1");
    return version.id;
  }

  beforeEach(async () => {
    testDb = await createTestDatabase();
    db = testDb.db;
    fx = await seedFixture(db);
    engine = new TimetableEngine(db);
  });

  afterEach(async () => {
    await testDb.client.close();
  });

  describe("createVersion", () => {
    test("creates a pending, uncommitted version", async () => {
      const version = await engine.createVersion({ buildingId: 1, date: "2024-09-02", kind: "replacement" }, "methodist-1");

      expect(version).toMatchObject({
        buildingId: 1,
        scheduleDate: "2024-09-02",
        kind: "replacement",
        status: "pending",
        isCommitted: false,
        createdBy: "methodist-1",
      });
      expect(await engine.getVersion(version.id)).toEqual(version);
    });

    test("requires a date for replacements and forbids one for standard versions", async () => {
      await expect(engine.createVersion({ buildingId: 1, kind: "replacement" }, "methodist-1")).rejects.toBeInstanceOf(ValidationError);
      await expect(
        engine.createVersion({ buildingId: 1, date: "2024-09-02", kind: "standard" }, "methodist-1"),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test("rejects a date that is not on the calendar", async () => {
      const outcome = engine.createVersion({ buildingId: 1, date: "2024-02-30", kind: "replacement" }, "methodist-1");

      await expect(outcome).rejects.toMatchObject({
        code: "VALIDATION",
        issues: ["date: Expected a calendar date as YYYY-MM-DD"],
      });
      expect(await engine.listVersions({ buildingId: 1 })).toEqual([]);
    });

    test("reports unknown versions", async () => {
      await expect(engine.getVersion(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
      await expect(engine.getVersion("not-a-uuid")).rejects.toBeInstanceOf(ValidationError);
    });

    test("hides a version behind another building", async () => {
      const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");

      await expect(engine.getVersion(version.id, 2)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("preCommitCheck", () => {
    test("lists active groups without a card until every group is covered", async () => {
      const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");
      await engine.bulkAdd({ versionId: version.id, groupNames: ["G1"] }, "methodist-1");

      const missing = expectOutcome(await engine.preCommitCheck(version.id), "missing_groups");
      expect(missing.groupIds).toEqual([fx.g2.id]);

      await engine.bulkAdd({ versionId: version.id, groupNames: ["G2"] }, "methodist-1");
      expect(await engine.preCommitCheck(version.id)).toEqual({ status: "ready" });
    });

    test("does not count a group whose current card is only edited", async () => {
      const versionId = await coveredStandard();
      const [g2Card] = (await engine.getCurrentCards(versionId)).filter((card) => card.groupId === fx.g2.id);
      await engine.saveCard({ cardId: g2Card.id, versionId, lessons: [] }, "methodist-1");

      const missing = expectOutcome(await engine.preCommitCheck(versionId), "missing_groups");

      expect(missing.groupIds).toEqual([fx.g2.id]);
    });

    test("ignores inactive groups and groups of other buildings", async () => {
      await seedGroup(db, "B2-1", { buildingId: 2 });
      const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");
      await engine.bulkAdd({ versionId: version.id, groupNames: ["G1"] }, "methodist-1");
      await deactivateGroup(db, fx.g2.id);

      expect(await engine.preCommitCheck(version.id)).toEqual({ status: "ready" });
    });

    test("reports an already committed version of the same kind", async () => {
      const first = await coveredStandard();
      expectOutcome(await engine.commit({ pendingVersionId: first }), "committed");
      const second = await coveredStandard();

      const outcome = expectOutcome(await engine.preCommitCheck(second), "existing_active");

      expect(outcome.activeVersionId).toBe(first);
    });
  });

  describe("commit", () => {
    test("leaves exactly one committed version per building and kind", async () => {
      const oldVersion = await coveredStandard();
      expectOutcome(await engine.commit({ pendingVersionId: oldVersion }), "committed");
      const newVersion = await coveredStandard();

      const outcome = expectOutcome(
        await engine.commit({ pendingVersionId: newVersion, targetVersionId: oldVersion }),
        "committed",
      );

      expect(outcome.replacedVersionId).toBe(oldVersion);
      const committed = await engine.listVersions({ buildingId: 1, isCommitted: true });
      expect(committed.map((version) => version.id)).toEqual([newVersion]);
      expect(committed[0].status).toBe("accepted");
      expect(await engine.getVersion(oldVersion)).toMatchObject({ isCommitted: false, status: "pending" });
    });

    test("refuses to overwrite an active version that was not named", async () => {
      const active = await coveredStandard();
      await engine.commit({ pendingVersionId: active });
      const pending = await coveredStandard();

      const outcome = expectOutcome(await engine.commit({ pendingVersionId: pending }), "existing_active");

      expect(outcome.activeVersionId).toBe(active);
      expect(await engine.getVersion(active)).toMatchObject({ isCommitted: true });
      expect(await engine.getVersion(pending)).toMatchObject({ isCommitted: false });
    });

    test("keeps replacement and standard versions apart", async () => {
      const standard = await coveredStandard();
      await engine.commit({ pendingVersionId: standard });
      const replacement = await engine.createVersion({ buildingId: 1, date: "2024-09-02", kind: "replacement" }, "methodist-1");
      await engine.bulkAdd({ versionId: replacement.id, groupNames: ["G1", "G2"] }, "methodist-1");

      expectOutcome(await engine.commit({ pendingVersionId: replacement.id }), "committed");
    });

    test("re-validates coverage before committing", async () => {
      const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");
      await engine.bulkAdd({ versionId: version.id, groupNames: ["G1"] }, "methodist-1");

      const outcome = expectOutcome(await engine.commit({ pendingVersionId: version.id }), "missing_groups");

      expect(outcome.groupIds).toEqual([fx.g2.id]);
      expect(await engine.getVersion(version.id)).toMatchObject({ isCommitted: false, status: "pending" });
    });

    test("is forbidden for a version that is already committed", async () => {
      const version = await coveredStandard();
      await engine.commit({ pendingVersionId: version });

      const outcome = await engine.commit({ pendingVersionId: version });

      expect(outcome).toMatchObject({ status: "forbidden", code: "VERSION_IMMUTABLE" });
    });

    test("rejects a version replacing itself", async () => {
      const version = await coveredStandard();

      await expect(engine.commit({ pendingVersionId: version, targetVersionId: version })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("lockVersion", () => {
    test("reads the version inside a transaction", async () => {
      const version = await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");

      const locked = await db.transaction(async (tx) => await lockVersion(tx, version.id));

      expect(locked).toEqual(version);
    });

    test("reports unknown versions", async () => {
      await expect(db.transaction(async (tx) => await lockVersion(tx, MISSING_ID))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("switchAsPending", () => {
    test("works while the version is uncommitted", async () => {
      const version = await coveredStandard();

      expect(await engine.switchAsPending(version)).toEqual({ status: "ok", versionId: version });
    });

    test("is forbidden after commit", async () => {
      const version = await coveredStandard();
      await engine.commit({ pendingVersionId: version });

      expect((await engine.switchAsPending(version)).status).toBe("forbidden");
      expect(await engine.getVersion(version)).toMatchObject({ status: "accepted", isCommitted: true });
    });

    test("reports unknown versions", async () => {
      await expect(engine.switchAsPending(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("replaceCandidates", () => {
    test("returns the committed version of the same building and kind", async () => {
      const active = await coveredStandard();
      await engine.commit({ pendingVersionId: active });
      const pending = await coveredStandard();
      await engine.createVersion({ buildingId: 1, date: "2024-09-02", kind: "replacement" }, "methodist-1");

      const candidates = await engine.replaceCandidates(pending);

      expect(candidates.map((version) => version.id)).toEqual([active]);
      expect(await engine.replaceCandidates(active)).toEqual([]);
    });
  });

  describe("listVersions", () => {
    beforeEach(async () => {
      await engine.createVersion({ buildingId: 1, kind: "standard" }, "methodist-1");
      await engine.createVersion({ buildingId: 1, date: "2024-09-02", kind: "replacement" }, "methodist-1");
      await engine.createVersion({ buildingId: 1, date: "2024-09-03", kind: "replacement" }, "methodist-1");
      await engine.createVersion({ buildingId: 2, date: "2024-09-04", kind: "replacement" }, "methodist-2");
    });

    test("filters by building and kind, newest date first", async () => {
      const versions = await engine.listVersions({ buildingId: 1, kind: "replacement" });

      expect(versions.map((version) => version.scheduleDate)).toEqual(["2024-09-03", "2024-09-02"]);
    });

    test("sorts ascending on request", async () => {
      const versions = await engine.listVersions({ buildingId: 1, kind: "replacement", dateSort: "asc" });

      expect(versions.map((version) => version.scheduleDate)).toEqual(["2024-09-02", "2024-09-03"]);
    });

    test("filters by schedule date and commit flag", async () => {
      const byDate = await engine.listVersions({ buildingId: 1, scheduleDate: "2024-09-02" });
      expect(byDate.map((version) => version.scheduleDate)).toEqual(["2024-09-02"]);

      expect(await engine.listVersions({ buildingId: 1, isCommitted: true })).toEqual([]);
      expect(await engine.listVersions({ buildingId: 1, isCommitted: false })).toHaveLength(3);
    });

    test("places the undated standard version last when sorting by newest date", async () => {
      const versions = await engine.listVersions({ buildingId: 1 });

      expect(versions.map((version) => version.kind)).toEqual(["replacement", "replacement", "standard"]);
    });

    test("paginates", async () => {
      const page = await engine.listVersions({ buildingId: 1, kind: "replacement", limit: 1, offset: 1 });

      expect(page.map((version) => version.scheduleDate)).toEqual(["2024-09-02"]);
    });

    test("takes filters as raw query strings", async () => {
      const versions = await engine.listVersions({ buildingId: "1", kind: "replacement", isCommitted: "false", limit: "1", dateSort: "asc" });

      expect(versions.map((version) => version.scheduleDate)).toEqual(["2024-09-02"]);
    });

    test("rejects a page size above 100", async () => {
      await expect(engine.listVersions({ buildingId: 1, limit: 101 })).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
