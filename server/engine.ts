import {
  buildingIdSchema,
  bulkAddCardsSchema,
  bulkDeleteCardsSchema,
  commitVersionSchema,
  createVersionSchema,
  historyQuerySchema,
  idSchema,
  importStandardSchema,
  listVersionsSchema,
  projectWeekdaySchema,
  publishedTimetableSchema,
  saveCardSchema,
  type BulkAddCardsInput,
  type BulkDeleteCardsInput,
  type CommitVersionInput,
  type CreateVersionInput,
  type ImportStandardInput,
  type ListVersionsInput,
  type ProjectWeekdayInput,
  type PublishedTimetableInput,
  type SaveCardInput,
  type ScheduleVersion,
} from "@shared/schema";
import { z, type ZodTypeAny } from "zod";
import type { Database } from "./db";
import { defaultEngineOptions, type EngineOptions } from "./config";
import { ValidationError } from "./errors";
import { CardStore, type AcceptCardResult, type CardSummary, type CardWithLessons, type LessonView, type SaveCardResult } from "./storage/cardStore";
import { DatabaseReferenceData, type ReferenceDataProvider } from "./storage/referenceData";
import { VersionStore, type CommitResult, type PreCommitResult, type SwitchAsPendingResult } from "./storage/versionStore";
import { BulkCardOperator, type BulkAddResult, type BulkDeleteResult } from "./services/bulkCardOperator";
import { StandardImporter, type ImportReport } from "./services/standardImporter";
import { TemplateProjector, type ProjectionResult, type TemplateActuality } from "./services/templateProjector";
import { TimetablePublisher, type PublishedTimetable } from "./services/timetablePublisher";

// Query strings reach the engine unparsed
type QueryInput = Record<string, unknown>;

const userIdSchema = z.string().trim().min(1, "A user id is required");

function parse<T extends ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

/**
 * Command surface of the timetable engine. Every command validates its input,
 * then runs in its own transaction on the shared database handle.
 */
export class TimetableEngine {
  readonly versions: VersionStore;
  readonly cards: CardStore;
  readonly projector: TemplateProjector;
  readonly bulk: BulkCardOperator;
  readonly importer: StandardImporter;
  readonly publisher: TimetablePublisher;

  constructor(
    db: Database,
    options: EngineOptions = defaultEngineOptions,
    referenceData: ReferenceDataProvider = new DatabaseReferenceData(),
  ) {
    this.versions = new VersionStore(db, referenceData);
    this.cards = new CardStore(db, options);
    this.projector = new TemplateProjector(db);
    this.bulk = new BulkCardOperator(db, referenceData);
    this.importer = new StandardImporter(db, referenceData);
    this.publisher = new TimetablePublisher(db);
  }

  // Versions

  async createVersion(input: CreateVersionInput, userId: string): Promise<ScheduleVersion> {
    const { buildingId, date, kind } = parse(createVersionSchema, input);
    return await this.versions.create({
      buildingId,
      scheduleDate: date,
      kind,
      createdBy: parse(userIdSchema, userId),
    });
  }

  async getVersion(versionId: string, buildingId?: number): Promise<ScheduleVersion> {
    return await this.versions.get(
      parse(idSchema, versionId),
      buildingId === undefined ? undefined : parse(buildingIdSchema, buildingId),
    );
  }

  async listVersions(input: ListVersionsInput | QueryInput): Promise<ScheduleVersion[]> {
    return await this.versions.list(parse(listVersionsSchema, input));
  }

  async replaceCandidates(versionId: string): Promise<ScheduleVersion[]> {
    return await this.versions.replaceCandidates(parse(idSchema, versionId));
  }

  async preCommitCheck(versionId: string): Promise<PreCommitResult> {
    return await this.versions.preCommitCheck(parse(idSchema, versionId));
  }

  async commit(input: CommitVersionInput): Promise<CommitResult> {
    const { pendingVersionId, targetVersionId } = parse(commitVersionSchema, input);
    return await this.versions.commit(pendingVersionId, targetVersionId);
  }

  async switchAsPending(versionId: string): Promise<SwitchAsPendingResult> {
    return await this.versions.switchAsPending(parse(idSchema, versionId));
  }

  // Template

  async projectWeekday(input: ProjectWeekdayInput, userId: string): Promise<ProjectionResult> {
    const { buildingId, weekday, versionId } = parse(projectWeekdaySchema, input);
    return await this.projector.projectWeekday(buildingId, weekday, versionId, parse(userIdSchema, userId));
  }

  async checkTemplateActuality(buildingId: number): Promise<TemplateActuality> {
    return await this.projector.checkTemplateActuality(parse(buildingIdSchema, buildingId));
  }

  async importStandard(input: ImportStandardInput, userId: string): Promise<ImportReport> {
    const { buildingId, rows } = parse(importStandardSchema, input);
    return await this.importer.importStandard(buildingId, parse(userIdSchema, userId), rows);
  }

  // Cards

  async saveCard(input: SaveCardInput, userId: string): Promise<SaveCardResult> {
    const { cardId, versionId, lessons } = parse(saveCardSchema, input);
    return await this.cards.saveCard(cardId, versionId, parse(userIdSchema, userId), lessons);
  }

  async acceptCard(cardId: string): Promise<AcceptCardResult> {
    return await this.cards.acceptCard(parse(idSchema, cardId));
  }

  async switchAsEdit(cardId: string): Promise<{ status: "ok"; cardId: string }> {
    return await this.cards.switchAsEdit(parse(idSchema, cardId));
  }

  async bulkAdd(input: BulkAddCardsInput, userId: string): Promise<BulkAddResult> {
    const { versionId, groupNames, lessons } = parse(bulkAddCardsSchema, input);
    return await this.bulk.bulkAdd(versionId, parse(userIdSchema, userId), groupNames, lessons);
  }

  async bulkDelete(input: BulkDeleteCardsInput): Promise<BulkDeleteResult> {
    const { versionId, cardIds } = parse(bulkDeleteCardsSchema, input);
    return await this.bulk.bulkDelete(cardIds, versionId);
  }

  async getCurrentCards(versionId: string): Promise<CardWithLessons[]> {
    return await this.cards.loadCurrentCards(parse(idSchema, versionId));
  }

  async getHistory(versionId: string, groupId: string): Promise<CardSummary[]> {
    const query = parse(historyQuerySchema, { versionId, groupId });
    return await this.cards.history(query.versionId, query.groupId);
  }

  // Published timetable

  async getPublishedTimetable(input: PublishedTimetableInput | QueryInput): Promise<PublishedTimetable> {
    const { buildingId, groupName, dateStart, dateEnd } = parse(publishedTimetableSchema, input);
    return await this.publisher.getPublishedTimetable(buildingId, groupName, dateStart, dateEnd);
  }

  async getContent(cardId: string): Promise<LessonView[]> {
    return await this.cards.content(parse(idSchema, cardId));
  }
}
