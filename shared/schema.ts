import { sql, relations } from "drizzle-orm";
import {
  pgTable,
  varchar,
  integer,
  timestamp,
  boolean,
  uuid,
  index,
  uniqueIndex,
  date,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { isScheduleDate, scheduleDatesBetween } from "./utils/dateUtils";

export const versionKinds = ["standard", "replacement"] as const;
export const versionStatuses = ["pending", "accepted"] as const;
export const cardStatuses = ["draft", "edited", "accepted"] as const;

export type VersionKind = (typeof versionKinds)[number];
export type VersionStatus = (typeof versionStatuses)[number];
export type CardStatus = (typeof cardStatuses)[number];

// Reference data. The engine reads these; maintaining them is someone else's job.
export const groups = pgTable("groups", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  buildingId: integer("building_id").notNull(),
  name: varchar("name", { length: 100 }).notNull().unique(),
  isActive: boolean("is_active").notNull().default(true),
});

export const teachers = pgTable("teachers", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  fio: varchar("fio", { length: 255 }).notNull().unique(),
  isActive: boolean("is_active").notNull().default(true),
});

export const disciplines = pgTable("disciplines", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  title: varchar("title", { length: 255 }).notNull().unique(),
  isActive: boolean("is_active").notNull().default(true),
});

// Schedule versions: the recurring standard template (no date) or a one-day replacement
export const scheduleVersions = pgTable("schedule_versions", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  buildingId: integer("building_id").notNull(),
  scheduleDate: date("schedule_date"),
  kind: varchar("kind", { enum: versionKinds }).notNull(),
  status: varchar("status", { enum: versionStatuses }).notNull().default("pending"),
  isCommitted: boolean("is_committed").notNull().default(false),
  createdBy: varchar("created_by").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  lastModifiedAt: timestamp("last_modified_at").notNull().defaultNow(),
}, (table) => ({
  // Only one committed version per building and kind
  activeIdx: uniqueIndex("schedule_versions_active_uq")
    .on(table.buildingId, table.kind)
    .where(sql`is_committed = true`),
  buildingIdx: index("schedule_versions_building_idx").on(table.buildingId, table.scheduleDate),
}));

// Cards: append-only history of a group's lessons inside a version
export const cards = pgTable("cards", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  scheduleVersionId: uuid("schedule_version_id").notNull().references(() => scheduleVersions.id, { onDelete: "cascade" }),
  groupId: uuid("group_id").notNull().references(() => groups.id),
  status: varchar("status", { enum: cardStatuses }).notNull().default("draft"),
  isCurrent: boolean("is_current").notNull().default(true),
  createdBy: varchar("created_by").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => ({
  currentIdx: uniqueIndex("cards_current_uq")
    .on(table.scheduleVersionId, table.groupId)
    .where(sql`is_current = true`),
  acceptedIdx: uniqueIndex("cards_accepted_uq")
    .on(table.scheduleVersionId, table.groupId)
    .where(sql`status = 'accepted'`),
}));

// Lesson entries. schedule_version_id and is_current are copies of the owning card's
// values so the slot index can see every current lesson of the version at once.
export const lessonEntries = pgTable("lesson_entries", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  cardId: uuid("card_id").notNull().references(() => cards.id, { onDelete: "cascade" }),
  scheduleVersionId: uuid("schedule_version_id").notNull().references(() => scheduleVersions.id, { onDelete: "cascade" }),
  weekday: integer("weekday").notNull(), // 1 = Monday ... 7 = Sunday
  position: integer("position").notNull(),
  disciplineId: uuid("discipline_id").notNull().references(() => disciplines.id),
  teacherId: uuid("teacher_id").notNull().references(() => teachers.id),
  room: varchar("room", { length: 100 }).notNull().default(""),
  isForce: boolean("is_force").notNull().default(false),
  isCurrent: boolean("is_current").notNull().default(true),
}, (table) => ({
  slotIdx: uniqueIndex("lesson_entries_slot_uq")
    .on(table.position, table.teacherId, table.scheduleVersionId, table.weekday)
    .where(sql`is_force = false AND is_current = true`),
  cardIdx: index("lesson_entries_card_idx").on(table.cardId),
}));

// Relations
export const groupsRelations = relations(groups, ({ many }) => ({
  cards: many(cards),
}));

export const scheduleVersionsRelations = relations(scheduleVersions, ({ many }) => ({
  cards: many(cards),
  lessonEntries: many(lessonEntries),
}));

export const cardsRelations = relations(cards, ({ one, many }) => ({
  version: one(scheduleVersions, {
    fields: [cards.scheduleVersionId],
    references: [scheduleVersions.id],
  }),
  group: one(groups, {
    fields: [cards.groupId],
    references: [groups.id],
  }),
  lessons: many(lessonEntries),
}));

export const lessonEntriesRelations = relations(lessonEntries, ({ one }) => ({
  card: one(cards, {
    fields: [lessonEntries.cardId],
    references: [cards.id],
  }),
  version: one(scheduleVersions, {
    fields: [lessonEntries.scheduleVersionId],
    references: [scheduleVersions.id],
  }),
  discipline: one(disciplines, {
    fields: [lessonEntries.disciplineId],
    references: [disciplines.id],
  }),
  teacher: one(teachers, {
    fields: [lessonEntries.teacherId],
    references: [teachers.id],
  }),
}));

// Insert schemas
export const insertScheduleVersionSchema = createInsertSchema(scheduleVersions).omit({
  id: true,
  createdAt: true,
  lastModifiedAt: true,
});

export const insertCardSchema = createInsertSchema(cards).omit({
  id: true,
  createdAt: true,
});

export const insertLessonEntrySchema = createInsertSchema(lessonEntries).omit({
  id: true,
});

// Command payloads
export const scheduleDateSchema = z.string().refine(isScheduleDate, "Expected a calendar date as YYYY-MM-DD");
export const idSchema = z.string().uuid();
export const buildingIdSchema = z.coerce.number().int().positive();
const weekday = z.coerce.number().int().min(1).max(7);

export const lessonInputSchema = z.object({
  position: z.number().int().min(1).max(12),
  disciplineId: idSchema,
  teacherId: idSchema,
  room: z.string().trim().max(100).default(""),
  isForce: z.boolean().default(false),
  // Required for standard versions; replacement versions take it from the schedule date
  weekday: weekday.optional(),
});

export const createVersionSchema = z.object({
  buildingId: buildingIdSchema,
  date: scheduleDateSchema.nullable().default(null),
  kind: z.enum(versionKinds),
}).refine(
  (data) => (data.kind === "standard") === (data.date === null),
  "Standard versions have no date; replacement versions require one",
);

export const commitVersionSchema = z.object({
  pendingVersionId: idSchema,
  targetVersionId: idSchema.nullable().default(null),
});

export const listVersionsSchema = z.object({
  buildingId: buildingIdSchema,
  status: z.enum(versionStatuses).optional(),
  kind: z.enum(versionKinds).optional(),
  isCommitted: z.preprocess(
    (value) => (value === "true" ? true : value === "false" ? false : value),
    z.boolean().optional(),
  ),
  scheduleDate: scheduleDateSchema.optional(),
  dateSort: z.enum(["asc", "desc"]).default("desc"),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const projectWeekdaySchema = z.object({
  buildingId: buildingIdSchema,
  weekday,
  versionId: idSchema,
});

export const saveCardSchema = z.object({
  cardId: idSchema,
  versionId: idSchema,
  lessons: z.array(lessonInputSchema),
});

export const bulkAddCardsSchema = z.object({
  versionId: idSchema,
  groupNames: z.array(z.string().trim().min(1)).min(1, "At least one group name is required"),
  lessons: z.array(lessonInputSchema).default([]),
});

export const bulkDeleteCardsSchema = z.object({
  versionId: idSchema,
  cardIds: z.array(idSchema).min(1, "At least one card id is required"),
});

export const standardRowSchema = z.object({
  groupName: z.string().trim().min(1),
  weekday,
  position: z.number().int().min(1).max(12),
  disciplineTitle: z.string().trim().min(1),
  teacherFio: z.string().trim().min(1),
  room: z.string().trim().max(100).default(""),
});

export const importStandardSchema = z.object({
  buildingId: buildingIdSchema,
  rows: z.array(standardRowSchema).min(1, "Nothing to import"),
});

export const MAX_PUBLISHED_DAYS = 31;

export const publishedTimetableSchema = z.object({
  buildingId: buildingIdSchema,
  groupName: z.string().trim().min(1),
  dateStart: scheduleDateSchema,
  dateEnd: scheduleDateSchema.optional(),
}).refine(
  (query) => query.dateEnd === undefined || query.dateEnd >= query.dateStart,
  { message: "dateEnd must not be before dateStart", path: ["dateEnd"] },
).refine(
  (query) => query.dateEnd === undefined || scheduleDatesBetween(query.dateStart, query.dateEnd).length <= MAX_PUBLISHED_DAYS,
  { message: `At most ${MAX_PUBLISHED_DAYS} days can be requested at once`, path: ["dateEnd"] },
);

export const historyQuerySchema = z.object({
  versionId: idSchema,
  groupId: idSchema,
});

// Types
export type Group = typeof groups.$inferSelect;
export type Teacher = typeof teachers.$inferSelect;
export type Discipline = typeof disciplines.$inferSelect;

export type ScheduleVersion = typeof scheduleVersions.$inferSelect;
export type InsertScheduleVersion = z.infer<typeof insertScheduleVersionSchema>;

export type Card = typeof cards.$inferSelect;
export type InsertCard = z.infer<typeof insertCardSchema>;

export type LessonEntry = typeof lessonEntries.$inferSelect;
export type InsertLessonEntry = z.infer<typeof insertLessonEntrySchema>;

export type LessonInput = z.input<typeof lessonInputSchema>;
export type ParsedLesson = z.infer<typeof lessonInputSchema>;
export type CreateVersionInput = z.input<typeof createVersionSchema>;
export type CommitVersionInput = z.input<typeof commitVersionSchema>;
export type ListVersionsInput = z.input<typeof listVersionsSchema>;
export type ListVersionsFilter = z.infer<typeof listVersionsSchema>;
export type ProjectWeekdayInput = z.input<typeof projectWeekdaySchema>;
export type SaveCardInput = z.input<typeof saveCardSchema>;
export type BulkAddCardsInput = z.input<typeof bulkAddCardsSchema>;
export type BulkDeleteCardsInput = z.input<typeof bulkDeleteCardsSchema>;
export type StandardRow = z.infer<typeof standardRowSchema>;
export type StandardRowInput = z.input<typeof standardRowSchema>;
export type PublishedTimetableInput = z.input<typeof publishedTimetableSchema>;
export type ImportStandardInput = z.input<typeof importStandardSchema>;
