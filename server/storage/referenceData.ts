import { groups, teachers, disciplines } from "@shared/schema";
import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db";

export interface GroupRef {
  id: string;
  name: string;
}

export interface TeacherRef {
  id: string;
  fio: string;
}

export interface DisciplineRef {
  id: string;
  title: string;
}

/**
 * Source of the active groups, teachers and disciplines. Lookups run on the
 * caller's handle so a transaction sees the same membership it later writes
 * against.
 */
export interface ReferenceDataProvider {
  activeGroups(executor: Database, buildingId: number): Promise<GroupRef[]>;
  activeTeachers(executor: Database): Promise<TeacherRef[]>;
  activeDisciplines(executor: Database): Promise<DisciplineRef[]>;
}

export class DatabaseReferenceData implements ReferenceDataProvider {
  async activeGroups(executor: Database, buildingId: number): Promise<GroupRef[]> {
    return await executor
      .select({ id: groups.id, name: groups.name })
      .from(groups)
      .where(and(eq(groups.buildingId, buildingId), eq(groups.isActive, true)))
      .orderBy(asc(groups.name));
  }

  async activeTeachers(executor: Database): Promise<TeacherRef[]> {
    return await executor
      .select({ id: teachers.id, fio: teachers.fio })
      .from(teachers)
      .where(eq(teachers.isActive, true))
      .orderBy(asc(teachers.fio));
  }

  async activeDisciplines(executor: Database): Promise<DisciplineRef[]> {
    return await executor
      .select({ id: disciplines.id, title: disciplines.title })
      .from(disciplines)
      .where(eq(disciplines.isActive, true))
      .orderBy(asc(disciplines.title));
  }
}
