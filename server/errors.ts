import type { ZodError } from "zod";

export type TimetableErrorCode =
  | "NOT_FOUND"
  | "VALIDATION"
  | "TEACHER_DOUBLE_BOOKED"
  | "DUPLICATE_ACCEPTED"
  | "STALE_CARD"
  | "VERSION_IMMUTABLE"
  | "INSUFFICIENT_LESSONS"
  | "MISSING_GROUPS"
  | "EXISTING_ACTIVE_VERSION"
  | "UNKNOWN_GROUPS";

export abstract class TimetableError extends Error {
  abstract readonly code: TimetableErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends TimetableError {
  readonly code = "NOT_FOUND";

  constructor(readonly entity: string, readonly id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class ValidationError extends TimetableError {
  readonly code = "VALIDATION";

  constructor(message: string, readonly issues: string[] = [message]) {
    super(message);
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return new ValidationError("Invalid input", issues);
  }
}

export interface ConflictPair {
  weekday: number;
  position: number;
  teacherId: string;
}

export interface ConflictReport {
  pairs: ConflictPair[];
}

/**
 * Thrown inside a write transaction to roll it back when lessons would
 * double-book a teacher. Stores catch it at the transaction boundary and
 * turn it into a conflict result.
 */
export class TeacherDoubleBookedError extends TimetableError {
  readonly code = "TEACHER_DOUBLE_BOOKED";

  constructor(readonly pairs: ConflictPair[]) {
    super("Teacher already has a group at this position");
  }

  get report(): ConflictReport {
    return { pairs: this.pairs };
  }
}

// Rejections returned to callers as values
export interface VersionImmutable {
  status: "forbidden";
  code: "VERSION_IMMUTABLE";
  message: string;
}

export function versionImmutable(message = "Schedule version is already committed, changes are forbidden"): VersionImmutable {
  return { status: "forbidden", code: "VERSION_IMMUTABLE", message };
}

export interface DoubleBooked {
  status: "conflict";
  code: "TEACHER_DOUBLE_BOOKED";
  message: string;
  report: ConflictReport;
}

export function doubleBooked(error: TeacherDoubleBookedError): DoubleBooked {
  return { status: "conflict", code: error.code, message: error.message, report: error.report };
}

// Postgres error plumbing
interface PostgresErrorFields {
  code: string;
  constraint?: string;
  detail?: string;
}

export const UNIQUE_VIOLATION = "23505";

function isPostgresError(error: unknown): error is Error & PostgresErrorFields {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function isUniqueViolation(error: unknown, constraint: string): error is Error & PostgresErrorFields {
  return isPostgresError(error) && error.code === UNIQUE_VIOLATION && error.constraint === constraint;
}

/**
 * Recovers the offending key from a unique violation detail such as
 * `Key ("position", teacher_id, schedule_version_id, weekday)=(1, 3f2..., 9ab..., 4) already exists.`
 */
export function parseUniqueViolationKey(detail: string | undefined): Record<string, string> | null {
  const match = detail?.match(/^Key \((.+)\)=\((.+)\) already exists\.?$/);
  if (!match) return null;

  const columns = match[1].split(",").map((column) => column.trim().replace(/^"|"$/g, ""));
  const values = match[2].split(",").map((value) => value.trim());
  if (columns.length !== values.length) return null;

  const key: Record<string, string> = {};
  columns.forEach((column, index) => {
    key[column] = values[index];
  });
  return key;
}
