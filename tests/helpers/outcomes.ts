import { expect } from "vitest";

type Outcome = { status: string };

function hasStatus<T extends Outcome, S extends T["status"]>(outcome: T, status: S): outcome is Extract<T, { status: S }> {
  return outcome.status === status;
}

/**
 * Asserts the outcome status and narrows to that branch of the result union.
 */
export function expectOutcome<T extends Outcome, S extends T["status"]>(outcome: T, status: S): Extract<T, { status: S }> {
  expect(outcome.status).toBe(status);
  if (!hasStatus(outcome, status)) {
    throw new Error(`Expected ${status}, got ${outcome.status}`);
  }
  return outcome;
}
