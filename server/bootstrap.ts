import { applySchema, type Database } from "./db";
import { createLogger } from "./logger";

const log = createLogger("bootstrap");

/**
 * Brings the schema up to date before the server starts taking requests.
 * Safe to run on every start: all DDL is idempotent.
 */
export async function prepareDatabase(db: Database) {
  try {
    await applySchema(db);
    log.info("Database schema is up to date");
  } catch (error) {
    log.error("Failed to apply database schema:", error);
    throw error;
  }
}
