import { Database } from "@repo-momentum/db-client";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import * as schema from "./schema";

export type TrendsSchema = typeof schema;
export type TrendsDatabase = Database<TrendsSchema>;
export type TrendsDb = BetterSQLite3Database<TrendsSchema>;

export const SCHEMA_PATH = path.resolve(__dirname, "../sql/schema.sql");

/**
 * Opens (or creates) the trends database and applies the layered schema.
 * Pass ":memory:" for an isolated database.
 */
export function openDatabase(dbPath?: string): TrendsDatabase {
  const database = new Database({ schema, path: dbPath });
  database.exec(fs.readFileSync(SCHEMA_PATH, "utf8"));
  return database;
}
