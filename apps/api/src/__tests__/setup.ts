/**
 * Vitest Global Setup
 *
 * Testler gercek PostgreSQL sunucusuna baglanmaz; her test dosyasi
 * surec icinde calisan bir PGlite ornegi uzerinde Drizzle kullanir.
 */

import { vi } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { sql } from "drizzle-orm";
import { ensureSchema, schema, type Database } from "@dimsum/db";
import type { AppConfig } from "../config.js";

// dotenv mock - test ortaminda .env dosyasi gerekmesin
vi.mock("dotenv/config", () => ({}));

export interface TestDatabase {
  db: Database;
  close: () => Promise<void>;
}

/** Bellekte bos bir veritabani acar ve dimsum_reviews tablosunu olusturur */
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await ensureSchema(db);

  return {
    db,
    close: async () => {
      await client.close();
    },
  };
}

/** Tabloyu bosaltir, id sayacini 1'e sifirlar */
export async function resetReviews(db: Database): Promise<void> {
  await db.execute(sql`TRUNCATE dimsum_reviews RESTART IDENTITY`);
}

export const testConfig: AppConfig = {
  NODE_ENV: "test",
  API_PORT: 0,
  API_HOST: "127.0.0.1",
};
