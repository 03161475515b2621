/**
 * Dim Sum Journal Veritabani Paketi
 *
 * Drizzle ORM ile PostgreSQL baglantisi ve sema tanimlari.
 * Modul seviyesinde baglanti acilmaz; baglantiyi uygulama baslatilirken
 * createDatabase() ile acip isteyen katmana enjekte edin.
 *
 * Kullanim:
 *   import { createDatabase, ensureSchema, dimsumReviews } from "@dimsum/db";
 *
 *   const { db, close } = createDatabase(process.env.DATABASE_URL);
 *   await ensureSchema(db);
 *   const rows = await db.select().from(dimsumReviews);
 *   await close();
 */

import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";

import * as schema from "./schema.js";

/**
 * Surucuden bagimsiz Drizzle veritabani tipi.
 * Uretimde postgres-js, testlerde PGlite ayni tip uzerinden kullanilir.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  db: Database;
  /** Baglanti havuzunu kapatir (graceful shutdown icin) */
  close: () => Promise<void>;
}

export interface ConnectionOptions {
  /** Maksimum baglanti sayisi */
  max?: number;
}

export function createDatabase(
  databaseUrl: string,
  options: ConnectionOptions = {}
): DatabaseConnection {
  const client = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 20, // Bosta bekleme suresi (saniye)
    connect_timeout: 10, // Baglanti zaman asimi (saniye)
  });

  return {
    db: drizzle(client, { schema }),
    close: async () => {
      await client.end();
    },
  };
}

/**
 * dimsum_reviews tablosunu yoksa olusturur.
 * Uygulama her acilista cagirir; mevcut tabloya dokunmaz.
 */
export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS dimsum_reviews (
      id SERIAL PRIMARY KEY,
      restaurant_name VARCHAR(200) NOT NULL,
      dish_name VARCHAR(200) NOT NULL,
      dish_type VARCHAR(100),
      rating INTEGER DEFAULT 0,
      price DOUBLE PRECISION,
      notes TEXT,
      visit_date DATE,
      location VARCHAR(200),
      would_order_again BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS idx_dimsum_reviews_created_at
      ON dimsum_reviews (created_at)
  `);
}

// Tum sema export'lari (drizzle(client, { schema }) icin ad alani olarak da)
export { schema };
export * from "./schema.js";
