/**
 * Dim Sum Journal Veritabani Semasi - Drizzle ORM
 *
 * Tek tablo: dimsum_reviews
 *
 * Tablo olusturma ensureSchema() icindeki ham SQL ile yapilir,
 * buradaki tanim sorgu olusturma ve tip cikarimi icin kullanilir.
 */

import {
  boolean,
  date,
  doublePrecision,
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

// ============================================================================
// TABLO: dimsum_reviews - Yemek Degerlendirmeleri
// ============================================================================

export const dimsumReviews = pgTable(
  "dimsum_reviews",
  {
    id: serial("id").primaryKey(),
    restaurantName: varchar("restaurant_name", { length: 200 }).notNull(),
    dishName: varchar("dish_name", { length: 200 }).notNull(),
    dishType: varchar("dish_type", { length: 100 }),
    rating: integer("rating").default(0),
    price: doublePrecision("price"),
    notes: text("notes"),
    // "YYYY-MM-DD" string olarak okunur/yazilir
    visitDate: date("visit_date", { mode: "string" }),
    location: varchar("location", { length: 200 }),
    wouldOrderAgain: boolean("would_order_again").default(true).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index("idx_dimsum_reviews_created_at").on(table.createdAt)]
);

// ============================================================================
// TIP CIKARIMLARI
// ============================================================================

export type DimsumReview = typeof dimsumReviews.$inferSelect;
export type NewDimsumReview = typeof dimsumReviews.$inferInsert;
