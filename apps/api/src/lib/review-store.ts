/**
 * Review Store - dimsum_reviews tablosu uzerindeki tum islemler
 *
 * Her islem tek bir SQL ifadesidir (stats haric: 3 paralel okuma).
 * Bulunamayan kayitlarda NotFoundError, eksik zorunlu alan veya
 * gecersiz tarihte BadRequestError firlatir.
 */

import {
  dimsumReviews,
  type Database,
  type DimsumReview,
  type NewDimsumReview,
} from "@dimsum/db";
import {
  MAX_INT4,
  REVIEW_DEFAULTS,
  escapeLikePattern,
  toCalendarDate,
  type ReviewJson,
  type StatsJson,
} from "@dimsum/shared";
import { desc, eq, ilike, or, sql } from "drizzle-orm";
import { BadRequestError, NotFoundError } from "./errors.js";

// --- Girdi Tipleri ---

export interface CreateInput {
  restaurant_name: string;
  dish_name: string;
  dish_type?: string | null;
  rating?: number | null;
  price?: number | null;
  notes?: string | null;
  /** ISO-8601 tarih; null veya "" tarih yok demektir */
  visit_date?: string | null;
  location?: string | null;
  would_order_again?: boolean;
}

/**
 * Kismi guncelleme: undefined alan "dokunma", diger her deger (null dahil)
 * "bu degeri yaz" anlamina gelir.
 */
export type UpdateInput = Partial<CreateInput>;

type ReviewChanges = Partial<Omit<NewDimsumReview, "id" | "createdAt">>;

export interface ReviewStore {
  list(search?: string): Promise<DimsumReview[]>;
  get(id: number): Promise<DimsumReview>;
  create(input: CreateInput): Promise<DimsumReview>;
  update(id: number, input: UpdateInput): Promise<DimsumReview>;
  delete(id: number): Promise<void>;
  stats(): Promise<StatsJson>;
}

// --- Yardimcilar ---

function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim() === "";
}

function parseVisitDate(value: string | null): string | null {
  if (value === null || value.trim() === "") return null;
  const date = toCalendarDate(value);
  if (date === null) {
    throw new BadRequestError(`Gecersiz tarih: ${value}`);
  }
  return date;
}

function notFound(id: number): NotFoundError {
  return new NotFoundError(`Kayit bulunamadi: ${id}`);
}

/** serial kolonu araligi disindaki id'ler hic var olamaz */
function assertStorableId(id: number): void {
  if (!Number.isInteger(id) || id < 1 || id > MAX_INT4) throw notFound(id);
}

/** Veritabani satirini API JSON yapisina cevirir */
export function toReviewJson(row: DimsumReview): ReviewJson {
  return {
    id: row.id,
    restaurant_name: row.restaurantName,
    dish_name: row.dishName,
    dish_type: row.dishType ?? null,
    rating: row.rating ?? null,
    price: row.price ?? null,
    notes: row.notes ?? null,
    visit_date: row.visitDate ?? null,
    location: row.location ?? null,
    would_order_again: row.wouldOrderAgain,
    created_at: row.createdAt.toISOString(),
  };
}

// --- Store ---

export function createReviewStore(db: Database): ReviewStore {
  async function get(id: number): Promise<DimsumReview> {
    assertStorableId(id);
    const result = await db
      .select()
      .from(dimsumReviews)
      .where(eq(dimsumReviews.id, id))
      .limit(1);

    if (result.length === 0) throw notFound(id);
    return result[0];
  }

  return {
    async list(search) {
      // Bos arama = filtre yok
      const pattern = search ? `%${escapeLikePattern(search)}%` : null;

      return db
        .select()
        .from(dimsumReviews)
        .where(
          pattern === null
            ? undefined
            : or(
                ilike(dimsumReviews.restaurantName, pattern),
                ilike(dimsumReviews.dishName, pattern),
                ilike(dimsumReviews.dishType, pattern)
              )
        )
        .orderBy(desc(dimsumReviews.createdAt), desc(dimsumReviews.id));
    },

    get,

    async create(input) {
      if (isBlank(input.restaurant_name) || isBlank(input.dish_name)) {
        throw new BadRequestError("restaurant_name ve dish_name zorunludur.");
      }

      const values: NewDimsumReview = {
        restaurantName: input.restaurant_name,
        dishName: input.dish_name,
        dishType: input.dish_type ?? null,
        rating: input.rating === undefined ? REVIEW_DEFAULTS.RATING : input.rating,
        price: input.price ?? null,
        notes: input.notes ?? null,
        visitDate:
          input.visit_date === undefined ? null : parseVisitDate(input.visit_date),
        location: input.location ?? null,
        wouldOrderAgain:
          input.would_order_again ?? REVIEW_DEFAULTS.WOULD_ORDER_AGAIN,
      };

      const inserted = await db.insert(dimsumReviews).values(values).returning();
      return inserted[0];
    },

    async update(id, input) {
      assertStorableId(id);
      const changes: ReviewChanges = {};

      if (input.restaurant_name !== undefined) {
        if (isBlank(input.restaurant_name)) {
          throw new BadRequestError("restaurant_name bos olamaz.");
        }
        changes.restaurantName = input.restaurant_name;
      }
      if (input.dish_name !== undefined) {
        if (isBlank(input.dish_name)) {
          throw new BadRequestError("dish_name bos olamaz.");
        }
        changes.dishName = input.dish_name;
      }
      if (input.dish_type !== undefined) changes.dishType = input.dish_type;
      if (input.rating !== undefined) changes.rating = input.rating;
      if (input.price !== undefined) changes.price = input.price;
      if (input.notes !== undefined) changes.notes = input.notes;
      if (input.visit_date !== undefined) {
        changes.visitDate = parseVisitDate(input.visit_date);
      }
      if (input.location !== undefined) changes.location = input.location;
      if (input.would_order_again !== undefined) {
        changes.wouldOrderAgain = input.would_order_again;
      }

      // Degisiklik yoksa UPDATE calistirma, mevcut kaydi dondur
      if (Object.keys(changes).length === 0) return get(id);

      const updated = await db
        .update(dimsumReviews)
        .set(changes)
        .where(eq(dimsumReviews.id, id))
        .returning();

      if (updated.length === 0) throw notFound(id);
      return updated[0];
    },

    async delete(id) {
      assertStorableId(id);
      const deleted = await db
        .delete(dimsumReviews)
        .where(eq(dimsumReviews.id, id))
        .returning({ id: dimsumReviews.id });

      if (deleted.length === 0) throw notFound(id);
    },

    async stats() {
      const [totals, restaurantRows, dishTypeRows] = await Promise.all([
        // 1. Toplamlar ve ortalamalar
        db
          .select({
            totalItems: sql<number>`count(*)::int`,
            // numeric uzerinden: buyuk fiyatlarda toplam tasmaz, yuvarlama SQL'de
            averageRating: sql<number | null>`round(avg(${dimsumReviews.rating}::numeric), 2)::float8`,
            averagePrice: sql<number | null>`round(avg(${dimsumReviews.price}::numeric), 2)::float8`,
            winners: sql<number>`(count(*) FILTER (WHERE ${dimsumReviews.wouldOrderAgain} = true))::int`,
            losers: sql<number>`(count(*) FILTER (WHERE ${dimsumReviews.wouldOrderAgain} = false))::int`,
          })
          .from(dimsumReviews),

        // 2. Restoran bazinda sayilar
        db
          .select({
            name: dimsumReviews.restaurantName,
            count: sql<number>`count(*)::int`,
          })
          .from(dimsumReviews)
          .groupBy(dimsumReviews.restaurantName)
          .orderBy(desc(sql`count(*)`), dimsumReviews.restaurantName),

        // 3. Yemek turu bazinda sayilar
        db
          .select({
            type: dimsumReviews.dishType,
            count: sql<number>`count(*)::int`,
          })
          .from(dimsumReviews)
          .groupBy(dimsumReviews.dishType)
          .orderBy(desc(sql`count(*)`), dimsumReviews.dishType),
      ]);

      const summary = totals[0];

      return {
        total_items: summary?.totalItems ?? 0,
        average_rating: Number(summary?.averageRating ?? 0),
        average_price: Number(summary?.averagePrice ?? 0),
        winners: summary?.winners ?? 0,
        losers: summary?.losers ?? 0,
        // Bos veya null anahtarlar listelenmez, total_items'a yine dahildir
        restaurants: restaurantRows.flatMap((r) =>
          r.name ? [{ name: r.name, count: r.count }] : []
        ),
        dish_types: dishTypeRows.flatMap((d) =>
          d.type ? [{ type: d.type, count: d.count }] : []
        ),
      };
    },
  };
}
