/**
 * /api/v1/items - Yemek Degerlendirmeleri CRUD
 *
 *   GET    /api/v1/items?search=   -> Liste (created_at DESC), opsiyonel arama
 *   GET    /api/v1/items/:id       -> Tek kayit
 *   POST   /api/v1/items           -> Olustur (201)
 *   PUT    /api/v1/items/:id       -> Kismi guncelle
 *   DELETE /api/v1/items/:id       -> Sil (204)
 */

import type { FastifyInstance } from "fastify";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import {
  API_PREFIX,
  FIELD_LIMITS,
  MAX_INT4,
  MIN_INT4,
  toCalendarDate,
} from "@dimsum/shared";
import { z } from "zod/v4";
import { NotFoundError } from "../lib/errors.js";
import { toReviewJson, type ReviewStore } from "../lib/review-store.js";

// --- Zod Schemas ---

const requiredText = (max: number) =>
  z
    .string()
    .max(max)
    .refine((value) => value.trim().length > 0, "Bos birakilamaz.");

const optionalText = (max?: number) =>
  (max === undefined ? z.string() : z.string().max(max)).nullable().optional();

const VisitDateSchema = z
  .string()
  .nullable()
  .optional()
  .refine(
    (value) => value == null || value.trim() === "" || toCalendarDate(value) !== null,
    "Gecersiz tarih bicimi (YYYY-MM-DD bekleniyor)."
  );

const CreateReviewBodySchema = z.object({
  restaurant_name: requiredText(FIELD_LIMITS.RESTAURANT_NAME),
  dish_name: requiredText(FIELD_LIMITS.DISH_NAME),
  dish_type: optionalText(FIELD_LIMITS.DISH_TYPE),
  rating: z.number().int().min(MIN_INT4).max(MAX_INT4).nullable().optional(),
  price: z.number().nullable().optional(),
  notes: optionalText(),
  visit_date: VisitDateSchema,
  location: optionalText(FIELD_LIMITS.LOCATION),
  would_order_again: z.boolean().optional(),
});

// id ve created_at gibi taninmayan alanlar atilir
const UpdateReviewBodySchema = CreateReviewBodySchema.partial();

// Sayi olmayan id'ler 400 degil 404 doner; aralik kontrolu store'da
const ReviewIdParamsSchema = z.object({
  id: z.string(),
});

function toReviewId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new NotFoundError(`Kayit bulunamadi: ${raw}`);
  }
  return Number(raw);
}

const ListQuerySchema = z.object({
  search: z.string().optional(),
});

// --- Route ---

export interface ItemRoutesOptions {
  store: ReviewStore;
}

export async function itemRoutes(
  app: FastifyInstance,
  { store }: ItemRoutesOptions
) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.get(
    `${API_PREFIX}/items`,
    { schema: { querystring: ListQuerySchema } },
    async (request) => {
      const rows = await store.list(request.query.search);
      return rows.map(toReviewJson);
    }
  );

  server.get(
    `${API_PREFIX}/items/:id`,
    { schema: { params: ReviewIdParamsSchema } },
    async (request) => {
      const row = await store.get(toReviewId(request.params.id));
      return toReviewJson(row);
    }
  );

  server.post(
    `${API_PREFIX}/items`,
    { schema: { body: CreateReviewBodySchema } },
    async (request, reply) => {
      const row = await store.create(request.body);
      return reply.status(201).send(toReviewJson(row));
    }
  );

  server.put(
    `${API_PREFIX}/items/:id`,
    {
      schema: {
        params: ReviewIdParamsSchema,
        body: UpdateReviewBodySchema,
      },
    },
    async (request) => {
      const row = await store.update(
        toReviewId(request.params.id),
        request.body
      );
      return toReviewJson(row);
    }
  );

  server.delete(
    `${API_PREFIX}/items/:id`,
    { schema: { params: ReviewIdParamsSchema } },
    async (request, reply) => {
      await store.delete(toReviewId(request.params.id));
      return reply.status(204).send();
    }
  );
}
