/**
 * GET /api/v1/stats - Ozet Istatistikler
 *
 * Toplam kayit, ortalama puan/fiyat, tekrar siparis edilir/edilmez sayilari,
 * restoran ve yemek turu dagilimi. Her istekte yeniden hesaplanir.
 */

import type { FastifyInstance } from "fastify";
import { API_PREFIX } from "@dimsum/shared";
import type { ReviewStore } from "../lib/review-store.js";

export interface StatsRoutesOptions {
  store: ReviewStore;
}

export async function statsRoutes(
  app: FastifyInstance,
  { store }: StatsRoutesOptions
) {
  app.get(`${API_PREFIX}/stats`, async () => store.stats());
}
