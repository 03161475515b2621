/**
 * GET /api/v1/stats - Istatistik Endpoint Entegrasyon Testleri
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../index.js";
import {
  createTestDatabase,
  resetReviews,
  testConfig,
  type TestDatabase,
} from "./setup.js";

let testDb: TestDatabase;
let app: FastifyInstance;

beforeAll(async () => {
  testDb = await createTestDatabase();
  app = await buildApp({ db: testDb.db, config: testConfig });
  await app.ready();
});

afterAll(async () => {
  await app.close();
  await testDb.close();
});

beforeEach(async () => {
  await resetReviews(testDb.db);
});

describe("GET /api/v1/stats", () => {
  it("kayit yokken sifir degerler doner", async () => {
    const res = await app.inject({ method: "GET", url: "/api/v1/stats" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      total_items: 0,
      average_rating: 0,
      average_price: 0,
      winners: 0,
      losers: 0,
      restaurants: [],
      dish_types: [],
    });
  });

  it("uc kayit uzerinden ozet istatistikleri doner", async () => {
    const payloads = [
      { restaurant_name: "Golden Dragon", dish_name: "Har Gow", rating: 3, dish_type: "dumpling" },
      { restaurant_name: "Jade Palace", dish_name: "Siu Mai", rating: 4, dish_type: "dumpling" },
      {
        restaurant_name: "Golden Dragon",
        dish_name: "Lo Mai Gai",
        rating: 5,
        price: 8,
        would_order_again: false,
      },
    ];
    for (const payload of payloads) {
      await app.inject({ method: "POST", url: "/api/v1/items", payload });
    }

    const res = await app.inject({ method: "GET", url: "/api/v1/stats" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toEqual({
      total_items: 3,
      average_rating: 4,
      average_price: 8,
      winners: 2,
      losers: 1,
      restaurants: [
        { name: "Golden Dragon", count: 2 },
        { name: "Jade Palace", count: 1 },
      ],
      dish_types: [{ type: "dumpling", count: 2 }],
    });

    const restaurantTotal = body.restaurants.reduce(
      (sum: number, r: { count: number }) => sum + r.count,
      0
    );
    expect(restaurantTotal).toBe(3);
  });
});

describe("GET /api/v1/stats - buyuk degerler", () => {
  it("cok buyuk fiyatlarda average_price sayi olarak kalir", async () => {
    for (const dish_name of ["Abalone", "Bird's Nest"]) {
      await app.inject({
        method: "POST",
        url: "/api/v1/items",
        payload: { restaurant_name: "Golden Dragon", dish_name, price: 1e308 },
      });
    }

    const res = await app.inject({ method: "GET", url: "/api/v1/stats" });

    expect(res.statusCode).toBe(200);
    expect(res.json().average_price).toBe(1e308);
  });
});

describe("GET /health", () => {
  it("status ok doner", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("ok");
  });
});
