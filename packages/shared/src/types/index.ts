/**
 * Dim Sum Journal Ortak Tip Tanimlari
 * API ve istemciler tarafindan kullanilan JSON (wire) tipleri
 */

/** Bir yemek degerlendirmesinin JSON gosterimi */
export interface ReviewJson {
  id: number;
  restaurant_name: string;
  dish_name: string;
  dish_type: string | null;
  rating: number | null;
  price: number | null;
  notes: string | null;
  /** "YYYY-MM-DD" veya null */
  visit_date: string | null;
  location: string | null;
  would_order_again: boolean;
  /** ISO-8601 zaman damgasi */
  created_at: string;
}

/** Restoran bazinda kayit sayisi */
export interface RestaurantCount {
  name: string;
  count: number;
}

/** Yemek turu bazinda kayit sayisi */
export interface DishTypeCount {
  type: string;
  count: number;
}

/** GET /stats yaniti */
export interface StatsJson {
  total_items: number;
  average_rating: number;
  average_price: number;
  /** Tekrar siparis edilir (would_order_again = true) */
  winners: number;
  /** Tekrar siparis edilmez (would_order_again = false) */
  losers: number;
  restaurants: RestaurantCount[];
  dish_types: DishTypeCount[];
}

/** API hata yaniti */
export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
}
