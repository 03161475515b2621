/**
 * Dim Sum Journal Ortak Sabitler
 */

/** API versiyonu */
export const API_VERSION = "v1";

/** Tum kayit endpoint'lerinin ortak on eki */
export const API_PREFIX = `/api/${API_VERSION}`;

/** Varsayilan sunucu portu */
export const DEFAULT_API_PORT = 8000;

/** Yeni kayitlarda varsayilan degerler */
export const REVIEW_DEFAULTS = {
  RATING: 0,
  WOULD_ORDER_AGAIN: true,
} as const;

/** Kolon uzunluk sinirlari (dimsum_reviews tablosu ile ayni) */
export const FIELD_LIMITS = {
  RESTAURANT_NAME: 200,
  DISH_NAME: 200,
  DISH_TYPE: 100,
  LOCATION: 200,
} as const;

/** PostgreSQL INTEGER sinirlari (id ve rating kolonlari) */
export const MAX_INT4 = 2_147_483_647;
export const MIN_INT4 = -2_147_483_648;
