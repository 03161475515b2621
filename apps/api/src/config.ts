/**
 * Ortam Degiskenleri Yapilandirmasi
 *
 * .env dosyasi dotenv ile yuklenir, degerler Zod ile dogrulanir.
 */

import "dotenv/config";
import { z } from "zod/v4";
import { DEFAULT_API_PORT } from "@dimsum/shared";

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_API_PORT),
  API_HOST: z.string().min(1).default("0.0.0.0"),
  // Sunucuyu baslatmak icin zorunlu; buildApp() icin gerekmez
  DATABASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(
      `Gecersiz ortam degiskenleri:\n${z.prettifyError(result.error)}`
    );
  }
  return result.data;
}
