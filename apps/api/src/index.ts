import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import {
  serializerCompiler,
  validatorCompiler,
} from "fastify-type-provider-zod";
import { createDatabase, ensureSchema, type Database } from "@dimsum/db";
import { API_PREFIX } from "@dimsum/shared";

import { loadConfig, type AppConfig } from "./config.js";
import { registerErrorHandlers } from "./lib/errors.js";
import { createReviewStore } from "./lib/review-store.js";
import { itemRoutes } from "./routes/items.js";
import { statsRoutes } from "./routes/stats.js";

export interface BuildAppOptions {
  /** Acik veritabani baglantisi; kapatma sorumlulugu cagirandadir */
  db: Database;
  config?: AppConfig;
}

export async function buildApp({ db, config = loadConfig() }: BuildAppOptions) {
  const isProduction = config.NODE_ENV === "production";
  const isTest = config.NODE_ENV === "test";

  const app = Fastify({
    logger: isTest
      ? false
      : {
          level: config.LOG_LEVEL ?? (isProduction ? "info" : "debug"),
          transport: !isProduction ? { target: "pino-pretty" } : undefined,
        },
  });

  // Zod entegrasyonu
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  registerErrorHandlers(app);

  // Eklentiler - tum origin'lere izin verilir
  await app.register(cors, { origin: "*" });

  await app.register(helmet, {
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  // Saglik kontrolu
  app.get("/health", async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  // API v1 root
  app.get(API_PREFIX, async () => {
    return {
      name: "Dim Sum Journal API",
      version: "0.1.0",
    };
  });

  // Route'lar
  const store = createReviewStore(db);
  await app.register(itemRoutes, { store });
  await app.register(statsRoutes, { store });

  return app;
}

async function start() {
  const config = loadConfig();
  if (!config.DATABASE_URL) {
    throw new Error("DATABASE_URL ortam degiskeni tanimlanmamis!");
  }

  const connection = createDatabase(config.DATABASE_URL);
  await ensureSchema(connection.db);

  const app = await buildApp({ db: connection.db, config });
  app.addHook("onClose", async () => {
    await connection.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info(`${signal} alindi, sunucu kapatiliyor...`);
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, "Sunucu kapatilamadi");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: config.API_PORT, host: config.API_HOST });
}

// Test ortaminda otomatik baslatmayi engelle
if (process.env.NODE_ENV !== "test") {
  start().catch((error: unknown) => {
    console.error("Sunucu baslatilamadi:", error);
    process.exit(1);
  });
}
