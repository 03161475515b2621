/**
 * Uygulama Hata Siniflari ve Fastify Hata Yakalayicisi
 *
 * Tum hata yanitlari ayni yapidadir: { statusCode, error, message, details? }
 */

import { STATUS_CODES } from "node:http";
import type { FastifyError, FastifyInstance } from "fastify";
import { hasZodFastifySchemaValidationErrors } from "fastify-type-provider-zod";
import type { ApiError } from "@dimsum/shared";

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly error: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toResponse(): ApiError {
    return {
      statusCode: this.statusCode,
      error: this.error,
      message: this.message,
    };
  }
}

/** Istenen kayit yok -> 404 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, "Not Found", message);
  }
}

/** Eksik zorunlu alan veya gecersiz tarih -> 400 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, "Bad Request", message);
  }
}

export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send(error.toResponse());
    }

    // Zod sema dogrulamasi (body, params, querystring)
    if (hasZodFastifySchemaValidationErrors(error)) {
      const response: ApiError = {
        statusCode: 400,
        error: "Bad Request",
        message: `Istek dogrulamasi basarisiz (${error.validationContext ?? "request"}).`,
        details: error.validation.map((issue) => ({
          path: issue.instancePath,
          message: issue.message,
        })),
      };
      return reply.status(400).send(response);
    }

    // Fastify istemci hatalari (bozuk JSON govdesi vb.)
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      const response: ApiError = {
        statusCode,
        error: STATUS_CODES[statusCode] ?? "Bad Request",
        message: error.message,
      };
      return reply.status(statusCode).send(response);
    }

    request.log.error({ err: error }, "Beklenmeyen hata");
    const response: ApiError = {
      statusCode: 500,
      error: "Internal Server Error",
      message: "Beklenmeyen bir hata olustu.",
    };
    return reply.status(500).send(response);
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiError = {
      statusCode: 404,
      error: "Not Found",
      message: `Route bulunamadi: ${request.method} ${request.url}`,
    };
    return reply.status(404).send(response);
  });
}
