import cors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import sensible from "@fastify/sensible";
import Fastify from "fastify";
import { ZodError } from "zod";

import { buildOpenApiDocument } from "./api/openapi.js";
import {
  agreementParamsSchema,
  batchParamsSchema,
  calculateTaxSchema,
  createBatchSchema,
  regionInputSchema,
  regionParamsSchema
} from "./api/schemas.js";
import { env } from "./config/env.js";
import type { TaxDatabase } from "./domain/rulesets/database.js";
import { loadTaxDatabase } from "./domain/rulesets/loader.js";
import {
  calculateTax,
  describeAgreement,
  describeRates,
  getRegionRates,
  listAgreements,
  validateRegion
} from "./services/tax-service.js";
import { createId } from "./shared/ids.js";
import { createBatchQueue, type BatchQueue } from "./worker/queues.js";

export interface BuildAppOptions {
  database?: TaxDatabase;
  batchQueue?: BatchQueue;
}

function errorCode(error: Error, statusCode: number): string {
  if (error instanceof ZodError) {
    return "VALIDATION_ERROR";
  }

  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }

  return statusCode >= 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR";
}

function errorDetails(error: Error): unknown {
  if (error instanceof ZodError) {
    return error.flatten();
  }

  return "details" in error && error.details !== undefined ? error.details : null;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const apiPrefix = "/v1";
  const database = options.database ?? loadTaxDatabase();
  const batchQueue = options.batchQueue ?? createBatchQueue();

  const app = Fastify({
    logger: env.NODE_ENV === "test" ? false : { level: env.LOG_LEVEL ?? "info" },
    disableRequestLogging: false
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: env.CORS_ORIGINS.includes("*") ? true : env.CORS_ORIGINS,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    credentials: false
  });
  await app.register(fastifyRateLimit, {
    max: env.RATE_LIMIT_MAX,
    timeWindow: "1 minute"
  });

  app.setErrorHandler<Error>(async (error, request, reply) => {
    const statusCode =
      error instanceof ZodError
        ? 400
        : "statusCode" in error && typeof error.statusCode === "number"
          ? error.statusCode
          : 500;

    if (statusCode >= 500) {
      request.log.error({ error }, "request failed");
    }

    return reply.code(statusCode).send({
      code: errorCode(error, statusCode),
      message: error.message,
      details: errorDetails(error),
      requestId: request.id
    });
  });

  app.addHook("onClose", async () => {
    await batchQueue.close();
  });

  app.get("/health", async () => ({
    ok: true
  }));

  app.get("/openapi.json", async () => buildOpenApiDocument());

  app.get(`${apiPrefix}/health`, async () => ({
    ok: true,
    version: "v1",
    regions: database.regionCodes().length,
    agreements: database.listAgreements().length
  }));

  app.post(`${apiPrefix}/tax/calculate`, async (request) => {
    const body = calculateTaxSchema.parse(request.body);
    return calculateTax(database, body);
  });

  app.post(`${apiPrefix}/tax/rates`, async (request) => {
    const body = calculateTaxSchema.parse(request.body);
    return describeRates(database, body);
  });

  app.get(`${apiPrefix}/rates/:region`, async (request) => {
    const { region } = regionParamsSchema.parse(request.params);
    const rates = getRegionRates(database, region);

    if (!rates) {
      throw app.httpErrors.notFound(`Region not found in rate catalog: ${region.toUpperCase()}`);
    }

    return rates;
  });

  app.get(`${apiPrefix}/agreements`, async () => ({
    items: listAgreements(database)
  }));

  app.get(`${apiPrefix}/agreements/:key`, async (request) => {
    const { key } = agreementParamsSchema.parse(request.params);
    const agreement = database.findAgreement(key);

    if (!agreement) {
      throw app.httpErrors.notFound(`Trade agreement not found: ${key}`);
    }

    return describeAgreement(agreement);
  });

  app.post(`${apiPrefix}/regions/validate`, async (request) => {
    const body = regionInputSchema.parse(request.body);
    return validateRegion(database, body);
  });

  app.post(`${apiPrefix}/tax/batches`, async (request, reply) => {
    const body = createBatchSchema.parse(request.body);
    const batchId = createId();

    await batchQueue.enqueue({
      batchId,
      reference: body.reference ?? null,
      lines: body.lines
    });

    request.log.info({ batchId, lineCount: body.lines.length }, "tax batch queued");

    return reply.code(202).send({
      batchId,
      lineCount: body.lines.length
    });
  });

  app.get(`${apiPrefix}/tax/batches/:id`, async (request) => {
    const { id } = batchParamsSchema.parse(request.params);
    const snapshot = await batchQueue.get(id);

    if (!snapshot) {
      throw app.httpErrors.notFound("Batch not found.");
    }

    return snapshot;
  });

  return app;
}
