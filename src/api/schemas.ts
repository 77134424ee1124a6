import { z } from "zod";

import { env } from "../config/env.js";
import { isId } from "../shared/ids.js";

export const regionInputSchema = z.object({
  country: z.string().min(2).max(3),
  subdivision: z.string().min(1).max(8).nullable().optional()
});

export const vatRateTierSchema = z.enum([
  "standard",
  "reduced",
  "reduced_alt",
  "super_reduced",
  "parking",
  "zero",
  "exempt",
  "reverse_charge"
]);

export const tradeAgreementOverrideSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("use_agreement"),
    agreement: z.string().min(1).max(64)
  }),
  z.object({
    kind: z.literal("no_agreement")
  })
]);

// Strings keep full precision through to decimal.js.
export const amountSchema = z.union([
  z.number().nonnegative(),
  z.string().regex(/^\d+(\.\d+)?$/, "Amount must be a non-negative decimal string")
]);

export const scenarioSchema = z.object({
  source: regionInputSchema,
  destination: regionInputSchema,
  transactionType: z.enum(["B2B", "B2C"]),
  tradeAgreementOverride: tradeAgreementOverrideSchema.nullable().optional(),
  isDigitalProductOrService: z.boolean().default(false),
  hasResaleCertificate: z.boolean().default(false),
  isBuyerRegistered: z.boolean().default(false),
  ignoreThreshold: z.boolean().default(false),
  vatRate: vatRateTierSchema.nullable().optional()
});

export const calculateTaxSchema = scenarioSchema.extend({
  amount: amountSchema
});

export const batchLineSchema = calculateTaxSchema.extend({
  lineId: z.string().min(1).max(120).optional()
});

export const createBatchSchema = z.object({
  reference: z.string().min(1).max(255).optional(),
  lines: z.array(batchLineSchema).min(1).max(env.BATCH_MAX_LINES)
});

export const regionParamsSchema = z.object({
  region: z.string().min(2).max(10)
});

export const agreementParamsSchema = z.object({
  key: z.string().min(1).max(64)
});

export const batchParamsSchema = z.object({
  id: z.string().refine(isId, "Expected a batch id")
});

export type RegionInput = z.infer<typeof regionInputSchema>;
export type ScenarioBody = z.infer<typeof scenarioSchema>;
export type CalculateTaxBody = z.infer<typeof calculateTaxSchema>;
