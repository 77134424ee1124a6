import type { Decimal } from "decimal.js";
import { z } from "zod";

import { batchLineSchema } from "../api/schemas.js";
import type { TaxDatabase } from "../domain/rulesets/database.js";
import { TaxEngineError } from "../domain/tax/errors.js";
import type { PolicyKind } from "../domain/tax/types.js";
import { logger } from "../infrastructure/logger.js";
import { buildScenario } from "../services/tax-service.js";
import { sumDecimals, toCurrencyNumber } from "../shared/money.js";

export interface CalculateTaxBatchJob {
  batchId: string;
  reference: string | null;
  // Re-validated per line; job data round-trips through Redis.
  lines: unknown[];
}

export type BatchLineResult =
  | {
      lineId: string;
      status: "ok";
      taxAmount: number;
      taxAmountExact: string;
      policy: PolicyKind;
      rateRegion: string | null;
    }
  | {
      lineId: string;
      status: "error";
      code: string;
      message: string;
    };

export interface CalculateTaxBatchResult {
  batchId: string;
  reference: string | null;
  lineCount: number;
  succeeded: number;
  failed: number;
  totalTax: number;
  totalTaxExact: string;
  lines: BatchLineResult[];
}

function evaluateLine(raw: unknown, index: number, database: TaxDatabase): {
  result: BatchLineResult;
  tax: Decimal | null;
} {
  const parsed = batchLineSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      result: {
        lineId: String(index + 1),
        status: "error",
        code: "VALIDATION_ERROR",
        message: z.prettifyError(parsed.error)
      },
      tax: null
    };
  }

  const line = parsed.data;
  const lineId = line.lineId ?? String(index + 1);

  try {
    const evaluation = buildScenario(line).evaluate(line.amount, database);
    const tax = evaluation.aggregation.taxAmount;

    return {
      result: {
        lineId,
        status: "ok",
        taxAmount: toCurrencyNumber(tax),
        taxAmountExact: tax.toString(),
        policy: evaluation.policy.kind,
        rateRegion: evaluation.aggregation.rateRegion?.code ?? null
      },
      tax
    };
  } catch (error) {
    if (!(error instanceof TaxEngineError)) {
      throw error;
    }

    return {
      result: {
        lineId,
        status: "error",
        code: error.code,
        message: error.message
      },
      tax: null
    };
  }
}

/**
 * Evaluates every line of a batch independently. A line that fails does not
 * stop the others; only tax engine errors are reported per line.
 */
export function handleCalculateTaxBatch(data: CalculateTaxBatchJob, database: TaxDatabase): CalculateTaxBatchResult {
  const lines: BatchLineResult[] = [];
  const taxes: Decimal[] = [];

  data.lines.forEach((raw, index) => {
    const { result, tax } = evaluateLine(raw, index, database);
    lines.push(result);
    if (tax) {
      taxes.push(tax);
    }
  });

  const total = sumDecimals(taxes);
  const failed = lines.filter((line) => line.status === "error").length;

  logger.info(
    {
      batchId: data.batchId,
      lineCount: lines.length,
      failed
    },
    "calculate_tax_batch evaluated"
  );

  return {
    batchId: data.batchId,
    reference: data.reference,
    lineCount: lines.length,
    succeeded: lines.length - failed,
    failed,
    totalTax: toCurrencyNumber(total),
    totalTaxExact: total.toString(),
    lines
  };
}
