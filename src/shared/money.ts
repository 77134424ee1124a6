import { Decimal } from "decimal.js";

import { ProcessingError } from "../domain/tax/errors.js";

// Currency helpers used across the tax domain.
export function toDecimal(value: Decimal.Value): Decimal {
  let decimal: Decimal;

  try {
    decimal = new Decimal(value);
  } catch {
    throw new ProcessingError("INVALID_AMOUNT", `Invalid amount: ${String(value)}`, { amount: String(value) });
  }

  if (!decimal.isFinite() || decimal.lessThan(0)) {
    throw new ProcessingError("INVALID_AMOUNT", `Amount must be a finite, non-negative number: ${String(value)}`, {
      amount: String(value)
    });
  }

  return decimal;
}

export function roundCurrency(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function toCurrencyNumber(value: Decimal): number {
  return roundCurrency(value).toNumber();
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }

  return total;
}
