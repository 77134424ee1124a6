import { Decimal } from "decimal.js";

import { sumDecimals } from "../../shared/money.js";
import type { TaxDatabase } from "../rulesets/database.js";
import { rateNotFound } from "./errors.js";
import { Region } from "./region.js";
import type {
  AggregationResult,
  AppliedRate,
  PolicyKind,
  RateEntry,
  ResolvedPolicy,
  TaxKind,
  VatRateTier,
  VatTaxKind
} from "./types.js";

const ZERO_RATE_TIERS: ReadonlySet<VatRateTier> = new Set(["zero", "exempt", "reverse_charge"]);

function isVatKind(kind: TaxKind): kind is VatTaxKind {
  return kind.startsWith("vat_");
}

export function selectRateRegion(policy: PolicyKind, source: Region, destination: Region): Region | null {
  switch (policy) {
    case "origin":
      return source;
    case "destination":
      return destination;
    case "reverse_charge":
    case "exempt":
    case "zero_rated":
    case "none":
      return null;
  }
}

/**
 * The catalog key for a region. A subdivision missing from the catalog falls
 * back to its country; REGION_NOT_FOUND is left to the lookup when neither is there.
 */
export function resolveCatalogRegion(region: Region, database: TaxDatabase): Region {
  if (database.hasRegion(region.code) || region.subdivision === null || !database.hasRegion(region.country)) {
    return region;
  }

  return Region.create(region.country);
}

/**
 * Picks the entries that apply for a region. Non-VAT entries always apply;
 * VAT entries are narrowed to one tier, `standard` unless one is requested.
 */
export function selectRateEntries(
  regionCode: string,
  entries: readonly RateEntry[],
  tier: VatRateTier | null | undefined
): RateEntry[] {
  const requested = tier ?? "standard";
  const kind: VatTaxKind = `vat_${requested}`;
  const hasVat = entries.some((entry) => isVatKind(entry.taxKind));
  const hasTier = entries.some((entry) => entry.taxKind === kind);
  const explicit = tier !== null && tier !== undefined;

  if (!hasTier && (explicit || hasVat)) {
    if (!hasVat || !ZERO_RATE_TIERS.has(requested)) {
      throw rateNotFound(regionCode, requested);
    }

    return [{ taxKind: kind, rate: 0, compound: false }, ...entries.filter((entry) => !isVatKind(entry.taxKind))];
  }

  return entries.filter((entry) => !isVatKind(entry.taxKind) || entry.taxKind === kind);
}

/**
 * Applies the entries left to right. A non-compounding entry is charged on the
 * amount; a compounding one on the amount plus the tax accumulated so far.
 */
export function applyRates(amount: Decimal, entries: readonly RateEntry[]): AppliedRate[] {
  const applied: AppliedRate[] = [];
  let accumulated = new Decimal(0);

  for (const entry of entries) {
    const base = entry.compound ? amount.plus(accumulated) : amount;
    const contribution = base.times(entry.rate);
    accumulated = accumulated.plus(contribution);
    applied.push({
      taxKind: entry.taxKind,
      rate: entry.rate,
      compound: entry.compound,
      base,
      amount: contribution
    });
  }

  return applied;
}

export function aggregateRates(
  policy: ResolvedPolicy,
  source: Region,
  destination: Region,
  vatRate: VatRateTier | null | undefined,
  amount: Decimal,
  database: TaxDatabase
): AggregationResult {
  const selected = selectRateRegion(policy.kind, source, destination);

  if (selected === null) {
    return {
      rateRegion: null,
      rates: [],
      taxAmount: new Decimal(0)
    };
  }

  const rateRegion = resolveCatalogRegion(selected, database);
  const entries = selectRateEntries(rateRegion.code, database.getRates(rateRegion.code), vatRate);
  const rates = applyRates(amount, entries);

  return {
    rateRegion,
    rates,
    taxAmount: sumDecimals(rates.map((rate) => rate.amount))
  };
}
