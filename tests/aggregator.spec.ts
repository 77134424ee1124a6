import { Decimal } from "decimal.js";
import { describe, expect, it } from "vitest";

import {
  aggregateRates,
  applyRates,
  resolveCatalogRegion,
  selectRateEntries,
  selectRateRegion
} from "../src/domain/tax/aggregator.js";
import { Region } from "../src/domain/tax/region.js";
import type { PolicyKind, ResolvedPolicy } from "../src/domain/tax/types.js";
import { captureError, loadFixtureDatabase } from "./support.js";

const database = loadFixtureDatabase();

function policy(kind: PolicyKind): ResolvedPolicy {
  return { kind, slot: null, reason: "test", threshold: null };
}

describe("rate aggregator", () => {
  const de = Region.fromCode("DE");
  const fr = Region.fromCode("FR");

  it("picks the rate region from the policy", () => {
    expect(selectRateRegion("origin", de, fr)).toBe(de);
    expect(selectRateRegion("destination", de, fr)).toBe(fr);
    for (const kind of ["reverse_charge", "exempt", "zero_rated", "none"] as const) {
      expect(selectRateRegion(kind, de, fr)).toBeNull();
    }
  });

  it("narrows VAT entries to the standard tier by default", () => {
    expect(selectRateEntries("DE", database.getRates("DE"), null)).toEqual([
      { taxKind: "vat_standard", rate: 0.19, compound: false }
    ]);
  });

  it("selects a requested tier", () => {
    expect(selectRateEntries("FR", database.getRates("FR"), "reduced_alt")).toEqual([
      { taxKind: "vat_reduced_alt", rate: 0.055, compound: false }
    ]);
  });

  it("fails when the requested tier is not configured", () => {
    expect(captureError(() => selectRateEntries("DE", database.getRates("DE"), "super_reduced"))).toMatchObject({
      code: "RATE_NOT_FOUND",
      details: { region: "DE", tier: "super_reduced" }
    });
    expect(captureError(() => selectRateEntries("CA-BC", database.getRates("CA-BC"), "standard"))).toMatchObject({
      code: "RATE_NOT_FOUND"
    });
  });

  it("synthesizes a zero rate for zero-like tiers in VAT regions", () => {
    expect(selectRateEntries("DE", database.getRates("DE"), "zero")).toEqual([
      { taxKind: "vat_zero", rate: 0, compound: false }
    ]);
  });

  it("keeps every non-VAT entry", () => {
    expect(selectRateEntries("CA-BC", database.getRates("CA-BC"), undefined)).toHaveLength(2);
    expect(selectRateEntries("QA", database.getRates("QA"), null)).toEqual([]);
  });

  it("charges compounding entries on the amount plus prior tax", () => {
    const [gst, pst] = applyRates(new Decimal(100), database.getRates("CA-BC"));

    expect(gst?.base.toString()).toBe("100");
    expect(gst?.amount.toString()).toBe("5");
    expect(pst?.base.toString()).toBe("105");
    expect(pst?.amount.toString()).toBe("7.35");
  });

  it("sums the applied rates for the chosen region", () => {
    const bc = Region.fromCode("CA-BC");
    const result = aggregateRates(policy("destination"), bc, bc, null, new Decimal(100000), database);

    expect(result.rateRegion?.code).toBe("CA-BC");
    expect(result.rates).toHaveLength(2);
    expect(result.taxAmount.toString()).toBe("12350");
  });

  it("returns no rates when nothing is charged", () => {
    const result = aggregateRates(policy("reverse_charge"), de, fr, null, new Decimal(100), database);

    expect(result).toMatchObject({ rateRegion: null, rates: [] });
    expect(result.taxAmount.isZero()).toBe(true);
  });

  it("fails for a region missing from the catalog", () => {
    const jp = Region.fromCode("JP");

    expect(captureError(() => aggregateRates(policy("destination"), de, jp, null, new Decimal(100), database))).toMatchObject(
      { code: "REGION_NOT_FOUND" }
    );
  });

  it("falls back to the country rates for an uncatalogued subdivision", () => {
    const bavaria = Region.fromCode("DE-BY");

    expect(resolveCatalogRegion(bavaria, database).code).toBe("DE");
    expect(resolveCatalogRegion(Region.fromCode("CA-BC"), database).code).toBe("CA-BC");
    expect(resolveCatalogRegion(Region.fromCode("BR-SP"), database).code).toBe("BR-SP");

    const result = aggregateRates(policy("destination"), bavaria, bavaria, null, new Decimal(100), database);

    expect(result.rateRegion?.code).toBe("DE");
    expect(result.taxAmount.toString()).toBe("19");
  });

  it("reports the subdivision when neither it nor its country is catalogued", () => {
    const saoPaulo = Region.fromCode("BR-SP");

    expect(
      captureError(() => aggregateRates(policy("destination"), de, saoPaulo, null, new Decimal(100), database))
    ).toMatchObject({ code: "REGION_NOT_FOUND", details: { region: "BR-SP" } });
  });
});
