import { describe, expect, it } from "vitest";

import { TaxDatabase } from "../src/domain/rulesets/database.js";
import { ConfigError, ProcessingError } from "../src/domain/tax/errors.js";
import { captureError, fixturePath, loadFixtureDatabase } from "./support.js";

const minimalAgreements = {
  EU: {
    name: "European Union",
    type: "customs_union",
    members: ["DE"],
    tax_rules: {
      external_export: "zero_rated"
    }
  }
};

describe("tax database", () => {
  const database = loadFixtureDatabase();

  it("keeps rate entries in document order", () => {
    expect(database.getRates("CA-BC")).toEqual([
      { taxKind: "gst", rate: 0.05, compound: false },
      { taxKind: "pst", rate: 0.07, compound: true }
    ]);
    expect(database.getRates("QA")).toEqual([]);
    expect(database.hasRegion("US-WA")).toBe(true);
    expect(database.hasRegion("JP")).toBe(false);
  });

  it("defaults compound to false", () => {
    expect(database.getRates("DE")[0]).toEqual({ taxKind: "vat_standard", rate: 0.19, compound: false });
  });

  it("reports unknown regions", () => {
    const error = captureError(() => database.getRates("JP"));

    expect(error).toBeInstanceOf(ProcessingError);
    expect(error).toMatchObject({ code: "REGION_NOT_FOUND", details: { region: "JP" } });
  });

  it("lists agreements in document order", () => {
    expect(database.listAgreements().map((agreement) => agreement.key)).toEqual(["EU", "US", "CA", "GCC"]);
  });

  it("looks agreements up by key", () => {
    expect(database.findAgreement("NAFTA")).toBeUndefined();
    expect(captureError(() => database.getAgreement("NAFTA"))).toMatchObject({ code: "AGREEMENT_NOT_FOUND" });
    expect(database.getAgreement("GCC").appliesTo).toEqual({
      physicalGoods: true,
      digitalGoods: false,
      services: false
    });
  });

  it("normalizes rule shorthand and fills digital thresholds from the physical ones", () => {
    const us = database.getAgreement("US");

    expect(us.rules.internalB2b).toEqual({
      type: "exempt",
      requiresResaleCertificate: true,
      requiresRegistration: false
    });
    expect(us.rules.internalB2c).toEqual({
      type: "threshold_based",
      threshold: 100000,
      below: { type: "zero_rated" },
      above: { type: "destination" },
      thresholdDigital: 100000,
      belowDigital: { type: "zero_rated" },
      aboveDigital: { type: "destination" }
    });
    expect(database.getAgreement("EU").rules.internalB2c).toMatchObject({ threshold: 10000, thresholdDigital: 0 });
  });

  it("defaults missing internal slots to destination and applies_to to everything", () => {
    const minimal = TaxDatabase.fromJson({ DE: [] }, minimalAgreements);
    const agreement = minimal.getAgreement("EU");

    expect(agreement.rules.internalB2b).toEqual({ type: "destination" });
    expect(agreement.rules.internalB2c).toEqual({ type: "destination" });
    expect(agreement.appliesTo).toEqual({ physicalGoods: true, digitalGoods: true, services: true });
  });

  it("accepts JSON text", () => {
    const parsed = TaxDatabase.fromJson(
      '{"TH":[{"tax_kind":"vat_standard","rate":0.07}]}',
      JSON.stringify(minimalAgreements)
    );

    expect(parsed.regionCodes()).toEqual(["TH"]);
  });

  it("rejects malformed rate documents", () => {
    const invalidJson = captureError(() => TaxDatabase.fromJson("{", minimalAgreements));
    expect(invalidJson).toBeInstanceOf(ConfigError);
    expect(invalidJson).toMatchObject({ code: "MALFORMED_RATES", statusCode: 500 });

    expect(
      captureError(() => TaxDatabase.fromJson({ DE: [{ tax_kind: "vat_standard", rate: 19 }] }, minimalAgreements))
    ).toMatchObject({ code: "MALFORMED_RATES" });
    expect(
      captureError(() => TaxDatabase.fromJson({ DE: [{ tax_kind: "excise", rate: 0.1 }] }, minimalAgreements))
    ).toMatchObject({ code: "MALFORMED_RATES" });
    expect(captureError(() => TaxDatabase.fromJson({ germany: [] }, minimalAgreements))).toMatchObject({
      code: "MALFORMED_RATES"
    });
  });

  it("rejects malformed agreement documents", () => {
    expect(
      captureError(() =>
        TaxDatabase.fromJson({}, { EU: { ...minimalAgreements.EU, type: "free_trade_area" } })
      )
    ).toMatchObject({ code: "MALFORMED_AGREEMENTS" });
    expect(
      captureError(() => TaxDatabase.fromJson({}, { EU: { name: "European Union", type: "customs_union", members: ["DE"] } }))
    ).toMatchObject({ code: "MALFORMED_AGREEMENTS" });
  });

  it("finds members shared by agreements of the same kind", () => {
    const overlapping = TaxDatabase.fromJson(
      {},
      {
        A: { name: "A", type: "customs_union", members: ["DE", "FR"], tax_rules: { external_export: "zero_rated" } },
        B: { name: "B", type: "customs_union", members: ["FR", "IT"], tax_rules: { external_export: "zero_rated" } },
        C: { name: "C", type: "federal_state", members: ["FR"], tax_rules: { external_export: "zero_rated" } }
      }
    );

    expect(overlapping.findMemberOverlaps()).toEqual([{ member: "FR", agreements: ["A", "B"] }]);
    expect(database.findMemberOverlaps()).toEqual([]);
  });

  it("counts a country-level member as sharing its subdivisions", () => {
    const nested = TaxDatabase.fromJson(
      {},
      {
        NATION: { name: "Nation", type: "federal_state", members: ["US"], tax_rules: { external_export: "zero_rated" } },
        WEST: {
          name: "West",
          type: "federal_state",
          members: ["US-CA", "US-WA", "CA-BC"],
          tax_rules: { external_export: "zero_rated" }
        }
      }
    );

    expect(nested.findMemberOverlaps()).toEqual([
      { member: "US-CA", agreements: ["NATION", "WEST"] },
      { member: "US-WA", agreements: ["NATION", "WEST"] }
    ]);
  });

  it("builds per-member rule replacements", () => {
    expect(database.getAgreement("CA").memberRules.get("CA-ON")).toEqual({
      member: "CA-ON",
      internalB2c: { type: "destination" }
    });
    expect(database.getAgreement("CA").memberRules.has("CA-BC")).toBe(false);
    expect(database.getAgreement("EU").memberRules.size).toBe(0);
  });

  it("rejects member rules for regions outside the agreement", () => {
    const error = captureError(() =>
      TaxDatabase.fromJson(
        {},
        { EU: { ...minimalAgreements.EU, member_rules: { FR: { internal_b2c: "destination" } } } }
      )
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: "MALFORMED_AGREEMENTS" });
  });

  it("wraps unreadable ruleset files in a config error", () => {
    const error = captureError(() =>
      TaxDatabase.fromFiles(fixturePath("missing-rates.json"), fixturePath("agreements.json"))
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: "RULESET_UNREADABLE",
      statusCode: 500,
      details: { path: fixturePath("missing-rates.json"), document: "rates" }
    });
  });
});
