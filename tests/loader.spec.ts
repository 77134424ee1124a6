import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { loadTaxDatabase, resolveRulesetPaths } from "../src/domain/rulesets/loader.js";
import { logger } from "../src/infrastructure/logger.js";
import { fixturePath } from "./support.js";

describe("ruleset loader", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves the bundled documents under the rulesets directory", () => {
    const paths = resolveRulesetPaths();

    expect(paths.rates).toBe(path.resolve(process.cwd(), "rulesets", "tax-rates.json"));
    expect(paths.agreements).toBe(path.resolve(process.cwd(), "rulesets", "trade-agreements.json"));
  });

  it("keeps absolute overrides as given", () => {
    const rates = fixturePath("rates.json");

    expect(resolveRulesetPaths({ rates }).rates).toBe(rates);
  });

  it("warns about members shared by agreements of the same kind", () => {
    const warn = vi.spyOn(logger, "warn");

    const database = loadTaxDatabase({
      rates: fixturePath("rates.json"),
      agreements: fixturePath("overlapping-agreements.json")
    });

    expect(database.listAgreements().map((agreement) => agreement.key)).toEqual(["NORDIC", "BALTIC"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { member: "SE", agreements: ["NORDIC", "BALTIC"] },
      "trade agreements share a member; registry order decides which one applies"
    );
  });
});
