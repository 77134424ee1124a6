import path from "node:path";

import { env } from "../../config/env.js";
import { logger } from "../../infrastructure/logger.js";
import { TaxDatabase } from "./database.js";

const RULESET_ROOT = path.resolve(process.cwd(), "rulesets");

export interface RulesetPaths {
  rates: string;
  agreements: string;
}

export function resolveRulesetPaths(overrides: Partial<RulesetPaths> = {}): RulesetPaths {
  return {
    rates: path.resolve(RULESET_ROOT, overrides.rates ?? env.TAX_RATES_PATH),
    agreements: path.resolve(RULESET_ROOT, overrides.agreements ?? env.TRADE_AGREEMENTS_PATH)
  };
}

export function loadTaxDatabase(overrides: Partial<RulesetPaths> = {}): TaxDatabase {
  const paths = resolveRulesetPaths(overrides);
  const database = TaxDatabase.fromFiles(paths.rates, paths.agreements);

  for (const overlap of database.findMemberOverlaps()) {
    logger.warn(
      {
        member: overlap.member,
        agreements: overlap.agreements
      },
      "trade agreements share a member; registry order decides which one applies"
    );
  }

  logger.info(
    {
      rates: paths.rates,
      agreements: paths.agreements,
      regionCount: database.regionCodes().length,
      agreementCount: database.listAgreements().length
    },
    "tax database loaded"
  );

  return database;
}
