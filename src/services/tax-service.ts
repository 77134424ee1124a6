import type { CalculateTaxBody, RegionInput, ScenarioBody } from "../api/schemas.js";
import type { TaxDatabase } from "../domain/rulesets/database.js";
import { Region } from "../domain/tax/region.js";
import { TaxScenario, toRateLines } from "../domain/tax/scenario.js";
import type {
  AgreementRule,
  Classification,
  ExplanationNode,
  RateLine,
  ResolvedPolicy,
  SimpleRule,
  TradeAgreement
} from "../domain/tax/types.js";
import { toCurrencyNumber } from "../shared/money.js";

export type ClassificationView =
  | { type: "no_agreement"; reason: "override" | "unmatched" }
  | { type: "agreement"; agreement: string; kind: TradeAgreement["kind"]; scope: string; viaOverride: boolean };

export interface TaxCalculationView {
  taxAmount: number;
  taxAmountExact: string;
  policy: ResolvedPolicy;
  classification: ClassificationView;
  rateRegion: string | null;
  rates: RateLine[];
  explanation: ExplanationNode;
}

export function toRegion(input: RegionInput): Region {
  return Region.create(input.country, input.subdivision);
}

export function buildScenario(body: ScenarioBody): TaxScenario {
  return new TaxScenario({
    sourceRegion: toRegion(body.source),
    destinationRegion: toRegion(body.destination),
    transactionType: body.transactionType,
    tradeAgreementOverride: body.tradeAgreementOverride,
    isDigitalProductOrService: body.isDigitalProductOrService,
    hasResaleCertificate: body.hasResaleCertificate,
    isBuyerRegistered: body.isBuyerRegistered,
    ignoreThreshold: body.ignoreThreshold,
    vatRate: body.vatRate
  });
}

function describeClassification(classification: Classification): ClassificationView {
  if (classification.type === "no_agreement") {
    return classification;
  }

  return {
    type: "agreement",
    agreement: classification.agreement.key,
    kind: classification.agreement.kind,
    scope: classification.scope,
    viaOverride: classification.viaOverride
  };
}

export function calculateTax(database: TaxDatabase, body: CalculateTaxBody): TaxCalculationView {
  const evaluation = buildScenario(body).evaluate(body.amount, database);

  return {
    taxAmount: toCurrencyNumber(evaluation.aggregation.taxAmount),
    taxAmountExact: evaluation.aggregation.taxAmount.toString(),
    policy: evaluation.policy,
    classification: describeClassification(evaluation.classification),
    rateRegion: evaluation.aggregation.rateRegion?.code ?? null,
    rates: toRateLines(evaluation),
    explanation: evaluation.explanation
  };
}

export function describeRates(database: TaxDatabase, body: CalculateTaxBody) {
  const evaluation = buildScenario(body).evaluate(body.amount, database);

  return {
    policy: evaluation.policy,
    rates: toRateLines(evaluation)
  };
}

/** Catalog entries for a region code, or null when the catalog has none. */
export function getRegionRates(database: TaxDatabase, code: string) {
  const region = Region.fromCode(code);
  if (!database.hasRegion(region.code)) {
    return null;
  }

  return {
    region: region.toJSON(),
    rates: database.getRates(region.code).map((entry) => ({ ...entry }))
  };
}

function describeRule(rule: SimpleRule | AgreementRule): Record<string, unknown> {
  if (rule.type !== "threshold_based") {
    return { ...rule };
  }

  return {
    type: rule.type,
    threshold: rule.threshold,
    below: rule.below.type,
    above: rule.above.type,
    thresholdDigital: rule.thresholdDigital,
    belowDigital: rule.belowDigital.type,
    aboveDigital: rule.aboveDigital.type
  };
}

export function describeAgreement(agreement: TradeAgreement) {
  return {
    key: agreement.key,
    name: agreement.name,
    kind: agreement.kind,
    members: [...agreement.members],
    appliesTo: agreement.appliesTo,
    rules: {
      internalB2b: describeRule(agreement.rules.internalB2b),
      internalB2c: describeRule(agreement.rules.internalB2c),
      externalExport: describeRule(agreement.rules.externalExport)
    },
    memberRules: Object.fromEntries(
      [...agreement.memberRules.values()].map((rules): [string, Record<string, unknown>] => [
        rules.member,
        {
          internalB2b: rules.internalB2b === undefined ? null : describeRule(rules.internalB2b),
          internalB2c: rules.internalB2c === undefined ? null : describeRule(rules.internalB2c)
        }
      ])
    )
  };
}

export function listAgreements(database: TaxDatabase) {
  return database.listAgreements().map((agreement) => ({
    key: agreement.key,
    name: agreement.name,
    kind: agreement.kind,
    memberCount: agreement.members.size
  }));
}

export function validateRegion(database: TaxDatabase, input: RegionInput) {
  const region = toRegion(input);

  return {
    valid: true,
    code: region.code,
    region: region.toJSON(),
    inCatalog: database.hasRegion(region.code)
  };
}
