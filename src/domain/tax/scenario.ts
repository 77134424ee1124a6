import type { Decimal } from "decimal.js";

import { toCurrencyNumber, toDecimal } from "../../shared/money.js";
import type { TaxDatabase } from "../rulesets/database.js";
import { aggregateRates } from "./aggregator.js";
import { classifyJurisdiction } from "./classifier.js";
import { buildExplanation } from "./explanation.js";
import { resolvePolicy } from "./policy.js";
import type { Region } from "./region.js";
import type {
  Classification,
  RateLine,
  ResolvedPolicy,
  TaxEvaluation,
  TaxScenarioInput,
  TradeAgreementOverride,
  TransactionAttributes,
  TransactionType,
  VatRateTier
} from "./types.js";

/**
 * One transaction's tax question: who sells, who buys, and what.
 *
 * Every method evaluates from scratch against the database it is given;
 * the scenario holds no state between calls.
 */
export class TaxScenario {
  readonly sourceRegion: Region;
  readonly destinationRegion: Region;
  readonly transactionType: TransactionType;
  readonly tradeAgreementOverride: TradeAgreementOverride | null;
  readonly isDigitalProductOrService: boolean;
  readonly hasResaleCertificate: boolean;
  readonly isBuyerRegistered: boolean;
  readonly ignoreThreshold: boolean;
  readonly vatRate: VatRateTier | null;

  constructor(input: TaxScenarioInput) {
    this.sourceRegion = input.sourceRegion;
    this.destinationRegion = input.destinationRegion;
    this.transactionType = input.transactionType;
    this.tradeAgreementOverride = input.tradeAgreementOverride ?? null;
    this.isDigitalProductOrService = input.isDigitalProductOrService ?? false;
    this.hasResaleCertificate = input.hasResaleCertificate ?? false;
    this.isBuyerRegistered = input.isBuyerRegistered ?? false;
    this.ignoreThreshold = input.ignoreThreshold ?? false;
    this.vatRate = input.vatRate ?? null;
    Object.freeze(this);
  }

  private attributes(): TransactionAttributes {
    return {
      transactionType: this.transactionType,
      isDigitalProductOrService: this.isDigitalProductOrService,
      hasResaleCertificate: this.hasResaleCertificate,
      isBuyerRegistered: this.isBuyerRegistered,
      ignoreThreshold: this.ignoreThreshold
    };
  }

  private classify(database: TaxDatabase): Classification {
    return classifyJurisdiction(database, this.sourceRegion, this.destinationRegion, this.tradeAgreementOverride, {
      isDigitalProductOrService: this.isDigitalProductOrService
    });
  }

  evaluate(amount: Decimal.Value, database: TaxDatabase): TaxEvaluation {
    const value = toDecimal(amount);
    const classification = this.classify(database);
    const policy = resolvePolicy(classification, this.attributes(), value);
    const aggregation = aggregateRates(
      policy,
      this.sourceRegion,
      this.destinationRegion,
      this.vatRate,
      value,
      database
    );

    return {
      amount: value,
      classification,
      policy,
      aggregation,
      explanation: buildExplanation(value, this.sourceRegion, this.destinationRegion, classification, policy, aggregation)
    };
  }

  determinePolicy(amount: Decimal.Value, database: TaxDatabase): ResolvedPolicy {
    const value = toDecimal(amount);
    const classification = this.classify(database);

    return resolvePolicy(classification, this.attributes(), value);
  }

  /** Tax rounded to cents. */
  calculateTax(amount: number, database: TaxDatabase): number {
    return toCurrencyNumber(this.evaluate(amount, database).aggregation.taxAmount);
  }

  /** Unrounded tax. */
  calculateTaxDecimal(amount: Decimal.Value, database: TaxDatabase): Decimal {
    return this.evaluate(amount, database).aggregation.taxAmount;
  }

  getRates(amount: Decimal.Value, database: TaxDatabase): RateLine[] {
    return toRateLines(this.evaluate(amount, database));
  }
}

export function toRateLines(evaluation: TaxEvaluation): RateLine[] {
  return evaluation.aggregation.rates.map((rate) => ({
    taxKind: rate.taxKind,
    rate: rate.rate,
    compound: rate.compound,
    base: toCurrencyNumber(rate.base),
    amount: toCurrencyNumber(rate.amount)
  }));
}
