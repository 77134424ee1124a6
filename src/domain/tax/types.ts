import type { Decimal } from "decimal.js";

import type { Region } from "./region.js";

export type TransactionType = "B2B" | "B2C";

export type VatRateTier =
  | "standard"
  | "reduced"
  | "reduced_alt"
  | "super_reduced"
  | "parking"
  | "zero"
  | "exempt"
  | "reverse_charge";

export type VatTaxKind = `vat_${VatRateTier}`;

export type TaxKind = VatTaxKind | "gst" | "hst" | "pst" | "qst" | "state_sales_tax" | "sales_tax";

export type TradeAgreementKind = "customs_union" | "federal_state";

export type TradeAgreementOverride =
  | { kind: "use_agreement"; agreement: string }
  | { kind: "no_agreement" };

export interface RateEntry {
  readonly taxKind: TaxKind;
  readonly rate: number;
  readonly compound: boolean;
}

export interface AppliesTo {
  readonly physicalGoods: boolean;
  readonly digitalGoods: boolean;
  readonly services: boolean;
}

export type SimpleRule =
  | { readonly type: "origin" }
  | { readonly type: "destination" }
  | { readonly type: "reverse_charge" }
  | { readonly type: "zero_rated" }
  | { readonly type: "none" }
  | {
      readonly type: "exempt";
      readonly requiresResaleCertificate: boolean;
      readonly requiresRegistration: boolean;
    };

export interface ThresholdRule {
  readonly type: "threshold_based";
  readonly threshold: number;
  readonly below: SimpleRule;
  readonly above: SimpleRule;
  readonly thresholdDigital: number;
  readonly belowDigital: SimpleRule;
  readonly aboveDigital: SimpleRule;
}

export type AgreementRule = SimpleRule | ThresholdRule;

export type RuleSlot = "internal_b2b" | "internal_b2c" | "external_export";

export interface AgreementRules {
  readonly internalB2b: AgreementRule;
  readonly internalB2c: AgreementRule;
  readonly externalExport: AgreementRule;
}

/** Internal-trade rules that replace the agreement's own when the buyer is in one member. */
export interface MemberRules {
  readonly member: string;
  readonly internalB2b?: AgreementRule;
  readonly internalB2c?: AgreementRule;
}

export interface TradeAgreement {
  readonly key: string;
  readonly name: string;
  readonly kind: TradeAgreementKind;
  readonly members: ReadonlySet<string>;
  readonly appliesTo: AppliesTo;
  readonly rules: AgreementRules;
  readonly memberRules: ReadonlyMap<string, MemberRules>;
}

export type AgreementScope = "internal" | "external_export";

export type Classification =
  | { readonly type: "no_agreement"; readonly reason: "override" | "unmatched" }
  | {
      readonly type: "agreement";
      readonly agreement: TradeAgreement;
      readonly scope: AgreementScope;
      readonly viaOverride: boolean;
      readonly memberRules: MemberRules | null;
    };

export type PolicyKind = "origin" | "destination" | "reverse_charge" | "exempt" | "zero_rated" | "none";

export type ThresholdBranch = "below" | "above" | "ignored";

export interface ResolvedPolicy {
  readonly kind: PolicyKind;
  readonly slot: RuleSlot | null;
  readonly reason: string;
  readonly threshold: {
    readonly value: number;
    readonly digital: boolean;
    readonly branch: ThresholdBranch;
  } | null;
}

export interface TransactionAttributes {
  transactionType: TransactionType;
  isDigitalProductOrService: boolean;
  hasResaleCertificate: boolean;
  isBuyerRegistered: boolean;
  ignoreThreshold: boolean;
}

export interface TaxScenarioInput {
  sourceRegion: Region;
  destinationRegion: Region;
  transactionType: TransactionType;
  tradeAgreementOverride?: TradeAgreementOverride | null;
  isDigitalProductOrService?: boolean;
  hasResaleCertificate?: boolean;
  isBuyerRegistered?: boolean;
  ignoreThreshold?: boolean;
  vatRate?: VatRateTier | null;
}

export interface AppliedRate extends RateEntry {
  readonly base: Decimal;
  readonly amount: Decimal;
}

export interface AggregationResult {
  readonly rateRegion: Region | null;
  readonly rates: readonly AppliedRate[];
  readonly taxAmount: Decimal;
}

export interface ExplanationNode {
  nodeId: string;
  label: string;
  formula: string;
  inputs: Record<string, unknown>;
  outputs: Record<string, unknown>;
  children: ExplanationNode[];
}

export interface TaxEvaluation {
  readonly amount: Decimal;
  readonly classification: Classification;
  readonly policy: ResolvedPolicy;
  readonly aggregation: AggregationResult;
  readonly explanation: ExplanationNode;
}

export interface RateLine {
  taxKind: TaxKind;
  rate: number;
  compound: boolean;
  base: number;
  amount: number;
}
