import type { Decimal } from "decimal.js";

import type {
  AgreementRule,
  Classification,
  ResolvedPolicy,
  RuleSlot,
  SimpleRule,
  ThresholdBranch,
  TransactionAttributes,
  TransactionType
} from "./types.js";

// Applied when no agreement governs the pair. Reverse charge is never assumed.
export const DEFAULT_CROSS_BORDER_RULES: Record<TransactionType, SimpleRule> = {
  B2B: { type: "destination" },
  B2C: { type: "destination" }
};

function assertNever(value: never): never {
  throw new Error(`Unhandled rule: ${JSON.stringify(value)}`);
}

function selectSlot(classification: Extract<Classification, { type: "agreement" }>, transactionType: TransactionType): {
  slot: RuleSlot;
  rule: AgreementRule;
} {
  const { rules } = classification.agreement;
  const memberRules = classification.memberRules;

  if (classification.scope === "external_export") {
    return { slot: "external_export", rule: rules.externalExport };
  }

  // A buyer's member rules replace the agreement's rule for the same slot.
  return transactionType === "B2B"
    ? { slot: "internal_b2b", rule: memberRules?.internalB2b ?? rules.internalB2b }
    : { slot: "internal_b2c", rule: memberRules?.internalB2c ?? rules.internalB2c };
}

function resolveSimpleRule(
  rule: SimpleRule,
  attributes: TransactionAttributes,
  slot: RuleSlot | null,
  threshold: ResolvedPolicy["threshold"]
): ResolvedPolicy {
  switch (rule.type) {
    case "origin":
      return { kind: "origin", slot, threshold, reason: "Rule charges the seller's rate." };
    case "destination":
      return { kind: "destination", slot, threshold, reason: "Rule charges the buyer's rate." };
    case "reverse_charge":
      return { kind: "reverse_charge", slot, threshold, reason: "Liability shifts to the buyer." };
    case "zero_rated":
      return { kind: "zero_rated", slot, threshold, reason: "Supply is taxable at a zero rate." };
    case "none":
      return { kind: "none", slot, threshold, reason: "Supply is outside the scope of the tax." };
    case "exempt": {
      if (rule.requiresResaleCertificate && !attributes.hasResaleCertificate) {
        return {
          kind: "destination",
          slot,
          threshold,
          reason: "Exemption requires a resale certificate; charging the buyer's rate."
        };
      }

      if (rule.requiresRegistration && !attributes.isBuyerRegistered) {
        return {
          kind: "destination",
          slot,
          threshold,
          reason: "Exemption requires a registered buyer; charging the buyer's rate."
        };
      }

      return { kind: "exempt", slot, threshold, reason: "Supply is exempt." };
    }
    default:
      return assertNever(rule);
  }
}

/**
 * Turns the classified pair and the transaction attributes into one policy.
 *
 * Threshold rules compare the single amount passed in. Callers tracking
 * cumulative sales pass `ignoreThreshold` once their running total is over.
 */
export function resolvePolicy(
  classification: Classification,
  attributes: TransactionAttributes,
  amount: Decimal
): ResolvedPolicy {
  if (classification.type === "no_agreement") {
    return resolveSimpleRule(DEFAULT_CROSS_BORDER_RULES[attributes.transactionType], attributes, null, null);
  }

  const { slot, rule } = selectSlot(classification, attributes.transactionType);

  if (rule.type !== "threshold_based") {
    return resolveSimpleRule(rule, attributes, slot, null);
  }

  const digital = attributes.isDigitalProductOrService;
  const value = digital ? rule.thresholdDigital : rule.threshold;
  const branch: ThresholdBranch = attributes.ignoreThreshold ? "ignored" : amount.lessThan(value) ? "below" : "above";
  const chosen =
    branch === "below"
      ? digital
        ? rule.belowDigital
        : rule.below
      : digital
        ? rule.aboveDigital
        : rule.above;

  return resolveSimpleRule(chosen, attributes, slot, { value, digital, branch });
}
