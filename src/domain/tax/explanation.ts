import type { Decimal } from "decimal.js";

import { createId } from "../../shared/ids.js";
import type { Region } from "./region.js";
import type { AggregationResult, Classification, ExplanationNode, ResolvedPolicy } from "./types.js";

function describeClassification(classification: Classification): Record<string, unknown> {
  if (classification.type === "no_agreement") {
    return {
      agreement: null,
      reason: classification.reason
    };
  }

  return {
    agreement: classification.agreement.key,
    kind: classification.agreement.kind,
    scope: classification.scope,
    viaOverride: classification.viaOverride,
    memberRules: classification.memberRules?.member ?? null
  };
}

export function buildExplanation(
  amount: Decimal,
  source: Region,
  destination: Region,
  classification: Classification,
  policy: ResolvedPolicy,
  aggregation: AggregationResult
): ExplanationNode {
  return {
    nodeId: createId(),
    label: "Tax evaluation",
    formula: "classify pair -> resolve policy -> aggregate rates",
    inputs: {
      amount: amount.toString(),
      source: source.code,
      destination: destination.code
    },
    outputs: {
      policy: policy.kind,
      taxAmount: aggregation.taxAmount.toString()
    },
    children: [
      {
        nodeId: createId(),
        label: "Jurisdiction classification",
        formula:
          classification.type === "no_agreement"
            ? "no agreement governs the pair"
            : `${classification.agreement.key} ${classification.scope.replace("_", " ")}`,
        inputs: {
          source: source.code,
          destination: destination.code
        },
        outputs: describeClassification(classification),
        children: []
      },
      {
        nodeId: createId(),
        label: "Policy resolution",
        formula: policy.threshold
          ? `threshold ${policy.threshold.value} (${policy.threshold.digital ? "digital" : "physical"}): ${policy.threshold.branch}`
          : policy.slot ?? "default cross-border rule",
        inputs: {
          slot: policy.slot,
          threshold: policy.threshold
        },
        outputs: {
          policy: policy.kind,
          reason: policy.reason
        },
        children: []
      },
      {
        nodeId: createId(),
        label: "Rate aggregation",
        formula: aggregation.rateRegion === null ? "no rate region; tax is zero" : "sum(rate x base)",
        inputs: {
          rateRegion: aggregation.rateRegion?.code ?? null
        },
        outputs: {
          taxAmount: aggregation.taxAmount.toString()
        },
        children: aggregation.rates.map((rate) => ({
          nodeId: createId(),
          label: rate.taxKind,
          formula: rate.compound ? "rate x (amount + prior tax)" : "rate x amount",
          inputs: {
            rate: rate.rate,
            base: rate.base.toString()
          },
          outputs: {
            amount: rate.amount.toString()
          },
          children: []
        }))
      }
    ]
  };
}
