import type { TaxDatabase } from "../rulesets/database.js";
import type { Region } from "./region.js";
import type {
  AgreementScope,
  Classification,
  MemberRules,
  TradeAgreement,
  TradeAgreementOverride
} from "./types.js";

export interface ClassificationContext {
  isDigitalProductOrService: boolean;
}

export function isAgreementMember(agreement: TradeAgreement, region: Region): boolean {
  return agreement.members.has(region.code) || agreement.members.has(region.country);
}

function coversProduct(agreement: TradeAgreement, isDigital: boolean): boolean {
  return isDigital
    ? agreement.appliesTo.digitalGoods || agreement.appliesTo.services
    : agreement.appliesTo.physicalGoods;
}

/**
 * Scope of a pair under one agreement whose members include the source, or
 * null when the agreement does not govern it. Customs unions leave domestic
 * trade alone. Federal-state agreements treat a buyer in the same country as
 * internal only when that buyer is a member, and any foreign buyer as an export.
 */
function scopeFor(agreement: TradeAgreement, source: Region, destination: Region): AgreementScope | null {
  const domestic = source.sameCountry(destination);
  const destinationIsMember = isAgreementMember(agreement, destination);

  if (agreement.kind === "customs_union") {
    if (domestic) {
      return null;
    }

    return destinationIsMember ? "internal" : "external_export";
  }

  if (!domestic) {
    return "external_export";
  }

  return destinationIsMember ? "internal" : null;
}

function memberRulesFor(agreement: TradeAgreement, scope: AgreementScope, destination: Region): MemberRules | null {
  if (scope !== "internal") {
    return null;
  }

  return agreement.memberRules.get(destination.code) ?? agreement.memberRules.get(destination.country) ?? null;
}

/**
 * Finds the agreement, if any, that governs a source/destination pair.
 *
 * Agreements are scanned in registry order. The first agreement that
 * governs the pair as internal trade wins; failing that, the first one
 * that governs it as an export out of the source's agreement.
 */
export function classifyJurisdiction(
  database: TaxDatabase,
  source: Region,
  destination: Region,
  override: TradeAgreementOverride | null | undefined,
  context: ClassificationContext
): Classification {
  if (override?.kind === "no_agreement") {
    return { type: "no_agreement", reason: "override" };
  }

  if (override?.kind === "use_agreement") {
    const agreement = database.getAgreement(override.agreement);
    const isExport = isAgreementMember(agreement, source) && !isAgreementMember(agreement, destination);
    const scope: AgreementScope = isExport ? "external_export" : "internal";

    return {
      type: "agreement",
      agreement,
      scope,
      viaOverride: true,
      memberRules: memberRulesFor(agreement, scope, destination)
    };
  }

  let exportMatch: TradeAgreement | null = null;

  for (const agreement of database.listAgreements()) {
    if (!coversProduct(agreement, context.isDigitalProductOrService) || !isAgreementMember(agreement, source)) {
      continue;
    }

    const scope = scopeFor(agreement, source, destination);

    if (scope === "internal") {
      return {
        type: "agreement",
        agreement,
        scope,
        viaOverride: false,
        memberRules: memberRulesFor(agreement, scope, destination)
      };
    }

    if (scope === "external_export") {
      exportMatch ??= agreement;
    }
  }

  if (exportMatch) {
    return { type: "agreement", agreement: exportMatch, scope: "external_export", viaOverride: false, memberRules: null };
  }

  return { type: "no_agreement", reason: "unmatched" };
}
