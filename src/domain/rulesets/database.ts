import { readFileSync } from "node:fs";

import { z } from "zod";

import { agreementNotFound, ConfigError, type ConfigErrorCode, regionNotFound } from "../tax/errors.js";
import type { AgreementRule, MemberRules, RateEntry, SimpleRule, TradeAgreement } from "../tax/types.js";
import {
  agreementDocumentSchema,
  rateDocumentSchema,
  type AgreementDocument,
  type RateDocument,
  type RawAgreementRule,
  type RawMemberRules,
  type RawSimpleRule
} from "./schema.js";

export interface MemberOverlap {
  member: string;
  agreements: [string, string];
}

function parseDocument<T>(source: unknown, schema: z.ZodType<T>, code: ConfigErrorCode, label: string): T {
  let value = source;

  if (typeof source === "string") {
    try {
      value = JSON.parse(source);
    } catch (error) {
      throw new ConfigError(code, `${label} document is not valid JSON`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(code, `${label} document failed validation: ${z.prettifyError(result.error)}`, {
      issues: result.error.issues
    });
  }

  return result.data;
}

function toSimpleRule(raw: RawSimpleRule): SimpleRule {
  if (typeof raw === "string") {
    return raw === "exempt"
      ? { type: "exempt", requiresResaleCertificate: false, requiresRegistration: false }
      : { type: raw };
  }

  if (raw.type === "exempt") {
    return {
      type: "exempt",
      requiresResaleCertificate: raw.requires_resale_certificate ?? false,
      requiresRegistration: raw.requires_registration ?? false
    };
  }

  return { type: raw.type };
}

function toAgreementRule(raw: RawAgreementRule | null | undefined): AgreementRule {
  if (raw === null || raw === undefined) {
    return { type: "destination" };
  }

  if (typeof raw === "string" || raw.type !== "threshold_based") {
    return toSimpleRule(raw);
  }

  const below = toSimpleRule(raw.below);
  const above = toSimpleRule(raw.above);

  return {
    type: "threshold_based",
    threshold: raw.threshold,
    below,
    above,
    thresholdDigital: raw.threshold_digital ?? raw.threshold,
    belowDigital: raw.below_digital === undefined ? below : toSimpleRule(raw.below_digital),
    aboveDigital: raw.above_digital === undefined ? above : toSimpleRule(raw.above_digital)
  };
}

function toMemberRules(member: string, raw: RawMemberRules): MemberRules {
  return Object.freeze({
    member,
    ...(raw.internal_b2b === undefined ? {} : { internalB2b: toAgreementRule(raw.internal_b2b) }),
    ...(raw.internal_b2c === undefined ? {} : { internalB2c: toAgreementRule(raw.internal_b2c) })
  });
}

function readDocument(filePath: string, document: "rates" | "agreements"): string {
  try {
    return readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError("RULESET_UNREADABLE", `Cannot read ${document} file: ${filePath}`, {
      path: filePath,
      document,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}

function memberCountry(member: string): string {
  return member.split("-")[0] ?? member;
}

// Same reach as classifier membership: a country-level member covers its subdivisions.
function sharedMember(first: string, second: string): string | null {
  if (first === second) {
    return first;
  }

  if (first === memberCountry(second)) {
    return second;
  }

  return second === memberCountry(first) ? first : null;
}

function buildRateCatalog(document: RateDocument): Map<string, readonly RateEntry[]> {
  const catalog = new Map<string, readonly RateEntry[]>();

  for (const [regionCode, entries] of Object.entries(document)) {
    catalog.set(
      regionCode,
      Object.freeze(
        entries.map((entry) =>
          Object.freeze({
            taxKind: entry.tax_kind,
            rate: entry.rate,
            compound: entry.compound
          })
        )
      )
    );
  }

  return catalog;
}

function buildAgreementRegistry(document: AgreementDocument): Map<string, TradeAgreement> {
  const registry = new Map<string, TradeAgreement>();

  for (const [key, raw] of Object.entries(document)) {
    registry.set(
      key,
      Object.freeze({
        key,
        name: raw.name,
        kind: raw.type,
        members: new Set(raw.members),
        appliesTo: Object.freeze({
          physicalGoods: raw.applies_to?.physical_goods ?? true,
          digitalGoods: raw.applies_to?.digital_goods ?? true,
          services: raw.applies_to?.services ?? true
        }),
        rules: Object.freeze({
          internalB2b: toAgreementRule(raw.tax_rules.internal_b2b),
          internalB2c: toAgreementRule(raw.tax_rules.internal_b2c),
          externalExport: toAgreementRule(raw.tax_rules.external_export)
        }),
        memberRules: new Map(
          Object.entries(raw.member_rules ?? {}).map(([member, rules]): [string, MemberRules] => [
            member,
            toMemberRules(member, rules)
          ])
        )
      })
    );
  }

  return registry;
}

/**
 * Rate catalog plus trade agreement registry.
 *
 * Built once from the two configuration documents and shared read-only by
 * every evaluation. Agreements keep the key order of their document; the
 * classifier scans them in that order.
 */
export class TaxDatabase {
  private readonly rates: ReadonlyMap<string, readonly RateEntry[]>;
  private readonly agreements: ReadonlyMap<string, TradeAgreement>;

  private constructor(rates: Map<string, readonly RateEntry[]>, agreements: Map<string, TradeAgreement>) {
    this.rates = rates;
    this.agreements = agreements;
    Object.freeze(this);
  }

  /** Accepts either JSON text or already-parsed values. */
  static fromJson(rates: unknown, agreements: unknown): TaxDatabase {
    const rateDocument = parseDocument(rates, rateDocumentSchema, "MALFORMED_RATES", "Rate");
    const agreementDocument = parseDocument(agreements, agreementDocumentSchema, "MALFORMED_AGREEMENTS", "Agreement");

    return new TaxDatabase(buildRateCatalog(rateDocument), buildAgreementRegistry(agreementDocument));
  }

  static fromFiles(ratesPath: string, agreementsPath: string): TaxDatabase {
    return TaxDatabase.fromJson(
      readDocument(ratesPath, "rates"),
      readDocument(agreementsPath, "agreements")
    );
  }

  hasRegion(regionCode: string): boolean {
    return this.rates.has(regionCode);
  }

  getRates(regionCode: string): readonly RateEntry[] {
    const entries = this.rates.get(regionCode);
    if (!entries) {
      throw regionNotFound(regionCode);
    }

    return entries;
  }

  regionCodes(): string[] {
    return [...this.rates.keys()];
  }

  findAgreement(key: string): TradeAgreement | undefined {
    return this.agreements.get(key);
  }

  getAgreement(key: string): TradeAgreement {
    const agreement = this.agreements.get(key);
    if (!agreement) {
      throw agreementNotFound(key);
    }

    return agreement;
  }

  listAgreements(): TradeAgreement[] {
    return [...this.agreements.values()];
  }

  /** Members shared by two agreements of the same kind, where scan order decides the winner. */
  findMemberOverlaps(): MemberOverlap[] {
    const overlaps: MemberOverlap[] = [];
    const agreements = this.listAgreements();

    agreements.forEach((first, index) => {
      for (const second of agreements.slice(index + 1)) {
        if (first.kind !== second.kind) {
          continue;
        }

        for (const firstMember of first.members) {
          for (const secondMember of second.members) {
            const member = sharedMember(firstMember, secondMember);
            if (member !== null) {
              overlaps.push({ member, agreements: [first.key, second.key] });
            }
          }
        }
      }
    });

    return overlaps;
  }
}
