import { z } from "zod";

export const taxKindSchema = z.enum([
  "vat_standard",
  "vat_reduced",
  "vat_reduced_alt",
  "vat_super_reduced",
  "vat_parking",
  "vat_zero",
  "vat_exempt",
  "vat_reverse_charge",
  "gst",
  "hst",
  "pst",
  "qst",
  "state_sales_tax",
  "sales_tax"
]);

export const regionCodeSchema = z.string().regex(/^[A-Z]{2}(-[A-Z0-9]{1,3})?$/, "Expected CC or CC-SUB region code");

const rateEntrySchema = z.object({
  tax_kind: taxKindSchema,
  rate: z.number().min(0).max(1),
  compound: z.boolean().default(false)
});

export const rateDocumentSchema = z.record(regionCodeSchema, z.array(rateEntrySchema));

const simpleRuleTypeSchema = z.enum(["origin", "destination", "reverse_charge", "zero_rated", "none", "exempt"]);

const simpleRuleObjectSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("origin") }),
  z.object({ type: z.literal("destination") }),
  z.object({ type: z.literal("reverse_charge") }),
  z.object({ type: z.literal("zero_rated") }),
  z.object({ type: z.literal("none") }),
  z.object({
    type: z.literal("exempt"),
    requires_resale_certificate: z.boolean().optional(),
    requires_registration: z.boolean().optional()
  })
]);

export const simpleRuleSchema = z.union([simpleRuleTypeSchema, simpleRuleObjectSchema]);

export const thresholdRuleSchema = z.object({
  type: z.literal("threshold_based"),
  threshold: z.number().min(0),
  below: simpleRuleSchema,
  above: simpleRuleSchema,
  threshold_digital: z.number().min(0).optional(),
  below_digital: simpleRuleSchema.optional(),
  above_digital: simpleRuleSchema.optional()
});

export const agreementRuleSchema = z.union([thresholdRuleSchema, simpleRuleSchema]);

const memberRulesSchema = z.object({
  internal_b2b: agreementRuleSchema.optional(),
  internal_b2c: agreementRuleSchema.optional()
});

export const tradeAgreementSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["customs_union", "federal_state"]),
    members: z.array(regionCodeSchema).min(1),
    applies_to: z
      .object({
        physical_goods: z.boolean(),
        digital_goods: z.boolean(),
        services: z.boolean()
      })
      .optional(),
    tax_rules: z.object({
      internal_b2b: agreementRuleSchema.nullable().optional(),
      internal_b2c: agreementRuleSchema.nullable().optional(),
      external_export: agreementRuleSchema
    }),
    member_rules: z.record(regionCodeSchema, memberRulesSchema).optional()
  })
  .superRefine((agreement, context) => {
    for (const member of Object.keys(agreement.member_rules ?? {})) {
      if (!agreement.members.includes(member)) {
        context.addIssue({
          code: "custom",
          path: ["member_rules", member],
          message: `${member} is not a member of the agreement`
        });
      }
    }
  });

export const agreementDocumentSchema = z.record(z.string().min(1), tradeAgreementSchema);

export type RateDocument = z.infer<typeof rateDocumentSchema>;
export type AgreementDocument = z.infer<typeof agreementDocumentSchema>;
export type RawSimpleRule = z.infer<typeof simpleRuleSchema>;
export type RawAgreementRule = z.infer<typeof agreementRuleSchema>;
export type RawMemberRules = z.infer<typeof memberRulesSchema>;
