import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const FinancialTopic = z.enum([
  'savings',
  'insurance',
  'investment',
  'credit',
  'taxation',
  'digital_payments',
]);
export type FinancialTopic = z.infer<typeof FinancialTopic>;

export const LiteracyLevel = z.enum(['beginner', 'intermediate', 'advanced']);
export type LiteracyLevel = z.infer<typeof LiteracyLevel>;

export const RiskLevel = z.enum(['low', 'moderate', 'high']);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const UpiTopic = z.enum(['setup', 'security', 'disputes', 'limits']);
export type UpiTopic = z.infer<typeof UpiTopic>;

export const BudgetCategory = z.enum(['needs', 'wants', 'savings']);
export type BudgetCategory = z.infer<typeof BudgetCategory>;

// ============================================================================
// CONTENT RECORDS
// Field names are the JSON wire names; keep them stable for downstream consumers.
// ============================================================================

export const ConceptSchema = z.object({
  topic: FinancialTopic,
  title: z.string().min(1),
  explanation: z.string().min(1),
  examples: z.array(z.string()).default([]),
  level: LiteracyLevel,
  key_terms: z.array(z.string()).default([]),
});
export type Concept = z.infer<typeof ConceptSchema>;

export const SchemeSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  eligibility: z.string(),
  benefits: z.string(),
  how_to_apply: z.string(),
  ministry: z.string().default(''),
  min_age: z.number().int().nonnegative().nullable().default(null),
  max_age: z.number().int().nonnegative().nullable().default(null),
  income_limit: z.number().positive().nullable().default(null),
  target_group: z.string().default(''),
});
export type Scheme = z.infer<typeof SchemeSchema>;

export const InvestmentOptionSchema = z.object({
  name: z.string().min(1),
  risk_level: RiskLevel,
  expected_return_pct: z.string(),
  lock_in_years: z.number().nonnegative(),
  tax_benefit: z.boolean(),
  min_investment: z.number().positive(),
  description: z.string(),
});
export type InvestmentOption = z.infer<typeof InvestmentOptionSchema>;

export const UpiGuideEntrySchema = z.object({
  topic: z.string().min(1),
  steps: z.array(z.string()).min(1),
  tips: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
});
export type UpiGuideEntry = z.infer<typeof UpiGuideEntrySchema>;

export const BudgetPlanSchema = z.object({
  income: z.number().positive(),
  allocations: z.object({
    needs: z.number().nonnegative(),
    wants: z.number().nonnegative(),
    savings: z.number().nonnegative(),
  }),
  recommendations: z.array(z.string()),
  savings_target: z.number().nonnegative(),
  emergency_fund_months: z.number().int(),
});
export type BudgetPlan = z.infer<typeof BudgetPlanSchema>;

// ============================================================================
// TABLE FILES
// ============================================================================

export const ConceptTableSchema = z.array(ConceptSchema);
export const SchemeTableSchema = z.array(SchemeSchema);
export const InvestmentTableSchema = z.array(InvestmentOptionSchema);
export const UpiGuideTableSchema = z.record(z.string().min(1), UpiGuideEntrySchema);

export interface ContentTables {
  concepts: readonly Concept[];
  schemes: readonly Scheme[];
  investments: readonly InvestmentOption[];
  upiGuides: Readonly<Record<string, UpiGuideEntry>>;
}
