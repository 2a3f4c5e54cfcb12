import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { FinancialTopic, LiteracyLevel, RiskLevel, UpiTopic } from '../types/content.js';

// Blank strings from a query string or an empty flag count as "not given".
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// Common validation schemas
export const CommonSchemas = {
  income: z.coerce.number({ invalid_type_error: 'Income must be a number' })
    .finite('Income must be a finite number')
    .positive('Income must be greater than zero'),

  optionalIncome: z.preprocess(
    blankToUndefined,
    z.coerce.number({ invalid_type_error: 'Income must be a number' })
      .finite('Income must be a finite number')
      .nonnegative('Income cannot be negative')
      .optional(),
  ),

  age: z.preprocess(
    blankToUndefined,
    z.coerce.number({ invalid_type_error: 'Age must be a number' })
      .int('Age must be a whole number')
      .min(0, 'Age cannot be negative')
      .max(150, 'Age too large')
      .optional(),
  ),

  text: z.preprocess(
    blankToUndefined,
    z.string().trim().max(200, 'Value too long').optional(),
  ),

  flag: z.union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .optional()
    .transform(val => val === true || val === 'true' || val === '1'),
};

// Per-command option schemas, shared by the CLI and the HTTP routes
export const LearnOptions = z.object({
  topic: z.preprocess(blankToUndefined, FinancialTopic.optional()),
  level: z.preprocess(blankToUndefined, LiteracyLevel.optional()),
  search: z.string().optional(),
  json: CommonSchemas.flag,
});
export type LearnOptions = z.infer<typeof LearnOptions>;

export const BudgetOptions = z.object({
  income: CommonSchemas.income,
  json: CommonSchemas.flag,
});
export type BudgetOptions = z.infer<typeof BudgetOptions>;

export const SchemesOptions = z.object({
  age: CommonSchemas.age,
  income: CommonSchemas.optionalIncome,
  occupation: CommonSchemas.text,
  name: CommonSchemas.text,
  json: CommonSchemas.flag,
});
export type SchemesOptions = z.infer<typeof SchemesOptions>;

export const UpiOptions = z.object({
  topic: UpiTopic,
  json: CommonSchemas.flag,
});
export type UpiOptions = z.infer<typeof UpiOptions>;

export const InvestOptions = z.object({
  risk: z.preprocess(blankToUndefined, RiskLevel.optional()),
  taxSaving: CommonSchemas.flag,
  beginner: CommonSchemas.flag,
  json: CommonSchemas.flag,
});
export type InvestOptions = z.infer<typeof InvestOptions>;

/**
 * Parses untrusted input (CLI flags, query strings) into typed options.
 * Throws a ValidationError listing every failing field.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label = 'input'): T {
  const validation = schema.safeParse(data);

  if (!validation.success) {
    const details = validation.error.errors.map(err => ({
      field: err.path.join('.') || label,
      message: err.message,
    }));

    logger.debug({ label, validationErrors: details }, 'Input validation failed');

    const summary = details.map(detail => `${detail.field}: ${detail.message}`).join('; ');
    throw new ValidationError(`Invalid ${label}: ${summary}`, details);
  }

  return validation.data;
}
