import { z } from 'zod';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';
import type { BudgetPlan } from '../types/content.js';

interface IncomeBand {
  /** Exclusive upper bound on monthly income; the last band has none. */
  below: number;
  needsPct: number;
  wantsPct: number;
  savingsPct: number;
  recommendations: readonly string[];
}

export const INCOME_BANDS: readonly IncomeBand[] = [
  {
    below: 15000,
    needsPct: 65,
    wantsPct: 15,
    savingsPct: 20,
    recommendations: [
      'At this income, prioritize essential needs and build a small emergency buffer.',
      "Open a Jan Dhan account if you don't have a bank account.",
      'Enroll in PM Suraksha Bima (Rs 20/year) for accident cover.',
    ],
  },
  {
    below: 25000,
    needsPct: 55,
    wantsPct: 20,
    savingsPct: 25,
    recommendations: [
      'Start a small RD of Rs 500-1000/month to build savings habit.',
      'Get health insurance (at least Rs 3L family floater).',
      'Consider Atal Pension Yojana for retirement security.',
    ],
  },
  {
    below: 50000,
    needsPct: 50,
    wantsPct: 25,
    savingsPct: 25,
    recommendations: [
      'Start a SIP of Rs 2000-5000/month in an index fund.',
      'Build emergency fund of 3-6 months expenses in liquid fund or FD.',
      'Maximize Section 80C deduction with PPF + ELSS.',
    ],
  },
  {
    below: 100000,
    needsPct: 45,
    wantsPct: 25,
    savingsPct: 30,
    recommendations: [
      'Increase SIP to 20-30% of income across equity and debt funds.',
      'Consider NPS for additional Rs 50K tax deduction under 80CCD(1B).',
      'Get term life insurance of Rs 1 Crore if you have dependents.',
    ],
  },
  {
    below: Number.POSITIVE_INFINITY,
    needsPct: 40,
    wantsPct: 25,
    savingsPct: 35,
    recommendations: [
      'Diversify investments: equity mutual funds, NPS, PPF, gold bonds.',
      'Consider hiring a SEBI-registered financial advisor.',
      'Review and optimize tax strategy between old and new regime.',
    ],
  },
];

const SMALL_EMERGENCY_FUND_BELOW = 25000;

export const MonthlyIncomeSchema = z.number({ invalid_type_error: 'Income must be a number' })
  .finite('Income must be a finite number')
  .positive('Income must be greater than zero');

// Beyond this magnitude a double has no paise left to round.
const PAISE_PRECISION_LIMIT = Number.MAX_SAFE_INTEGER / 100;

function roundToPaise(amount: number): number {
  if (Math.abs(amount) >= PAISE_PRECISION_LIMIT) return amount;
  return Math.round(amount * 100) / 100;
}

export function bandFor(monthlyIncome: number): IncomeBand {
  const band = INCOME_BANDS.find(candidate => monthlyIncome < candidate.below);
  return band ?? INCOME_BANDS[INCOME_BANDS.length - 1];
}

/**
 * Splits a monthly income into needs/wants/savings using the band the income
 * falls in. Savings takes the rounding remainder so the three amounts always
 * add back up to the income.
 */
export class BudgetPlanner {
  plan(monthlyIncome: number): BudgetPlan {
    const parsed = MonthlyIncomeSchema.safeParse(monthlyIncome);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.errors[0].message, [
        { field: 'income', message: parsed.error.errors[0].message },
      ]);
    }

    const income = parsed.data;
    const band = bandFor(income);

    const needs = roundToPaise(income * (band.needsPct / 100));
    const wants = roundToPaise(income * (band.wantsPct / 100));
    const savings = Math.max(0, roundToPaise(income - needs - wants));

    logger.debug({ income, band: band.below, needs, wants, savings }, 'Budget plan computed');

    return {
      income,
      allocations: { needs, wants, savings },
      recommendations: [...band.recommendations],
      savings_target: savings,
      emergency_fund_months: income < SMALL_EMERGENCY_FUND_BELOW ? 3 : 6,
    };
  }
}
