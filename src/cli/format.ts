import {
  BudgetCategory,
  type BudgetPlan,
  type Concept,
  type InvestmentOption,
  type Scheme,
  type UpiGuideEntry,
} from '../types/content.js';

export const DISCLAIMER =
  'IMPORTANT: Interest rates and returns mentioned are indicative and subject to change. ' +
  'Past performance does not guarantee future results. ' +
  'This tool does not provide SEBI-registered investment advisory. ' +
  'Verify all financial information with official sources before making decisions.';

const rupees = new Intl.NumberFormat('en-IN', { maximumFractionDigits: 0 });

export function formatRupees(amount: number): string {
  return `Rs ${rupees.format(amount)}`;
}

const rule = (width: number) => '='.repeat(width);

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function renderConcepts(concepts: readonly Concept[]): string[] {
  const lines: string[] = [];

  for (const concept of concepts) {
    lines.push('', rule(60), `  ${concept.title}`, `  Topic: ${concept.topic} | Level: ${concept.level}`, rule(60));
    lines.push('', concept.explanation, '');

    if (concept.examples.length > 0) {
      lines.push('Examples:');
      for (const example of concept.examples) {
        lines.push(`  - ${example}`);
      }
    }
    if (concept.key_terms.length > 0) {
      lines.push('', `Key terms: ${concept.key_terms.join(', ')}`);
    }
  }

  lines.push('', `Found ${concepts.length} concept(s).`);
  return lines;
}

export function renderBudgetPlan(plan: BudgetPlan): string[] {
  const lines = ['', rule(50), `  Budget Plan for ${formatRupees(plan.income)}/month`, rule(50), ''];

  for (const category of BudgetCategory.options) {
    const amount = plan.allocations[category];
    const pct = Math.round((amount / plan.income) * 100);
    const label = category.toUpperCase().padEnd(12);
    lines.push(`  ${label}: Rs ${rupees.format(amount).padStart(10)}  (${pct}%)`);
  }

  lines.push(
    '',
    `  Savings target: ${formatRupees(plan.savings_target)}/month`,
    `  Emergency fund goal: ${plan.emergency_fund_months} months of expenses`,
    '',
    'Recommendations:',
  );
  plan.recommendations.forEach((recommendation, index) => {
    lines.push(`  ${index + 1}. ${recommendation}`);
  });

  return lines;
}

export function renderScheme(scheme: Scheme): string[] {
  return [
    `  ${rule(55)}`,
    `  ${scheme.name}`,
    `  ${rule(55)}`,
    `  ${scheme.description}`,
    '',
    `  Eligibility: ${scheme.eligibility}`,
    `  Benefits: ${scheme.benefits}`,
    `  How to apply: ${scheme.how_to_apply}`,
    '',
  ];
}

export function renderSchemes(schemes: readonly Scheme[]): string[] {
  return ['', `Found ${schemes.length} eligible scheme(s):`, '', ...schemes.flatMap(renderScheme)];
}

export function renderUpiGuide(entry: UpiGuideEntry): string[] {
  const lines = ['', rule(50), `  ${entry.topic}`, rule(50), ''];
  lines.push(...entry.steps.map(step => `  ${step}`));

  if (entry.tips.length > 0) {
    lines.push('', 'Tips:', ...entry.tips.map(tip => `  * ${tip}`));
  }
  if (entry.warnings.length > 0) {
    lines.push('', 'Warnings:', ...entry.warnings.map(warning => `  ! ${warning}`));
  }

  return lines;
}

export function renderInvestmentTable(options: readonly InvestmentOption[]): string[] {
  const header = [
    'Investment'.padEnd(30),
    'Risk'.padEnd(10),
    'Return'.padEnd(10),
    'Lock-in'.padEnd(10),
    'Tax Benefit'.padEnd(12),
    'Min Invest',
  ].join(' ');

  const rows = options.map(option => {
    const lockIn = option.lock_in_years > 0 ? `${option.lock_in_years}yr` : 'None';
    const tax = option.tax_benefit ? 'Yes (80C)' : 'No';
    return [
      option.name.padEnd(30),
      option.risk_level.padEnd(10),
      option.expected_return_pct.padEnd(10),
      lockIn.padEnd(10),
      tax.padEnd(12),
      formatRupees(option.min_investment),
    ].join(' ');
  });

  return ['', header, '-'.repeat(95), ...rows];
}
