/**
 * Walks through every content component against the bundled data.
 * Run: npx tsx scripts/quickstart.ts
 */
import { createServices } from '../src/lib/services.js';
import { sortForDisplay } from '../src/lib/investmentBasics.js';
import { formatRupees, DISCLAIMER } from '../src/cli/format.js';
import { LiteracyLevel } from '../src/types/content.js';

const { concepts, budget, schemes, upi, investments } = createServices();

function section(title: string) {
  console.log(`\n${'='.repeat(60)}\n${title}\n${'='.repeat(60)}`);
}

function demoConcepts() {
  section('Concept library');
  console.log(`Concepts in library: ${concepts.all().length}`);

  for (const topic of concepts.topics()) {
    for (const level of LiteracyLevel.options) {
      const titles = concepts.byTopicAndLevel(topic, level).map(concept => concept.title);
      if (titles.length > 0) {
        console.log(`  [${topic} / ${level}] ${titles.join(', ')}`);
      }
    }
  }

  console.log("\nSearch 'SIP':");
  for (const concept of concepts.search('SIP')) {
    console.log(`  - ${concept.title} [${concept.level}]`);
  }
}

function demoBudget() {
  section('Budget planner');
  const incomes: Array<[number, string]> = [
    [12000, 'Informal worker'],
    [22000, 'Entry-level salaried'],
    [40000, 'Mid-level salaried'],
    [75000, 'Senior professional'],
    [150000, 'High income'],
  ];

  for (const [income, label] of incomes) {
    const plan = budget.plan(income);
    const pct = (amount: number) => `${Math.round((amount / income) * 100)}%`;
    console.log(
      `${formatRupees(income).padStart(12)}  needs ${pct(plan.allocations.needs)}` +
      `  wants ${pct(plan.allocations.wants)}  savings ${pct(plan.savings_target)}  # ${label}`
    );
  }

  const plan = budget.plan(35000);
  const emergencyFund = plan.allocations.needs * plan.emergency_fund_months;
  console.log(`\nRs 35,000/month: emergency fund goal ${plan.emergency_fund_months} months = ${formatRupees(emergencyFund)}`);
  plan.recommendations.forEach((recommendation, index) => console.log(`  ${index + 1}. ${recommendation}`));
}

function demoSchemes() {
  section('Government scheme advisor');
  const profiles = [
    { label: '40-year-old farmer', age: 40, occupation: 'farmer' },
    { label: '30-year-old salaried employee', age: 30, occupation: 'salaried' },
    { label: '62-year-old retiree', age: 62 },
    { label: '8-year-old girl child', age: 8 },
  ];

  for (const { label, ...profile } of profiles) {
    const eligible = schemes.findEligible(profile);
    console.log(`\n${label}: ${eligible.length} eligible scheme(s)`);
    eligible.forEach(scheme => console.log(`  - ${scheme.name}`));
  }

  const scheme = schemes.getScheme('Suraksha Bima');
  if (scheme) {
    console.log(`\n${scheme.name}\n  ${scheme.benefits}\n  Apply: ${scheme.how_to_apply}`);
  }
}

function demoUpi() {
  section('UPI guide');
  console.log(`Topics: ${upi.availableTopics().join(', ')}`);

  const security = upi.getGuide('security');
  if (security) {
    console.log(`\n${security.topic}`);
    security.steps.forEach(step => console.log(`  ${step}`));
    security.warnings.forEach(warning => console.log(`  !! ${warning}`));
  }
}

function demoInvestments() {
  section('Investment basics');
  for (const option of sortForDisplay(investments.compareAll())) {
    const lockIn = option.lock_in_years > 0 ? `${option.lock_in_years}yr` : 'None';
    console.log(`${option.name.padEnd(32)} ${option.risk_level.padEnd(10)} ${option.expected_return_pct.padEnd(12)} ${lockIn}`);
  }

  console.log(`\nTax-saving options: ${investments.taxSaving().map(option => option.name).join(', ')}`);
  console.log(`Beginner options: ${investments.forBeginner().map(option => option.name).join(', ')}`);
}

console.log(DISCLAIMER);
demoConcepts();
demoBudget();
demoSchemes();
demoUpi();
demoInvestments();
