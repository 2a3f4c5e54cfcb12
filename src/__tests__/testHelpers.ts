import { ContentStore, type RawTables } from '../lib/contentStore.js';
import { createServices, type Services } from '../lib/services.js';
import type { CliContext } from '../cli/types.js';
import type { Concept, InvestmentOption, Scheme, UpiGuideEntry } from '../types/content.js';

export const createMockConcept = (overrides: Partial<Concept> = {}): Concept => ({
  topic: 'savings',
  title: 'Test Concept',
  explanation: 'A concept used only in tests.',
  examples: [],
  level: 'beginner',
  key_terms: [],
  ...overrides,
});

export const createMockScheme = (overrides: Partial<Scheme> = {}): Scheme => ({
  name: 'Test Scheme',
  description: 'A scheme used only in tests.',
  eligibility: 'Anyone',
  benefits: 'None',
  how_to_apply: 'Nowhere',
  ministry: 'Ministry of Testing',
  min_age: null,
  max_age: null,
  income_limit: null,
  target_group: 'all',
  ...overrides,
});

export const createMockInvestment = (overrides: Partial<InvestmentOption> = {}): InvestmentOption => ({
  name: 'Test Fund',
  risk_level: 'low',
  expected_return_pct: '5%',
  lock_in_years: 0,
  tax_benefit: false,
  min_investment: 100,
  description: 'An investment used only in tests.',
  ...overrides,
});

export const createMockGuide = (overrides: Partial<UpiGuideEntry> = {}): UpiGuideEntry => ({
  topic: 'Test Guide',
  steps: ['1. Do the thing'],
  tips: [],
  warnings: [],
  ...overrides,
});

export const createStore = (overrides: Partial<RawTables> = {}): ContentStore =>
  ContentStore.fromTables({
    concepts: [],
    schemes: [],
    investments: [],
    upiGuides: {},
    ...overrides,
  });

export interface CapturedCli {
  ctx: CliContext;
  stdout: () => string;
  stderr: () => string;
}

export const createCliHarness = (services: Services = createServices(), showDisclaimer = true): CapturedCli => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    ctx: {
      services,
      io: {
        stdout: text => { out.push(text); },
        stderr: text => { err.push(text); },
      },
      showDisclaimer,
    },
    stdout: () => out.join('\n'),
    stderr: () => err.join('\n'),
  };
};
