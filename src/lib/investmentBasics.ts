import type { ContentStore } from './contentStore.js';
import { RiskLevel, type InvestmentOption } from '../types/content.js';

const RISK_ORDER: Record<RiskLevel, number> = {
  low: 0,
  moderate: 1,
  high: 2,
};

export class InvestmentBasics {
  constructor(private readonly store: ContentStore) {}

  compareAll(): InvestmentOption[] {
    return [...this.store.investments];
  }

  // Takes a plain string: an unrecognised level simply matches nothing.
  byRisk(level: string): InvestmentOption[] {
    return this.store.investments.filter(option => option.risk_level === level);
  }

  taxSaving(): InvestmentOption[] {
    return this.store.investments.filter(option => option.tax_benefit);
  }

  forBeginner(): InvestmentOption[] {
    return this.store.investments.filter(option => option.risk_level === RiskLevel.enum.low);
  }
}

/** Orders by risk (low first), then by name. */
export function sortForDisplay(options: readonly InvestmentOption[]): InvestmentOption[] {
  return [...options].sort((a, b) =>
    RISK_ORDER[a.risk_level] - RISK_ORDER[b.risk_level] || a.name.localeCompare(b.name)
  );
}
