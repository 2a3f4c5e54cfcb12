import { BudgetPlanner } from './budgetPlanner.js';
import { ConceptLibrary } from './conceptLibrary.js';
import { getContentStore, type ContentStore } from './contentStore.js';
import { InvestmentBasics } from './investmentBasics.js';
import { SchemeAdvisor } from './schemeAdvisor.js';
import { UpiGuide } from './upiGuide.js';

export interface Services {
  concepts: ConceptLibrary;
  budget: BudgetPlanner;
  schemes: SchemeAdvisor;
  investments: InvestmentBasics;
  upi: UpiGuide;
}

export function createServices(store: ContentStore = getContentStore()): Services {
  return {
    concepts: new ConceptLibrary(store),
    budget: new BudgetPlanner(),
    schemes: new SchemeAdvisor(store),
    investments: new InvestmentBasics(store),
    upi: new UpiGuide(store),
  };
}
