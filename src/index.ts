export * from './types/content.js';
export { ContentStore, getContentStore, BUNDLED_CONTENT_DIR } from './lib/contentStore.js';
export { ConceptLibrary } from './lib/conceptLibrary.js';
export { BudgetPlanner, INCOME_BANDS } from './lib/budgetPlanner.js';
export { SchemeAdvisor, type EligibilityProfile } from './lib/schemeAdvisor.js';
export { InvestmentBasics, sortForDisplay } from './lib/investmentBasics.js';
export { UpiGuide } from './lib/upiGuide.js';
export { createServices, type Services } from './lib/services.js';
export { AppError, ValidationError, NotFoundError, ContentLoadError } from './lib/errors.js';
