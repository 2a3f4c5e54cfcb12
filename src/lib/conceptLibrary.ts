import { logger } from './logger.js';
import type { ContentStore } from './contentStore.js';
import { FinancialTopic, type Concept, type LiteracyLevel } from '../types/content.js';

/**
 * Filters and searches the concept table. Every method returns a new array
 * in table order.
 */
export class ConceptLibrary {
  constructor(private readonly store: ContentStore) {}

  byTopic(topic: FinancialTopic): Concept[] {
    return this.store.concepts.filter(concept => concept.topic === topic);
  }

  byLevel(level: LiteracyLevel): Concept[] {
    return this.store.concepts.filter(concept => concept.level === level);
  }

  byTopicAndLevel(topic: FinancialTopic, level: LiteracyLevel): Concept[] {
    return this.store.concepts.filter(concept => concept.topic === topic && concept.level === level);
  }

  /** Case-insensitive substring match on title or explanation. An empty query matches everything. */
  search(query: string): Concept[] {
    const needle = query.toLowerCase();
    const results = this.store.concepts.filter(concept =>
      concept.title.toLowerCase().includes(needle) ||
      concept.explanation.toLowerCase().includes(needle)
    );

    logger.debug({ query, matches: results.length }, 'Concept search');
    return results;
  }

  all(): Concept[] {
    return [...this.store.concepts];
  }

  topics(): FinancialTopic[] {
    return FinancialTopic.options.filter(topic =>
      this.store.concepts.some(concept => concept.topic === topic)
    );
  }
}
