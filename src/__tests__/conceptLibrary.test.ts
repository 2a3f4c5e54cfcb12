import { describe, it, expect, beforeEach } from 'vitest';
import { ConceptLibrary } from '../lib/conceptLibrary.js';
import { ContentStore } from '../lib/contentStore.js';
import { createMockConcept, createStore } from './testHelpers.js';

describe('ConceptLibrary', () => {
  describe('with the bundled content', () => {
    let library: ConceptLibrary;

    beforeEach(() => {
      library = new ConceptLibrary(ContentStore.load());
    });

    it('returns savings concepts in table order', () => {
      expect(library.byTopic('savings').map(concept => concept.title)).toEqual([
        'Savings Account',
        'Fixed Deposit (FD)',
        'Recurring Deposit (RD)',
        'Public Provident Fund (PPF)',
      ]);
    });

    it('filters by level', () => {
      expect(library.byLevel('intermediate').map(concept => concept.title)).toEqual([
        'Public Provident Fund (PPF)',
        'Mutual Funds',
        'National Pension System (NPS)',
        'Personal Loan vs Credit Card',
        'Section 80C Deductions',
      ]);
      expect(library.byLevel('advanced')).toEqual([]);
    });

    it('combines topic and level filters', () => {
      const results = library.byTopicAndLevel('savings', 'beginner');
      expect(results).toHaveLength(3);
      expect(results.every(concept => concept.topic === 'savings' && concept.level === 'beginner')).toBe(true);
    });

    it('searches title and explanation case-insensitively', () => {
      const upper = library.search('UPI');
      const lower = library.search('upi');
      expect(upper).toEqual(lower);
      expect(upper.map(concept => concept.title)).toEqual([
        'UPI (Unified Payments Interface)',
        'Digital Payment Security',
      ]);
    });

    it('matches on explanation text', () => {
      expect(library.search('PIN').map(concept => concept.title)).toEqual(['Digital Payment Security']);
    });

    it('returns an empty list when nothing matches', () => {
      expect(library.search('xyznonexistentterm')).toEqual([]);
    });

    it('treats an empty query as match-all', () => {
      expect(library.search('')).toHaveLength(16);
    });

    it('returns independent copies from all()', () => {
      const first = library.all();
      const second = library.all();

      expect(first).toEqual(second);
      expect(first).not.toBe(second);

      first.pop();
      expect(second).toHaveLength(16);
      expect(library.all()).toHaveLength(16);
    });

    it('lists topics that have content', () => {
      expect(library.topics()).toEqual([
        'savings',
        'insurance',
        'investment',
        'credit',
        'taxation',
        'digital_payments',
      ]);
    });
  });

  it('omits topics without concepts', () => {
    const library = new ConceptLibrary(createStore({
      concepts: [
        createMockConcept({ topic: 'credit', title: 'Credit' }),
        createMockConcept({ topic: 'savings', title: 'Savings' }),
      ],
    }));

    expect(library.topics()).toEqual(['savings', 'credit']);
  });

  it('does not expose the stored records for mutation', () => {
    const library = new ConceptLibrary(createStore({ concepts: [createMockConcept()] }));
    const [concept] = library.all();

    expect(Object.isFrozen(concept)).toBe(true);
    expect(() => concept.examples.push('changed')).toThrow(TypeError);
  });
});
