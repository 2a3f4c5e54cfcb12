import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, copyFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { BUNDLED_CONTENT_DIR, ContentStore, TABLE_FILES, getContentStore } from '../lib/contentStore.js';
import { ContentLoadError } from '../lib/errors.js';
import { createMockConcept, createStore } from './testHelpers.js';

describe('ContentStore', () => {
  describe('bundled content', () => {
    it('loads all four tables', () => {
      expect(ContentStore.load().counts()).toEqual({
        concepts: 16,
        schemes: 10,
        investments: 9,
        upiGuides: 4,
      });
    });

    it('fills absent optional scheme numbers with null', () => {
      const [jandhan, apy] = ContentStore.load().schemes;
      expect(jandhan.min_age).toBeNull();
      expect(jandhan.income_limit).toBeNull();
      expect(apy.min_age).toBe(18);
      expect(apy.max_age).toBe(40);
      expect(apy.income_limit).toBe(300000);
    });

    it('freezes every record', () => {
      const store = ContentStore.load();
      expect(Object.isFrozen(store.concepts)).toBe(true);
      expect(Object.isFrozen(store.schemes[0])).toBe(true);
      expect(Object.isFrozen(store.upiGuides.setup.steps)).toBe(true);
    });

    it('shares one store for the process', () => {
      expect(getContentStore()).toBe(getContentStore());
    });
  });

  describe('custom content directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'paisa-guide-'));
      for (const file of Object.values(TABLE_FILES)) {
        copyFileSync(path.join(BUNDLED_CONTENT_DIR, file), path.join(dir, file));
      }
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('loads tables from the given directory', () => {
      writeFileSync(path.join(dir, TABLE_FILES.concepts), JSON.stringify([
        { topic: 'credit', title: 'Only Concept', explanation: 'Just one.', level: 'advanced' },
      ]));

      const store = ContentStore.load(dir);
      expect(store.concepts).toEqual([{
        topic: 'credit',
        title: 'Only Concept',
        explanation: 'Just one.',
        examples: [],
        level: 'advanced',
        key_terms: [],
      }]);
      expect(store.counts().schemes).toBe(10);
    });

    it('fails when a file is missing', () => {
      rmSync(path.join(dir, TABLE_FILES.schemes));
      expect(() => ContentStore.load(dir)).toThrow(ContentLoadError);
      expect(() => ContentStore.load(dir)).toThrow(/Cannot read content file .*schemes\.json/);
    });

    it('fails on invalid JSON', () => {
      writeFileSync(path.join(dir, TABLE_FILES.investments), '[{"name": ');
      expect(() => ContentStore.load(dir)).toThrow(/investments\.json is not valid JSON/);
    });
  });

  describe('fromTables', () => {
    it('rejects a concept with an unknown topic', () => {
      try {
        createStore({ concepts: [{ ...createMockConcept(), topic: 'crypto' }] });
        expect.unreachable('unknown topic should fail validation');
      } catch (error) {
        expect(error).toBeInstanceOf(ContentLoadError);
        if (error instanceof ContentLoadError) {
          expect(error.message).toBe('Content table "concepts" failed validation');
          expect(error.details?.[0].field).toBe('concepts.json.0.topic');
          expect(error.exitCode).toBe(1);
        }
      }
    });

    it('rejects a non-positive minimum investment', () => {
      expect(() => createStore({
        investments: [{
          name: 'Broken',
          risk_level: 'low',
          expected_return_pct: '1%',
          lock_in_years: 0,
          tax_benefit: false,
          min_investment: 0,
          description: 'x',
        }],
      })).toThrow(ContentLoadError);
    });

    it('rejects a UPI guide without steps', () => {
      expect(() => createStore({ upiGuides: { setup: { topic: 'Setup', steps: [] } } })).toThrow(ContentLoadError);
    });
  });
});
