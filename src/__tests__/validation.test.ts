import { describe, it, expect } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import {
  BudgetOptions,
  InvestOptions,
  LearnOptions,
  SchemesOptions,
  UpiOptions,
  parseInput,
} from '../middleware/validation.js';

describe('Boundary validation', () => {
  describe('LearnOptions', () => {
    it('accepts known topics and levels', () => {
      expect(parseInput(LearnOptions, { topic: 'digital_payments', level: 'beginner' })).toEqual({
        topic: 'digital_payments',
        level: 'beginner',
        search: undefined,
        json: false,
      });
    });

    it('rejects an unknown topic', () => {
      expect(() => parseInput(LearnOptions, { topic: 'crypto' })).toThrow(ValidationError);
    });

    it('treats a blank topic as absent', () => {
      expect(parseInput(LearnOptions, { topic: '' }).topic).toBeUndefined();
    });
  });

  describe('BudgetOptions', () => {
    it('coerces numeric strings', () => {
      expect(parseInput(BudgetOptions, { income: '30000' })).toEqual({ income: 30000, json: false });
    });

    it.each(['0', '-10', 'abc', undefined])('rejects income %s', income => {
      expect(() => parseInput(BudgetOptions, { income })).toThrow(ValidationError);
    });

    it('names the field in the error', () => {
      try {
        parseInput(BudgetOptions, { income: '0' }, 'budget options');
        expect.unreachable('zero income should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.message).toBe('Invalid budget options: income: Income must be greater than zero');
          expect(error.details).toEqual([{ field: 'income', message: 'Income must be greater than zero' }]);
          expect(error.exitCode).toBe(2);
          expect(error.statusCode).toBe(400);
        }
      }
    });
  });

  describe('SchemesOptions', () => {
    it('parses age, income and occupation', () => {
      expect(parseInput(SchemesOptions, { age: '45', income: '250000', occupation: ' farmer ' })).toEqual({
        age: 45,
        income: 250000,
        occupation: 'farmer',
        name: undefined,
        json: false,
      });
    });

    it('leaves blank values undefined', () => {
      const options = parseInput(SchemesOptions, { age: '', occupation: '   ' });
      expect(options.age).toBeUndefined();
      expect(options.occupation).toBeUndefined();
    });

    it.each(['4.5', '-1', 'old'])('rejects age %s', age => {
      expect(() => parseInput(SchemesOptions, { age })).toThrow(ValidationError);
    });
  });

  describe('UpiOptions', () => {
    it('requires a known topic', () => {
      expect(parseInput(UpiOptions, { topic: 'limits' }).topic).toBe('limits');
      expect(() => parseInput(UpiOptions, {})).toThrow(ValidationError);
      expect(() => parseInput(UpiOptions, { topic: 'refunds' })).toThrow(ValidationError);
    });
  });

  describe('InvestOptions', () => {
    it('reads flags from booleans and query strings', () => {
      expect(parseInput(InvestOptions, { taxSaving: true, beginner: 'false', json: '1' })).toEqual({
        risk: undefined,
        taxSaving: true,
        beginner: false,
        json: true,
      });
    });

    it('rejects an unknown risk level', () => {
      expect(() => parseInput(InvestOptions, { risk: 'extreme' })).toThrow(ValidationError);
    });

    it('rejects a malformed flag', () => {
      expect(() => parseInput(InvestOptions, { taxSaving: 'yes' })).toThrow(ValidationError);
    });
  });
});
