import { DuplicateRuleError, RuleDefinitionError, UnknownRuleError } from '@tapeval/core';
import { describe, expect, it } from 'vitest';

import { defineRecordRule, pass, type RecordRule } from '../rule.js';
import { RuleRegistry } from '../rule-registry.js';

function stubRule(id: string, fields: string[] = ['loan_number']): RecordRule {
  return defineRecordRule({
    description: `stub ${id}`,
    evaluate: () => pass(),
    fields,
    id,
    severity: 'error',
  });
}

describe('RuleRegistry', () => {
  it('should keep rules in registration order', () => {
    const registry = new RuleRegistry([stubRule('b'), stubRule('a'), stubRule('c')]);

    expect(registry.allRules().map((rule) => rule.id)).toEqual(['b', 'a', 'c']);
    expect(registry.ids()).toEqual(['b', 'a', 'c']);
    expect(registry.size).toBe(3);
  });

  it('should reject a duplicate id', () => {
    const registry = new RuleRegistry([stubRule('channel')]);

    expect(() => registry.register(stubRule('channel'))).toThrow(DuplicateRuleError);
    expect(() => registry.register(stubRule('channel'))).toThrow(
      'Rule "channel" is already registered. Each rule must have a unique id.'
    );
    expect(registry.size).toBe(1);
  });

  it('should reject duplicates passed to the constructor', () => {
    expect(() => new RuleRegistry([stubRule('x'), stubRule('x')])).toThrow(DuplicateRuleError);
  });

  it('should reject malformed rules', () => {
    const registry = new RuleRegistry();

    expect(() => registry.register(stubRule('  '))).toThrow(RuleDefinitionError);
    expect(() => registry.register({ ...stubRule('v'), version: 0 })).toThrow('Rule "v" has invalid version 0');
    expect(() => registry.register({ ...stubRule('o'), optionalFields: ['state'] })).toThrow(
      'Rule "o" marks fields it does not read as optional: state'
    );
  });

  it('should find rules by field', () => {
    const registry = new RuleRegistry([
      stubRule('ltv', ['original_ltv', 'original_loan_amount']),
      stubRule('amount', ['original_loan_amount']),
      stubRule('state', ['state']),
    ]);

    expect(registry.rulesFor('original_loan_amount').map((rule) => rule.id)).toEqual(['ltv', 'amount']);
    expect(registry.rulesFor('gross_margin')).toEqual([]);
  });

  it('should look up rules by id', () => {
    const registry = new RuleRegistry([stubRule('a')]);

    expect(registry.get('a')?.description).toBe('stub a');
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.has('a')).toBe(true);
    expect(registry.has('missing')).toBe(false);
  });

  it('should not expose its internal list', () => {
    const registry = new RuleRegistry([stubRule('a')]);

    expect(Object.isFrozen(registry.allRules())).toBe(true);
  });

  describe('select', () => {
    const registry = new RuleRegistry([stubRule('a'), stubRule('b'), stubRule('c')]);

    it('should keep only the listed rules in registry order', () => {
      expect(registry.select({ only: ['c', 'a'] }).ids()).toEqual(['a', 'c']);
    });

    it('should drop skipped rules', () => {
      expect(registry.select({ skip: ['b'] }).ids()).toEqual(['a', 'c']);
    });

    it('should apply skip after only', () => {
      expect(registry.select({ only: ['a', 'b'], skip: ['a'] }).ids()).toEqual(['b']);
    });

    it('should keep everything for an empty selection', () => {
      expect(registry.select({}).ids()).toEqual(['a', 'b', 'c']);
    });

    it('should leave the source registry untouched', () => {
      registry.select({ skip: ['a'] });

      expect(registry.size).toBe(3);
    });

    it('should reject unknown ids', () => {
      expect(() => registry.select({ only: ['a', 'nope'], skip: ['zap'] })).toThrow(UnknownRuleError);
      expect(() => registry.select({ only: ['a', 'nope'], skip: ['zap'] })).toThrow('Unknown rule ids: nope, zap');
    });
  });
});
