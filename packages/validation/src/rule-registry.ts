import { DuplicateRuleError, RuleDefinitionError, UnknownRuleError } from '@tapeval/core';

import { SEVERITIES, type Rule } from './rule.js';

export interface RuleSelection {
  /** Keep only these rule ids */
  only?: readonly string[] | undefined;
  /** Drop these rule ids */
  skip?: readonly string[] | undefined;
}

/**
 * Ordered collection of rules.
 *
 * Built explicitly and passed by reference: there is no global registry, so
 * several rule sets can coexist and tests can build minimal ones.
 */
export class RuleRegistry {
  private readonly rules = new Map<string, Rule>();

  constructor(rules: Iterable<Rule> = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Register a rule
   *
   * @throws DuplicateRuleError when the id is taken
   * @throws RuleDefinitionError when the rule is malformed
   */
  register(rule: Rule): void {
    if (rule.id.trim() === '') {
      throw new RuleDefinitionError('Rule id must not be empty', { context: { description: rule.description } });
    }
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    if (!Number.isInteger(rule.version) || rule.version < 1) {
      throw new RuleDefinitionError(`Rule "${rule.id}" has invalid version ${rule.version}`, {
        context: { ruleId: rule.id },
      });
    }
    if (!SEVERITIES.includes(rule.severity)) {
      throw new RuleDefinitionError(`Rule "${rule.id}" has unknown severity "${String(rule.severity)}"`, {
        context: { ruleId: rule.id },
      });
    }
    const unknownOptional = (rule.optionalFields ?? []).filter((field) => !rule.fields.includes(field));
    if (unknownOptional.length > 0) {
      throw new RuleDefinitionError(
        `Rule "${rule.id}" marks fields it does not read as optional: ${unknownOptional.join(', ')}`,
        { context: { ruleId: rule.id } }
      );
    }

    this.rules.set(rule.id, rule);
  }

  /**
   * Every rule in registration order
   */
  allRules(): readonly Rule[] {
    return Object.freeze([...this.rules.values()]);
  }

  /**
   * Rules that read the given field
   */
  rulesFor(fieldName: string): Rule[] {
    return [...this.rules.values()].filter((rule) => rule.fields.includes(fieldName));
  }

  get(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  ids(): string[] {
    return [...this.rules.keys()];
  }

  get size(): number {
    return this.rules.size;
  }

  /**
   * A new registry holding the selected rules, in the original order
   *
   * @throws UnknownRuleError when a listed id is not registered
   */
  select(selection: RuleSelection): RuleRegistry {
    const listed = [...(selection.only ?? []), ...(selection.skip ?? [])];
    const unknown = [...new Set(listed.filter((id) => !this.rules.has(id)))];
    if (unknown.length > 0) {
      throw new UnknownRuleError(unknown);
    }

    const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : undefined;
    const skip = new Set(selection.skip ?? []);
    return new RuleRegistry(
      [...this.rules.values()].filter((rule) => (only === undefined || only.has(rule.id)) && !skip.has(rule.id))
    );
  }
}
