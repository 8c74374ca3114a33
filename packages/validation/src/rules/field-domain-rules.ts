import { hasDomainConstraints, type FieldDefinition, type LoanRecord, type TapeSchema } from '@tapeval/core';
import { Decimal } from 'decimal.js';

import { defineRecordRule, fail, pass, type RecordRule, type RuleVerdict } from '../rule.js';

import { describeValue, notApplicableWhenBlank } from './rule-utils.js';

export const FIELD_DOMAIN_RULE_PREFIX = 'field_domain.';

function isNumericField(field: FieldDefinition): boolean {
  return field.type === 'integer' || field.type === 'decimal';
}

function checkDomain(record: LoanRecord, field: FieldDefinition): RuleVerdict {
  const name = field.name;
  if (record.isMissing(name)) return notApplicableWhenBlank(record, name);
  if (record.isUnparseable(name)) return fail(`${name} is ${describeValue(record, name)}`, [name]);

  if (isNumericField(field)) {
    const value = record.decimal(name);
    if (value === undefined) return fail(`${name} is not numeric`, [name]);
    if (field.min !== undefined && value.lessThan(field.min)) {
      return fail(`${name} ${value.toString()} is below minimum ${field.min}`, [name]);
    }
    if (field.max !== undefined && value.greaterThan(field.max)) {
      return fail(`${name} ${value.toString()} is above maximum ${field.max}`, [name]);
    }
  }

  const allowed = field.allowed ?? [];
  if (allowed.length > 0 && !allowed.some((candidate) => matchesAllowed(record, name, candidate))) {
    return fail(`${name} ${describeValue(record, name)} is not one of ${allowed.join(', ')}`, [name]);
  }
  return pass();
}

function matchesAllowed(record: LoanRecord, name: string, candidate: string | number): boolean {
  const value = record.decimal(name);
  if (typeof candidate === 'number' && value !== undefined) {
    return value.equals(new Decimal(candidate));
  }
  return (record.text(name) ?? '').trim().toLowerCase() === String(candidate).trim().toLowerCase();
}

/**
 * One rule per schema field that declares a numeric range or an allowed value set
 */
export function createFieldDomainRules(schema: TapeSchema): RecordRule[] {
  return schema.fields.filter(hasDomainConstraints).map((field) =>
    defineRecordRule({
      description: describeDomain(field),
      evaluate: (record) => checkDomain(record, field),
      fields: [field.name],
      id: `${FIELD_DOMAIN_RULE_PREFIX}${field.name}`,
      severity: 'error',
    })
  );
}

function describeDomain(field: FieldDefinition): string {
  const label = field.label ?? field.name;
  const parts: string[] = [];
  if (field.min !== undefined && field.max !== undefined) {
    parts.push(`between ${field.min} and ${field.max}`);
  } else if (field.min !== undefined) {
    parts.push(`at least ${field.min}`);
  } else if (field.max !== undefined) {
    parts.push(`at most ${field.max}`);
  }
  if (field.allowed && field.allowed.length > 0) {
    parts.push(`one of ${field.allowed.join(', ')}`);
  }
  return `${label} must be ${parts.join(' and ')}`;
}
