import { LoanRecord, TapeSchema, unparseable, type RecordValueInput } from '@tapeval/core';
import { describe, expect, it } from 'vitest';

import { d, makeContext } from '../../__tests__/test-utils.js';
import { FIELD_DOMAIN_RULE_PREFIX, createFieldDomainRules } from '../field-domain-rules.js';
import { REQUIRED_FIELDS_RULE_ID, createRequiredFieldsRule } from '../required-fields-rule.js';

const schema = new TapeSchema([
  { name: 'loan_number', type: 'string' },
  { label: 'Original LTV', max: 1.5, min: 0, name: 'original_ltv', type: 'decimal' },
  { allowed: [1, 2], label: 'Lien Position', name: 'lien_position', type: 'integer' },
  { allowed: ['Y', 'N'], name: 'escrow_flag', type: 'string' },
  { min: 300, name: 'fico', type: 'integer' },
]);

describe('createFieldDomainRules', () => {
  const rules = createFieldDomainRules(schema);
  const byId = new Map(rules.map((rule) => [rule.id, rule] as const));
  const context = makeContext();

  function check(field: string, value: RecordValueInput) {
    const rule = byId.get(`${FIELD_DOMAIN_RULE_PREFIX}${field}`);
    if (!rule) throw new Error(`no domain rule for ${field}`);
    return rule.evaluate(LoanRecord.fromValues('row-2', { [field]: value }), context);
  }

  it('should create one rule per constrained field', () => {
    expect(rules.map((rule) => rule.id)).toEqual([
      'field_domain.original_ltv',
      'field_domain.lien_position',
      'field_domain.escrow_flag',
      'field_domain.fico',
    ]);
  });

  it('should describe the domain', () => {
    expect(byId.get('field_domain.original_ltv')?.description).toBe('Original LTV must be between 0 and 1.5');
    expect(byId.get('field_domain.lien_position')?.description).toBe('Lien Position must be one of 1, 2');
    expect(byId.get('field_domain.fico')?.description).toBe('fico must be at least 300');
  });

  it('should enforce numeric bounds', () => {
    expect(check('original_ltv', d('1.6'))).toEqual({
      detail: 'original_ltv 1.6 is above maximum 1.5',
      fields: ['original_ltv'],
      status: 'fail',
    });
    expect(check('fico', 299)).toEqual({
      detail: 'fico 299 is below minimum 300',
      fields: ['fico'],
      status: 'fail',
    });
    expect(check('original_ltv', d('1.5')).status).toBe('pass');
  });

  it('should match allowed values numerically or case-insensitively', () => {
    expect(check('lien_position', 2).status).toBe('pass');
    expect(check('lien_position', 3)).toEqual({
      detail: 'lien_position 3 is not one of 1, 2',
      fields: ['lien_position'],
      status: 'fail',
    });
    expect(check('escrow_flag', 'y').status).toBe('pass');
    expect(check('escrow_flag', 'maybe').status).toBe('fail');
  });

  it('should skip missing values and fail unparseable ones', () => {
    expect(check('fico', undefined)).toEqual({ detail: 'fico is missing', status: 'not_applicable' });
    expect(check('fico', unparseable('n/a'))).toEqual({
      detail: 'fico is unparseable ("n/a")',
      fields: ['fico'],
      status: 'fail',
    });
  });
});

describe('createRequiredFieldsRule', () => {
  const rule = createRequiredFieldsRule(['loan_number', 'state', 'loan_number', 'original_ltv']);

  it('should deduplicate fields and mark them optional', () => {
    expect(rule.id).toBe(REQUIRED_FIELDS_RULE_ID);
    expect(rule.fields).toEqual(['loan_number', 'state', 'original_ltv']);
    expect(rule.optionalFields).toEqual(['loan_number', 'state', 'original_ltv']);
  });

  it('should list blank fields, including columns absent from the record', () => {
    const record = LoanRecord.fromValues('row-2', { loan_number: 'LN-1', original_ltv: unparseable('x') });

    expect(rule.evaluate(record, makeContext())).toEqual({
      detail: 'Missing required fields: state, original_ltv',
      fields: ['state', 'original_ltv'],
      status: 'fail',
    });
  });

  it('should pass a complete record', () => {
    const record = LoanRecord.fromValues('row-2', { loan_number: 'LN-1', original_ltv: d('0.8'), state: 'TX' });

    expect(rule.evaluate(record, makeContext()).status).toBe('pass');
  });
});
