import { defineRecordRule, fail, pass, type RecordRule } from '../rule.js';

export const REQUIRED_FIELDS_RULE_ID = 'required_fields_present';

/**
 * Every listed field must hold a usable value. A column absent from the tape
 * counts as blank on every record, so the rule never gets skipped.
 */
export function createRequiredFieldsRule(requiredFields: readonly string[]): RecordRule {
  const fields = [...new Set(requiredFields)];
  return defineRecordRule({
    description: 'Every required field must be populated',
    evaluate(record) {
      const blank = fields.filter((field) => record.isBlank(field));
      if (blank.length > 0) return fail(`Missing required fields: ${blank.join(', ')}`, blank);
      return pass();
    },
    fields,
    id: REQUIRED_FIELDS_RULE_ID,
    optionalFields: fields,
    severity: 'error',
  });
}
