import { defineRecordRule, fail, pass, type RecordRule, type Severity } from '../rule.js';

import { failUnusable } from './rule-utils.js';

interface CodeRuleOptions {
  id: string;
  field: string;
  allowed: readonly number[];
  description: string;
  severity?: Severity | undefined;
}

/**
 * Rule requiring an integer code field to hold one of a fixed set of values.
 * A blank code fails.
 */
export function codeRule(options: CodeRuleOptions): RecordRule {
  const { allowed, field } = options;
  return defineRecordRule({
    description: options.description,
    evaluate(record) {
      const code = record.integer(field);
      if (code === undefined) return failUnusable(record, field);
      if (!allowed.includes(code)) {
        return fail(`${field} ${code} is not one of ${allowed.join(', ')}`, [field]);
      }
      return pass();
    },
    fields: [field],
    id: options.id,
    severity: options.severity ?? 'error',
  });
}
