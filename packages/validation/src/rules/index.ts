import type { Rule } from '../rule.js';

import { ARM_RULES } from './arm-rules.js';
import { BORROWER_RULES } from './borrower-rules.js';
import { DATASET_RULES } from './dataset-rules.js';
import { LOAN_TERM_RULES } from './loan-term-rules.js';
import { PROPERTY_RULES } from './property-rules.js';

export * from './arm-rules.js';
export * from './borrower-rules.js';
export * from './code-rule.js';
export * from './dataset-rules.js';
export * from './field-domain-rules.js';
export * from './loan-term-rules.js';
export * from './property-rules.js';
export * from './required-fields-rule.js';

/**
 * The standard loan-tape catalogue, in report order
 */
export const STANDARD_RULES: readonly Rule[] = [
  ...LOAN_TERM_RULES,
  ...BORROWER_RULES,
  ...PROPERTY_RULES,
  ...ARM_RULES,
  ...DATASET_RULES,
];
