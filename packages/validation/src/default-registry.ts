import type { TapeSchema } from '@tapeval/core';

import { RuleRegistry } from './rule-registry.js';
import { STANDARD_RULES, createFieldDomainRules, createRequiredFieldsRule } from './rules/index.js';

export interface DefaultRegistryOptions {
  /** Fields checked by `required_fields_present`; defaults to the schema's required fields */
  requiredFields?: readonly string[] | undefined;
}

/**
 * Registry holding the required-fields check, the standard catalogue and, when
 * a schema is given, one domain rule per constrained field.
 */
export function createDefaultRegistry(schema?: TapeSchema, options: DefaultRegistryOptions = {}): RuleRegistry {
  const registry = new RuleRegistry();

  const requiredFields = options.requiredFields ?? schema?.requiredFields().map((field) => field.name) ?? [];
  if (requiredFields.length > 0) {
    registry.register(createRequiredFieldsRule(requiredFields));
  }

  for (const rule of STANDARD_RULES) {
    registry.register(rule);
  }

  if (schema) {
    for (const rule of createFieldDomainRules(schema)) {
      registry.register(rule);
    }
  }

  return registry;
}
