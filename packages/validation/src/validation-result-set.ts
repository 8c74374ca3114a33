import { SEVERITIES, type Rule, type Severity } from './rule.js';

export type OutcomeStatus = 'pass' | 'fail' | 'not_applicable';

/**
 * Result of evaluating one rule against one record, or against the pool when
 * `recordId` is undefined.
 */
export interface RuleOutcome {
  readonly recordId: string | undefined;
  readonly ruleId: string;
  readonly severity: Severity;
  readonly status: OutcomeStatus;
  readonly detail: string;
  readonly fields: readonly string[];
  /** The rule threw instead of returning a verdict */
  readonly faulted: boolean;
}

export interface SkippedRule {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly description: string;
  readonly reason: 'missing_columns';
  readonly missingFields: readonly string[];
}

export interface FaultedRule {
  readonly ruleId: string;
  readonly message: string;
  readonly occurrences: number;
}

export interface RuleTally {
  evaluated: number;
  passed: number;
  failed: number;
  notApplicable: number;
}

export interface RuleSummary {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly description: string;
  readonly failCount: number;
}

function emptyTally(): RuleTally {
  return { evaluated: 0, failed: 0, notApplicable: 0, passed: 0 };
}

export interface ValidationResultSetInit {
  outcomes: readonly RuleOutcome[];
  recordCount: number;
  executedRules: readonly Rule[];
  skippedRules: readonly SkippedRule[];
  faultedRules: readonly FaultedRule[];
}

/**
 * Every outcome of one validation run. Read-only once built.
 */
export class ValidationResultSet {
  readonly outcomes: readonly RuleOutcome[];
  readonly recordCount: number;
  readonly skippedRules: readonly SkippedRule[];
  readonly faultedRules: readonly FaultedRule[];
  /** Failing outcomes per severity */
  readonly countsBySeverity: Readonly<Record<Severity, number>>;
  readonly countsByRule: ReadonlyMap<string, Readonly<RuleTally>>;

  private readonly rules: ReadonlyMap<string, Rule>;

  constructor(init: ValidationResultSetInit) {
    this.outcomes = Object.freeze(init.outcomes.map((outcome) => Object.freeze({ ...outcome })));
    this.recordCount = init.recordCount;
    this.skippedRules = Object.freeze([...init.skippedRules]);
    this.faultedRules = Object.freeze([...init.faultedRules]);
    this.rules = new Map(init.executedRules.map((rule): [string, Rule] => [rule.id, rule]));

    const bySeverity: Record<Severity, number> = { error: 0, info: 0, warning: 0 };
    const byRule = new Map(init.executedRules.map((rule): [string, RuleTally] => [rule.id, emptyTally()]));

    for (const outcome of this.outcomes) {
      let tally = byRule.get(outcome.ruleId);
      if (!tally) {
        tally = emptyTally();
        byRule.set(outcome.ruleId, tally);
      }
      tally.evaluated += 1;
      switch (outcome.status) {
        case 'pass':
          tally.passed += 1;
          break;
        case 'fail':
          tally.failed += 1;
          bySeverity[outcome.severity] += 1;
          break;
        case 'not_applicable':
          tally.notApplicable += 1;
          break;
      }
    }

    this.countsBySeverity = Object.freeze(bySeverity);
    this.countsByRule = new Map(
      [...byRule].map(([id, tally]): [string, Readonly<RuleTally>] => [id, Object.freeze(tally)])
    );
    Object.freeze(this);
  }

  get executedRuleCount(): number {
    return this.rules.size;
  }

  failures(): RuleOutcome[] {
    return this.outcomes.filter((outcome) => outcome.status === 'fail');
  }

  failuresBySeverity(severity: Severity): RuleOutcome[] {
    return this.outcomes.filter((outcome) => outcome.status === 'fail' && outcome.severity === severity);
  }

  outcomesFor(recordId: string): RuleOutcome[] {
    return this.outcomes.filter((outcome) => outcome.recordId === recordId);
  }

  /**
   * Pool-level outcomes (cross-row rules that judge the tape as a whole)
   */
  poolOutcomes(): RuleOutcome[] {
    return this.outcomes.filter((outcome) => outcome.recordId === undefined);
  }

  hasFailures(severity?: Severity): boolean {
    return severity === undefined
      ? SEVERITIES.some((level) => this.countsBySeverity[level] > 0)
      : this.countsBySeverity[severity] > 0;
  }

  /**
   * One line per executed rule, sorted by rule id
   */
  ruleSummaries(): RuleSummary[] {
    return [...this.rules.values()]
      .map((rule) => ({
        description: rule.description,
        failCount: this.countsByRule.get(rule.id)?.failed ?? 0,
        ruleId: rule.id,
        severity: rule.severity,
      }))
      .sort((a, b) => a.ruleId.localeCompare(b.ruleId));
  }

  toJSON() {
    return {
      countsByRule: Object.fromEntries(this.countsByRule),
      countsBySeverity: this.countsBySeverity,
      faultedRules: this.faultedRules,
      outcomes: this.outcomes.map((outcome) => ({ ...outcome, recordId: outcome.recordId ?? null })),
      recordCount: this.recordCount,
      skippedRules: this.skippedRules,
    };
  }
}
