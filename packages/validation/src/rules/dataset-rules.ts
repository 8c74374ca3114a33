import { formatDecimal, sumDecimals, withinTolerance } from '@tapeval/core';
import type { Decimal } from 'decimal.js';

import {
  defineDatasetRule,
  fail,
  notApplicable,
  pass,
  type DatasetFinding,
  type DatasetRule,
} from '../rule.js';

export const uniqueLoanNumber = defineDatasetRule({
  description: 'Loan numbers must be unique across the tape',
  evaluateAll(records) {
    const byLoanNumber = new Map<string, string[]>();
    for (const record of records) {
      const loanNumber = record.text('loan_number')?.trim();
      if (!loanNumber) continue;
      const ids = byLoanNumber.get(loanNumber) ?? [];
      ids.push(record.id);
      byLoanNumber.set(loanNumber, ids);
    }

    return records.map((record): DatasetFinding => {
      const loanNumber = record.text('loan_number')?.trim();
      if (!loanNumber) {
        return { recordId: record.id, verdict: notApplicable('loan_number is blank') };
      }
      const others = (byLoanNumber.get(loanNumber) ?? []).filter((id) => id !== record.id);
      if (others.length === 0) {
        return { recordId: record.id, verdict: pass() };
      }
      return {
        recordId: record.id,
        verdict: fail(`loan_number "${loanNumber}" is shared with ${others.join(', ')}`),
      };
    });
  },
  fields: ['loan_number'],
  id: 'unique_loan_number',
  severity: 'error',
});

export const poolBalanceMatchesStated = defineDatasetRule({
  description: 'Sum of current loan amounts must match the stated pool balance',
  evaluateAll(records, context) {
    const stated = context.config.statedPoolBalance;
    if (stated === undefined) {
      return [{ verdict: notApplicable('no stated pool balance configured') }];
    }

    const balances: Decimal[] = [];
    let unusable = 0;
    for (const record of records) {
      const balance = record.decimal('current_loan_amount');
      if (balance === undefined) {
        unusable += 1;
      } else {
        balances.push(balance);
      }
    }

    const total = sumDecimals(balances);
    if (withinTolerance(total, stated, context.config.tolerance)) {
      return [{ verdict: pass() }];
    }
    const note = unusable > 0 ? ` (${unusable} record(s) without a usable current_loan_amount)` : '';
    return [
      {
        verdict: fail(
          `Sum of current_loan_amount ${formatDecimal(total, 2)} differs from stated pool balance ` +
            `${formatDecimal(stated, 2)}${note}`
        ),
      },
    ];
  },
  fields: ['current_loan_amount'],
  id: 'pool_balance_matches_stated',
  severity: 'error',
});

export const DATASET_RULES: readonly DatasetRule[] = [uniqueLoanNumber, poolBalanceMatchesStated];
