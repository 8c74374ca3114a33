import type { TapeSchema } from './field.js';
import type { LoanRecord } from './loan-record.js';

/**
 * Records plus the schema they were typed against, as handed over by ingestion
 */
export interface LoanTape {
  readonly schema: TapeSchema;
  readonly records: readonly LoanRecord[];
  readonly source?: string | undefined;
}
