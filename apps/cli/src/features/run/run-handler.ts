import fs from 'node:fs';

import { toError } from '@tapeval/core';
import { getRequiredFieldNames, readTape } from '@tapeval/ingestion';
import { getLogger } from '@tapeval/logger';
import { writeReport } from '@tapeval/report';
import { DEFAULT_DIMENSIONS, loadDimensionSpecs, summarizeAll, type DimensionSpec } from '@tapeval/stratification';
import { createDefaultRegistry, validate } from '@tapeval/validation';
import { err, ok, type Result } from 'neverthrow';

import { CommandError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';

import { summarizeRun, type RunHandlerParams, type RunSummary } from './run-utils.js';

export type { RunHandlerParams, RunSummary };

const logger = getLogger('RunHandler');

/**
 * Run handler - reads a tape, validates it, stratifies it and writes the report.
 */
export class RunHandler {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async execute(params: RunHandlerParams): Promise<Result<RunSummary, Error>> {
    if (!fs.existsSync(params.tapePath)) {
      return err(new CommandError(`Tape not found: ${params.tapePath}`, ExitCodes.NOT_FOUND));
    }

    const dimensionsResult = this.loadDimensions(params.stratsPath);
    if (dimensionsResult.isErr()) return err(dimensionsResult.error);

    const requiredResult = getRequiredFieldNames();
    if (requiredResult.isErr()) return err(requiredResult.error);

    const tapeResult = await readTape(params.tapePath);
    if (tapeResult.isErr()) return err(tapeResult.error);
    const tape = tapeResult.value;

    try {
      const registry = createDefaultRegistry(tape.schema, { requiredFields: requiredResult.value }).select({
        only: params.only,
        skip: params.skip,
      });
      logger.info({ rules: registry.size, tape: params.tapePath }, 'Starting run');

      const results = validate(tape.records, registry, { config: params.config, schema: tape.schema });
      const strats = summarizeAll(tape.records, dimensionsResult.value);

      const reportResult = writeReport(params.outputPath, {
        generatedAt: this.clock(),
        records: tape.records,
        results,
        source: tape.source,
        strats,
      });
      if (reportResult.isErr()) return err(reportResult.error);

      return ok(summarizeRun(tape.source, reportResult.value, tape.droppedRows, results, strats));
    } catch (error) {
      return err(toError(error));
    }
  }

  private loadDimensions(stratsPath: string | undefined): Result<readonly DimensionSpec[], Error> {
    if (stratsPath === undefined) return ok(DEFAULT_DIMENSIONS);
    if (!fs.existsSync(stratsPath)) {
      return err(new CommandError(`Dimension file not found: ${stratsPath}`, ExitCodes.NOT_FOUND));
    }
    return loadDimensionSpecs(stratsPath);
  }
}
