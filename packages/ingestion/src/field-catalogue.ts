import fs from 'node:fs';

import { FIELD_TYPES, IngestionError, type FieldDefinition } from '@tapeval/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const CatalogueEntrySchema = z
  .object({
    aliases: z.array(z.string().min(1)).default([]),
    allowed: z.array(z.union([z.string(), z.number()])).optional(),
    label: z.string().min(1),
    max: z.number().optional(),
    min: z.number().optional(),
    name: z.string().regex(/^[a-z0-9_]+$/, 'must be lowercase snake case'),
    required: z.boolean().default(false),
    type: z.enum(FIELD_TYPES),
  })
  .strict();

const CatalogueSchema = z
  .array(CatalogueEntrySchema)
  .min(1)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field "${entry.name}"`, path: [index, 'name'] });
      }
      seen.add(entry.name);
    });
  });

export type CatalogueEntry = z.infer<typeof CatalogueEntrySchema>;

/**
 * Known tape columns: canonical name, type, display label and the spellings
 * a seller may use instead of the canonical header.
 */
export class FieldCatalogue {
  readonly entries: readonly CatalogueEntry[];
  private readonly byName: ReadonlyMap<string, CatalogueEntry>;

  constructor(entries: readonly CatalogueEntry[]) {
    this.entries = Object.freeze([...entries]);
    this.byName = new Map(entries.map((entry): [string, CatalogueEntry] => [entry.name, entry]));
  }

  get(name: string): CatalogueEntry | undefined {
    return this.byName.get(name);
  }

  requiredFieldNames(): string[] {
    return this.entries.filter((entry) => entry.required).map((entry) => entry.name);
  }

  toFieldDefinition(entry: CatalogueEntry): FieldDefinition {
    return {
      allowed: entry.allowed,
      label: entry.label,
      max: entry.max,
      min: entry.min,
      name: entry.name,
      required: entry.required,
      type: entry.type,
    };
  }
}

export function parseFieldCatalogue(data: unknown): Result<FieldCatalogue, IngestionError> {
  const result = CatalogueSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new IngestionError(`Invalid field catalogue:\n${issues}`, { cause: result.error }));
  }
  return ok(new FieldCatalogue(result.data));
}

export function loadFieldCatalogue(filePath: string | URL): Result<FieldCatalogue, IngestionError> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    return err(
      new IngestionError(
        `Failed to load field catalogue from ${String(filePath)}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    );
  }
  return parseFieldCatalogue(data);
}

let defaultCatalogue: FieldCatalogue | undefined;

/**
 * The catalogue shipped with the package, read and validated on first use
 */
export function loadDefaultCatalogue(): Result<FieldCatalogue, IngestionError> {
  if (defaultCatalogue) return ok(defaultCatalogue);
  return loadFieldCatalogue(new URL('./fields.json', import.meta.url)).map((catalogue) => {
    defaultCatalogue = catalogue;
    return catalogue;
  });
}

/**
 * Names of the columns every tape must populate
 */
export function getRequiredFieldNames(): Result<string[], IngestionError> {
  return loadDefaultCatalogue().map((catalogue) => catalogue.requiredFieldNames());
}
