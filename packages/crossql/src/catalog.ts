/**
 * Source catalog: the read-only configuration every component dispatches on.
 * Validated with Zod when loaded.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { CatalogError, UnknownSourceError } from './errors.js';

/**
 * Terms are matched as substrings of lowercased text, so they are lowercased on load.
 */
const TermsSchema = z.array(
  z
    .string()
    .min(1)
    .transform((term) => term.toLowerCase())
);

/**
 * Substring predicate over lowercased question text.
 */
const GuardSchema = z
  .object({
    all: TermsSchema.optional().describe('Every term must appear'),
    any: TermsSchema.optional().describe('At least one term must appear'),
    none: TermsSchema.optional().describe('No term may appear'),
  })
  .strict();

const TemplateSchema = z.object({
  id: z.string().min(1),
  guard: GuardSchema,
  statement: z.string().min(1),
});

/**
 * Search statements bind the search pattern as `:pattern`.
 * `all` is the broadest statement and is also used for id lookups.
 */
const SearchSchema = z.object({
  name: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  all: z.string().min(1),
});

const AggregatesSchema = z.object({
  customers: z.string().min(1).optional(),
  payments: z.string().min(1).optional(),
  entities: z.record(z.string().min(1)).default({}),
});

const SourceSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z][a-z0-9_]*$/, 'Source names are lowercase identifiers'),
  description: z.string().min(1),
  keywords: TermsSchema.min(1),
  templates: z.array(TemplateSchema),
  fallback: z.string().min(1),
  comparisons: z.array(TemplateSchema).default([]),
  comparisonDefault: z.string().min(1),
  search: SearchSchema,
  aggregates: AggregatesSchema.default({}),
});

const CatalogSchema = z
  .object({
    broadTerms: TermsSchema,
    sources: z.array(SourceSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    for (const [index, source] of catalog.sources.entries()) {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `Duplicate source name: ${source.name}`,
        });
      }
      seen.add(source.name);
    }
  });

export type Guard = z.infer<typeof GuardSchema>;
export type QueryTemplate = z.infer<typeof TemplateSchema>;
export type SourceEntry = z.infer<typeof SourceSchema>;
export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * Location of the catalog bundled with the package.
 */
export const DEFAULT_CATALOG_URL = new URL(
  '../catalog/default-catalog.json',
  import.meta.url
);

/**
 * Validate an already-parsed catalog object.
 */
export function parseCatalog(input: unknown): Catalog {
  const result = CatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new CatalogError(`Invalid source catalog:\n${issues.join('\n')}`);
  }
  return result.data;
}

/**
 * Read and validate a catalog file. Defaults to the bundled catalog.
 */
export function loadCatalog(path: string | URL = DEFAULT_CATALOG_URL): Catalog {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new CatalogError(`Could not read catalog at ${String(path)}: ${error}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(`Catalog at ${String(path)} is not valid JSON: ${error}`);
  }

  return parseCatalog(parsed);
}

/**
 * Evaluate a guard against lowercased text.
 */
export function matchesGuard(guard: Guard, text: string): boolean {
  if (guard.all && !guard.all.every((term) => text.includes(term))) {
    return false;
  }
  if (guard.any && !guard.any.some((term) => text.includes(term))) {
    return false;
  }
  if (guard.none && guard.none.some((term) => text.includes(term))) {
    return false;
  }
  return true;
}

/**
 * Source names in catalog order.
 */
export function sourceNames(catalog: Catalog): string[] {
  return catalog.sources.map((source) => source.name);
}

/**
 * Look up a source, throwing UnknownSourceError for names the catalog lacks.
 */
export function getSource(catalog: Catalog, name: string): SourceEntry {
  const source = catalog.sources.find((entry) => entry.name === name);
  if (!source) {
    throw new UnknownSourceError(name, sourceNames(catalog));
  }
  return source;
}

/**
 * Check a source name without throwing.
 */
export function hasSource(catalog: Catalog, name: string): boolean {
  return catalog.sources.some((entry) => entry.name === name);
}
