import { z } from 'zod';

import databasesData from '../../data/databases.json' with { type: 'json' };
import entrypointsData from '../../data/entrypoints.json' with { type: 'json' };
import frameworksData from '../../data/frameworks.json' with { type: 'json' };
import infrastructureData from '../../data/infrastructure.json' with { type: 'json' };
import ingestionData from '../../data/ingestion.json' with { type: 'json' };
import languagesData from '../../data/languages.json' with { type: 'json' };
import structureData from '../../data/structure.json' with { type: 'json' };

const Patterns = z.array(z.string().min(1));

export const DetectionRuleSchema = z.object({
  name: z.string().min(1),
  imports: Patterns.optional(),
  dependencyNames: Patterns.optional(),
  configSubstrings: Patterns.optional(),
  filenameSubstrings: Patterns.optional(),
  extensions: Patterns.optional(),
  /** Corroborating markers; when set, an `extensions` hit only counts if one appears in the content. */
  contentMarkers: Patterns.optional()
});
export type DetectionRule = z.infer<typeof DetectionRuleSchema>;

const RuleList = z.array(DetectionRuleSchema);

const LanguageTable = z.record(z.string().startsWith('.'), z.string().min(1));

const EntrypointTable = z.object({
  filenames: z.record(z.string(), Patterns),
  frameworks: z.array(z.object({ name: z.string().min(1), patterns: Patterns.min(1) })),
  dockerFilename: z.string().min(1),
  dockerDirectives: Patterns.min(1)
});
export type EntrypointTableData = z.infer<typeof EntrypointTable>;

const RoleName = z.enum(['frontend', 'backend', 'config', 'infrastructure', 'scripts', 'tests', 'docs', 'database']);

const StructureTable = z.object({
  roles: z.array(z.object({ role: RoleName, names: Patterns })),
  segments: z.object({ frontend: Patterns, backend: Patterns }),
  extensions: z.object({ frontend: Patterns, backend: Patterns, config: Patterns, scripts: Patterns })
});
export type StructureTableData = z.infer<typeof StructureTable>;

const IngestionTable = z.object({
  ignoredDirectories: Patterns,
  allowedExtensions: Patterns,
  allowedFilenames: Patterns
});
export type IngestionTableData = z.infer<typeof IngestionTable>;

export interface RuleTables {
  languages: Record<string, string>;
  frameworks: DetectionRule[];
  databases: DetectionRule[];
  infrastructure: DetectionRule[];
  entrypoints: EntrypointTableData;
  structure: StructureTableData;
  ingestion: IngestionTableData;
}

export class RuleTableError extends Error {
  constructor(
    readonly file: string,
    message: string
  ) {
    super(`Invalid rule table ${file}: ${message}`);
    this.name = 'RuleTableError';
  }
}

function parseTable<T extends z.ZodTypeAny>(file: string, schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RuleTableError(file, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

const tables: RuleTables = {
  languages: parseTable('languages.json', LanguageTable, languagesData),
  frameworks: parseTable('frameworks.json', RuleList, frameworksData),
  databases: parseTable('databases.json', RuleList, databasesData),
  infrastructure: parseTable('infrastructure.json', RuleList, infrastructureData),
  entrypoints: parseTable('entrypoints.json', EntrypointTable, entrypointsData),
  structure: parseTable('structure.json', StructureTable, structureData),
  ingestion: parseTable('ingestion.json', IngestionTable, ingestionData)
};

/**
 * Static detection tables from `data/`, bundled with the module and validated when it loads.
 */
export function getRuleTables(): RuleTables {
  return tables;
}
