import { z } from 'zod';

export const StructureOptions = z.object({
  /** A file-type bucket must hold more than this many files to decide frontend/backend. */
  minDominantFiles: z.number().int().nonnegative().default(2),
  /** Config/scripts buckets must exceed this share of the folder's files. */
  majorityRatio: z.number().min(0).max(1).default(0.5)
});
export type StructureOptions = z.infer<typeof StructureOptions>;

export const GraphOptions = z.object({
  /** Fall back to substring/suffix matching on normalized paths when resolving imports. */
  partialMatch: z.boolean().default(true)
});
export type GraphOptions = z.infer<typeof GraphOptions>;

export const FlowOptions = z.object({
  maxEntryComponents: z.number().int().positive().default(5),
  minMiddlewareFolders: z.number().int().positive().default(2)
});
export type FlowOptions = z.infer<typeof FlowOptions>;

// Unset lists fall back to the tables in data/ingestion.json.
export const IngestionOptions = z.object({
  ignoredDirectories: z.array(z.string().min(1)).optional(),
  ignore: z.array(z.string().min(1)).default([]),
  allowedExtensions: z.array(z.string().startsWith('.')).optional(),
  allowedFilenames: z.array(z.string().min(1)).optional(),
  maxFileBytes: z.number().int().positive().default(1024 * 1024)
});
export type IngestionOptions = z.infer<typeof IngestionOptions>;

export const ConfigSchema = z.object({
  structure: StructureOptions.default({}),
  graph: GraphOptions.default({}),
  flow: FlowOptions.default({}),
  ingestion: IngestionOptions.default({})
});
export type AnalysisConfig = z.infer<typeof ConfigSchema>;
export type AnalysisConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): AnalysisConfig {
  return ConfigSchema.parse({});
}
