import { z } from 'zod';

/**
 * A single repository file as handed over by ingestion.
 * Paths use `/` separators; the first segment is the top-level folder.
 */
export interface FileRecord {
  readonly path: string;
  readonly content: string;
}

export const FileRecordSchema = z.object({
  path: z.string().min(1),
  content: z.string().default('')
});

export const UNKNOWN_LANGUAGE = 'Unknown';

export interface LanguageStat {
  files: number;
  lines: number;
  percentage: number;
}

export interface LanguageStats {
  languages: Record<string, LanguageStat>;
  primaryLanguage: string | null;
  totalFiles: number;
}

export type FolderRole =
  | 'frontend'
  | 'backend'
  | 'config'
  | 'infrastructure'
  | 'scripts'
  | 'tests'
  | 'docs'
  | 'database'
  | 'misc';

export interface FolderInfo {
  role: FolderRole;
  fileCount: number;
}

export type FolderClassification = Record<string, FolderInfo>;

// Role families read by flow synthesis and architecture inference.
export const FRONTEND_ROLES = ['frontend', 'client', 'ui'];
export const BACKEND_ROLES = ['backend', 'api', 'services'];
export const DATABASE_ROLES = ['database', 'models'];

export const UI_FRAMEWORKS = ['React', 'Vue', 'Angular', 'Next.js', 'Svelte'];

export interface ApplicationEntry {
  path: string;
  language: string;
  filename: string;
}

export interface FrameworkEntry {
  path: string;
  framework: string;
}

export interface DockerEntry {
  path: string;
  command: string;
}

export interface EntryPointSet {
  applicationFiles: ApplicationEntry[];
  frameworkEntrypoints: FrameworkEntry[];
  dockerEntrypoints: DockerEntry[];
}

/** Detected technology names, each list sorted. */
export interface StackSummary {
  frameworks: string[];
  databases: string[];
  infrastructure: string[];
}
