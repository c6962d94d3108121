import { evaluateRules } from '../rules/matcher.js';
import { getRuleTables } from '../rules/tables.js';
import type { FileRecord, StackSummary } from './types.js';

export function detectFrameworks(files: readonly FileRecord[]): string[] {
  return evaluateRules(getRuleTables().frameworks, files);
}

export function detectDatabases(files: readonly FileRecord[]): string[] {
  return evaluateRules(getRuleTables().databases, files);
}

/**
 * Infrastructure rules may pair an extension with content markers
 * (a YAML file only counts toward Kubernetes when it looks like a manifest).
 */
export function detectInfrastructure(files: readonly FileRecord[]): string[] {
  return evaluateRules(getRuleTables().infrastructure, files);
}

export function detectStack(files: readonly FileRecord[]): StackSummary {
  return {
    frameworks: detectFrameworks(files),
    databases: detectDatabases(files),
    infrastructure: detectInfrastructure(files)
  };
}
