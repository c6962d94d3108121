import { inferArchitecturePattern, type ArchitecturePattern } from './analysis/architecture.js';
import { findEntrypoints } from './analysis/entrypoints.js';
import { aggregateLanguages } from './analysis/languages.js';
import { detectStack } from './analysis/stack.js';
import { classifyFolders } from './analysis/structure.js';
import {
  FileRecordSchema,
  type EntryPointSet,
  type FileRecord,
  type FolderClassification,
  type LanguageStats
} from './analysis/types.js';
import { ConfigSchema, type AnalysisConfig, type AnalysisConfigInput } from './config/schema.js';
import { buildDependencyGraph, type GraphTransfer } from './graph/dependency-graph.js';
import { synthesizeFlow, type FlowTransfer } from './graph/flow.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface RejectedRecord {
  index: number;
  reason: string;
}

export interface AnalysisReport {
  languages: LanguageStats;
  frameworks: string[];
  databases: string[];
  infrastructure: string[];
  folders: FolderClassification;
  entrypoints: EntryPointSet;
  dependencyGraph: GraphTransfer;
  executionFlow: FlowTransfer;
  architecturePattern: ArchitecturePattern;
  totals: {
    files: number;
    folders: number;
    entrypoints: number;
    graphNodes: number;
    graphEdges: number;
  };
  rejected: RejectedRecord[];
}

export interface AnalyzeOptions {
  config?: AnalysisConfig | AnalysisConfigInput;
  logger?: Logger;
}

/**
 * Keep every record that satisfies the `{ path, content }` contract; the rest are
 * reported and skipped so one bad record never aborts a run.
 */
export function validateRecords(input: readonly unknown[]): { files: FileRecord[]; rejected: RejectedRecord[] } {
  const files: FileRecord[] = [];
  const rejected: RejectedRecord[] = [];
  input.forEach((raw, index) => {
    const parsed = FileRecordSchema.safeParse(raw);
    if (parsed.success) {
      files.push(parsed.data);
    } else {
      rejected.push({ index, reason: parsed.error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`).join('; ') });
    }
  });
  return { files, rejected };
}

export function analyzeRepository(input: readonly unknown[], options: AnalyzeOptions = {}): AnalysisReport {
  const log = options.logger ?? silentLogger;
  const config = ConfigSchema.parse(options.config ?? {});

  const { files, rejected } = validateRecords(input);
  for (const r of rejected) log.warn('skipping malformed file record', r);

  const languages = aggregateLanguages(files);
  const { frameworks, databases, infrastructure } = detectStack(files);
  const folders = classifyFolders(files, config.structure);
  const entrypoints = findEntrypoints(files);
  log.debug('static analysis done', {
    files: files.length,
    primaryLanguage: languages.primaryLanguage,
    frameworks,
    databases,
    infrastructure
  });

  const graph = buildDependencyGraph(files, config.graph);
  log.debug('dependency graph built', { nodes: graph.nodeCount, edges: graph.edgeCount });

  const flow = synthesizeFlow({ entrypoints, folders, frameworks, databases, infrastructure }, config.flow);
  log.debug('execution flow synthesized', { stages: flow.stageCount });

  return {
    languages,
    frameworks,
    databases,
    infrastructure,
    folders,
    entrypoints,
    dependencyGraph: graph.toTransferObject(),
    executionFlow: flow.toTransferObject(),
    architecturePattern: inferArchitecturePattern(folders, frameworks),
    totals: {
      files: files.length,
      folders: Object.keys(folders).length,
      entrypoints: entrypoints.applicationFiles.length + entrypoints.frameworkEntrypoints.length,
      graphNodes: graph.nodeCount,
      graphEdges: graph.edgeCount
    },
    rejected
  };
}
