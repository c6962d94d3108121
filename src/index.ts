export * from './analysis/types.js';
export { classifyLanguage, aggregateLanguages, countNonBlankLines } from './analysis/languages.js';
export { detectFrameworks, detectDatabases, detectInfrastructure, detectStack } from './analysis/stack.js';
export { classifyFolders, classifyFolderByName, classifyFolderByContent, topLevelFolder } from './analysis/structure.js';
export { findEntrypoints } from './analysis/entrypoints.js';
export { inferArchitecturePattern, type ArchitecturePattern } from './analysis/architecture.js';
export {
  DependencyGraph,
  ModuleResolver,
  buildDependencyGraph,
  normalizeModulePath,
  type GraphTransfer
} from './graph/dependency-graph.js';
export { extractImports, extractJsImports, extractPythonImports } from './graph/imports.js';
export {
  ExecutionFlow,
  synthesizeFlow,
  type Connection,
  type FlowInput,
  type FlowTransfer,
  type Stage,
  type StageId,
  type StageType
} from './graph/flow.js';
export { evaluateRules, ruleMatchesFile } from './rules/matcher.js';
export { getRuleTables, RuleTableError, type DetectionRule, type RuleTables } from './rules/tables.js';
export { ConfigSchema, defaultConfig, type AnalysisConfig, type AnalysisConfigInput } from './config/schema.js';
export { loadConfig, ConfigError } from './config/loader.js';
export { loadWorkspaceFiles, isBinaryContent } from './workspace/loader.js';
export { analyzeRepository, validateRecords, type AnalysisReport, type AnalyzeOptions, type RejectedRecord } from './pipeline.js';
export { Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
