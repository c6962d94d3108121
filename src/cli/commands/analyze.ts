import { resolve } from 'node:path';

import { loadConfig } from '../../config/loader.js';
import type { AnalysisConfig } from '../../config/schema.js';
import type { FileRecord } from '../../analysis/types.js';
import { analyzeRepository, type AnalysisReport } from '../../pipeline.js';
import { Logger, type LogLevel } from '../../utils/logger.js';
import { loadWorkspaceFiles } from '../../workspace/loader.js';
import { getRenderer } from '../ui/renderer.js';
import { formatMs } from '../ui/format.js';

export interface AnalyzeCommandOptions {
  dir?: string;
  configPath?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Receives the JSON report when `json` is set; defaults to stdout. */
  out?: (text: string) => void;
}

export interface AnalyzeCommandResult {
  ok: boolean;
  report?: AnalysisReport;
  details?: unknown;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * `repo-anatomy analyze [dir]`: load a local checkout, run the structural analysis
 * and print either a summary (stderr) or the full report as JSON (stdout).
 */
export async function runAnalyzeCommand(opts: AnalyzeCommandOptions): Promise<AnalyzeCommandResult> {
  const r = getRenderer();
  const root = resolve(opts.dir ?? process.cwd());
  const level: LogLevel = opts.verbose ? 'debug' : opts.quiet ? 'silent' : 'warn';
  const logger = new Logger({ level, json: !!opts.quiet });

  let config: AnalysisConfig;
  try {
    ({ config } = await loadConfig(root, opts.configPath ? resolve(opts.configPath) : undefined));
  } catch (err) {
    return { ok: false, details: errorText(err) };
  }

  const started = Date.now();
  const spinner = r.spinner(`Reading ${root}`);
  let files: FileRecord[];
  try {
    files = await loadWorkspaceFiles(root, config.ingestion, logger);
  } catch (err) {
    spinner.fail('Could not read workspace');
    return { ok: false, details: errorText(err) };
  }
  spinner.update(`Analyzing ${files.length} files`);

  const report = analyzeRepository(files, { config, logger });
  spinner.succeed(`Analyzed ${files.length} files in ${formatMs(Date.now() - started)}`);

  if (opts.json) {
    const out = opts.out ?? ((text: string) => process.stdout.write(text));
    out(`${JSON.stringify(report, null, 2)}\n`);
  } else {
    r.blank();
    r.analysisSummary(root, report);
  }

  return { ok: true, report };
}
