import type { AnalysisReport } from '../../pipeline.js';
import { theme, INDENT } from './theme.js';
import { keyValue, listOrNone, padRight, sectionBanner } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI.
 * - InteractiveRenderer prints a colored summary to stderr
 * - QuietRenderer emits machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  analysisSummary(root: string, report: AnalysisReport): void;
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;
  spinner(message: string): SpinnerHandle;
  blank(): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  constructor(private readonly write: (msg: string) => void = (msg) => process.stderr.write(msg)) {}

  private writeln(msg: string = ''): void {
    this.write(msg + '\n');
  }

  analysisSummary(root: string, report: AnalysisReport): void {
    this.writeln(`${INDENT}${theme.bold('Repository')} ${root}`);
    this.writeln();

    this.writeln(sectionBanner('languages'));
    this.writeln(keyValue('Primary', report.languages.primaryLanguage ?? theme.dim('(none)')));
    for (const [language, stat] of Object.entries(report.languages.languages)) {
      this.writeln(keyValue(language, `${stat.files} files, ${stat.lines} lines (${stat.percentage}%)`));
    }
    this.writeln();

    this.writeln(sectionBanner('stack'));
    this.writeln(keyValue('Frameworks', listOrNone(report.frameworks)));
    this.writeln(keyValue('Databases', listOrNone(report.databases)));
    this.writeln(keyValue('Infrastructure', listOrNone(report.infrastructure)));
    this.writeln(keyValue('Architecture', report.architecturePattern));
    this.writeln();

    this.writeln(sectionBanner('folders'));
    const folders = Object.entries(report.folders);
    const width = Math.max(8, ...folders.map(([f]) => f.length + 2));
    for (const [folder, info] of folders) {
      this.writeln(`${INDENT}${padRight(folder, width)}${theme.role(info.role)(info.role)} ${theme.dim(`(${info.fileCount})`)}`);
    }
    if (folders.length === 0) this.writeln(`${INDENT}${theme.dim('(none)')}`);
    this.writeln();

    this.writeln(sectionBanner('flow'));
    const stages = report.executionFlow.stages.map((s) => s.id);
    this.writeln(`${INDENT}${stages.length > 0 ? stages.join(` ${theme.arrow} `) : theme.dim('(no stages)')}`);
    this.writeln(
      keyValue('Graph', `${report.totals.graphNodes} files, ${report.totals.graphEdges} import edges`)
    );
    this.writeln(keyValue('Entry points', String(report.totals.entrypoints)));

    for (const r of report.rejected) {
      this.warn(`Skipped record #${r.index}: ${r.reason}`);
    }
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln(`${INDENT}${theme.cross} ${theme.error(theme.bold(title))}`);
    this.writeln(`${INDENT}${INDENT}${details}`);
    if (tip) this.writeln(`${INDENT}${INDENT}${theme.dim(tip)}`);
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  blank(): void {
    this.writeln();
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  analysisSummary(root: string, report: AnalysisReport): void {
    this.emit('analysis_summary', {
      root,
      primaryLanguage: report.languages.primaryLanguage,
      frameworks: report.frameworks,
      databases: report.databases,
      infrastructure: report.infrastructure,
      architecturePattern: report.architecturePattern,
      totals: report.totals,
      rejected: report.rejected.length
    });
  }

  error(title: string, details: string): void {
    this.emit('error', { title, details });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(): SpinnerHandle {
    return startSpinner('', { quiet: true });
  }

  blank(): void { /* no-op */ }
}

// ── Global Instance ─────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

export function getRenderer(): Renderer {
  if (!_instance) _instance = new InteractiveRenderer();
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
