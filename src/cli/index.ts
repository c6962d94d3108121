import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { findPackageRootSync } from '../utils/fs.js';
import { runAnalyzeCommand } from './commands/analyze.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

export function buildCli(): Command {
  const program = new Command();

  let globalFlags: { verbose: boolean; quiet: boolean } = { verbose: false, quiet: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('repo-anatomy')
    .description('Infer languages, stack, folder roles, entry points, file dependencies and execution flow of a repository')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (no formatting)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    globalFlags = { verbose: !!o.verbose, quiet: !!o.quiet };
    createRenderer({ quiet: globalFlags.quiet });
  });

  program
    .command('analyze')
    .description('Analyze a local checkout without executing any of its code')
    .argument('[dir]', 'Repository directory', '.')
    .option('--config <path>', 'Config file (defaults to repo-anatomy.yaml in the directory)')
    .option('--json', 'Print the full report as JSON on stdout')
    .action(async (dir: string, opts: { config?: string; json?: boolean }) => {
      const res = await runAnalyzeCommand({
        dir,
        configPath: opts.config,
        json: !!opts.json,
        verbose: globalFlags.verbose,
        quiet: globalFlags.quiet,
      });
      if (!res.ok) {
        const r = getRenderer();
        r.error(
          'Analysis failed',
          String(res.details ?? 'unknown error'),
          'Try running with --verbose for more details.',
        );
        process.exitCode = 1;
      }
    });

  return program;
}

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getRenderer().error('Unexpected error', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });

function detectVersionSync(): string | null {
  try {
    const root = findPackageRootSync();
    if (!root) return null;
    const parsed = JSON.parse(readFileSync(join(root, 'package.json'), 'utf8')) as { version?: unknown };
    return typeof parsed.version === 'string' ? parsed.version : null;
  } catch {
    return null;
  }
}
