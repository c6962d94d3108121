import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  cross: chalk.red('✖'),
  arrow: chalk.dim('→'),

  // Folder roles get a stable color each; anything unknown stays white.
  role: (name: string): ChalkInstance => {
    const map: Record<string, ChalkInstance> = {
      frontend: chalk.magenta,
      backend: chalk.yellow,
      database: chalk.cyan,
      infrastructure: chalk.blue,
      tests: chalk.green,
    };
    return map[name.toLowerCase()] ?? chalk.white;
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and section banners. */
export const RULE_WIDTH = 56;
