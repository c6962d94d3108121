import { theme, INDENT, RULE_WIDTH } from './theme.js';

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

// ── Section Banners ─────────────────────────────────────────────────────────

/**
 * A section banner:  ── Stack ────────────────────────
 */
export function sectionBanner(name: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const label = name.charAt(0).toUpperCase() + name.slice(1);
  const suffixLen = Math.max(4, width - prefix.length - label.length - 1);
  return theme.dim(prefix) + theme.bold(label) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Primary       TypeScript"
 */
export function keyValue(label: string, value: string, labelWidth: number = 16): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

/** Comma-joined list, or a dim placeholder when empty. */
export function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : theme.dim('(none)');
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes from a string (for width calculations and tests).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Format milliseconds into a compact human-readable string ("124ms", "3.2s").
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
