import { getRuleTables } from '../rules/tables.js';
import { UNKNOWN_LANGUAGE, type FileRecord, type LanguageStat, type LanguageStats } from './types.js';

/**
 * Language of a path by its (case-insensitive) extension, or `Unknown`.
 */
export function classifyLanguage(path: string): string {
  const dot = path.lastIndexOf('.');
  if (dot === -1) return UNKNOWN_LANGUAGE;
  const ext = path.slice(dot).toLowerCase();
  return getRuleTables().languages[ext] ?? UNKNOWN_LANGUAGE;
}

export function countNonBlankLines(content: string): number {
  let n = 0;
  for (const line of content.split('\n')) {
    if (line.trim().length > 0) n++;
  }
  return n;
}

export function aggregateLanguages(files: readonly FileRecord[]): LanguageStats {
  const counts = new Map<string, { files: number; lines: number }>();
  let total = 0;

  for (const file of files) {
    const language = classifyLanguage(file.path);
    if (language === UNKNOWN_LANGUAGE) continue;
    const entry = counts.get(language) ?? { files: 0, lines: 0 };
    entry.files += 1;
    entry.lines += countNonBlankLines(file.content);
    counts.set(language, entry);
    total++;
  }

  if (total === 0) return { languages: {}, primaryLanguage: null, totalFiles: 0 };

  // Strict comparison keeps the first-counted language on ties.
  let primaryLanguage: string | null = null;
  let best = -1;
  for (const [language, { files: n }] of counts) {
    if (n > best) {
      best = n;
      primaryLanguage = language;
    }
  }

  const ordered = Array.from(counts.entries()).sort((a, b) => b[1].files - a[1].files);
  const languages = Object.fromEntries(
    ordered.map(([language, { files: n, lines }]): [string, LanguageStat] => [
      language,
      { files: n, lines, percentage: round2((n / total) * 100) }
    ])
  );

  return { languages, primaryLanguage, totalFiles: total };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
