import { describe, expect, it } from 'vitest';

import { aggregateLanguages, classifyLanguage, countNonBlankLines } from '../src/analysis/languages.js';
import type { FileRecord } from '../src/analysis/types.js';

function file(path: string, content = ''): FileRecord {
  return { path, content };
}

describe('classifyLanguage', () => {
  it('maps extensions case-insensitively', () => {
    expect(classifyLanguage('src/App.TSX')).toBe('TypeScript');
    expect(classifyLanguage('scripts/build.sh')).toBe('Shell');
    expect(classifyLanguage('analysis/model.R')).toBe('R');
  });

  it('returns Unknown without a dot or for unmapped extensions', () => {
    expect(classifyLanguage('Makefile')).toBe('Unknown');
    expect(classifyLanguage('notes.txt')).toBe('Unknown');
  });
});

describe('countNonBlankLines', () => {
  it('ignores whitespace-only lines', () => {
    expect(countNonBlankLines('x = 1\n\n   \n\ty = 2\n')).toBe(2);
    expect(countNonBlankLines('')).toBe(0);
  });
});

describe('aggregateLanguages', () => {
  it('computes file-based percentages and excludes unknown files', () => {
    const stats = aggregateLanguages([
      file('a.py', 'x = 1\n\n   \ny = 2\n'),
      file('b.py', 'print()'),
      file('c.ts', 'const a = 1;\n'),
      file('README', 'hello'),
      file('d.md', '# Title')
    ]);

    expect(stats.totalFiles).toBe(4);
    expect(stats.primaryLanguage).toBe('Python');
    expect(stats.languages).toEqual({
      Python: { files: 2, lines: 3, percentage: 50 },
      TypeScript: { files: 1, lines: 1, percentage: 25 },
      Markdown: { files: 1, lines: 1, percentage: 25 }
    });
  });

  it('orders languages by file count', () => {
    const stats = aggregateLanguages([file('a.md'), file('b.py'), file('c.py')]);
    expect(Object.keys(stats.languages)).toEqual(['Python', 'Markdown']);
  });

  it('breaks primary-language ties by first encounter', () => {
    expect(aggregateLanguages([file('x.ts'), file('y.py')]).primaryLanguage).toBe('TypeScript');
    expect(aggregateLanguages([file('y.py'), file('x.ts')]).primaryLanguage).toBe('Python');
  });

  it('rounds percentages to two decimals', () => {
    const stats = aggregateLanguages([file('a.py'), file('b.go'), file('c.rs')]);
    expect(stats.languages.Python?.percentage).toBe(33.33);
    expect(stats.languages.Go?.percentage).toBe(33.33);
  });

  it('keeps the primary language at the maximum file count with percentages in range', () => {
    const stats = aggregateLanguages([
      file('a.go'),
      file('b.go'),
      file('c.js'),
      file('d.js'),
      file('e.js'),
      file('f.css')
    ]);
    const counts = Object.values(stats.languages).map((s) => s.files);
    const primary = stats.primaryLanguage ? stats.languages[stats.primaryLanguage] : undefined;
    expect(primary?.files).toBe(Math.max(...counts));
    for (const s of Object.values(stats.languages)) {
      expect(s.percentage).toBeGreaterThanOrEqual(0);
      expect(s.percentage).toBeLessThanOrEqual(100);
    }
  });

  it('returns an empty result when nothing is classified', () => {
    const empty = { languages: {}, primaryLanguage: null, totalFiles: 0 };
    expect(aggregateLanguages([])).toEqual(empty);
    expect(aggregateLanguages([file('LICENSE', 'MIT'), file('notes.txt', 'x')])).toEqual(empty);
  });
});
