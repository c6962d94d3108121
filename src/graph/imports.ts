const PYTHON_PATTERNS = [/^import\s+([\w.]+)/, /^from\s+([\w.]+)\s+import/];

const JS_PATTERNS = [
  /import\s+.*?from\s+['"]([^'"]+)['"]/g,
  /require\s*\(['"]([^'"]+)['"]\)/g,
  /import\s*\(['"]([^'"]+)['"]\)/g
];

const PYTHON_EXTS = ['.py'];
const JS_EXTS = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx'];

export type ImportFamily = 'python' | 'javascript';

export function importFamily(path: string): ImportFamily | null {
  if (PYTHON_EXTS.some((e) => path.endsWith(e))) return 'python';
  if (JS_EXTS.some((e) => path.endsWith(e))) return 'javascript';
  return null;
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

/**
 * Top-level modules named by leading `import x` / `from x import` lines.
 * Relative forms (`from . import y`) have no top-level name and are skipped.
 */
export function extractPythonImports(content: string): string[] {
  const found: string[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    for (const re of PYTHON_PATTERNS) {
      const m = re.exec(line);
      if (!m) continue;
      const top = (m[1] ?? '').split('.')[0] ?? '';
      if (top) found.push(top);
      break;
    }
  }
  return unique(found);
}

/**
 * Package names from ES imports, `require()` and dynamic `import()`.
 * Relative and absolute specifiers are dropped; scoped packages keep `@scope/name`.
 */
export function extractJsImports(content: string): string[] {
  const found: string[] = [];
  for (const re of JS_PATTERNS) {
    for (const m of content.matchAll(re)) {
      const specifier = m[1];
      if (!specifier || specifier.startsWith('.') || specifier.startsWith('/')) continue;
      found.push(packageName(specifier));
    }
  }
  return unique(found);
}

export function packageName(specifier: string): string {
  const parts = specifier.split('/');
  const first = parts[0] ?? specifier;
  if (first.startsWith('@') && parts.length > 1) return `${first}/${parts[1]}`;
  return first;
}

export function extractImports(path: string, content: string): string[] {
  switch (importFamily(path)) {
    case 'python':
      return extractPythonImports(content);
    case 'javascript':
      return extractJsImports(content);
    default:
      return [];
  }
}
