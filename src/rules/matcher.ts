import type { FileRecord } from '../analysis/types.js';
import type { DetectionRule } from './tables.js';

type ManifestKind = 'requirements' | 'pyproject' | 'package';

const MANIFESTS: Array<{ kind: ManifestKind; filename: string }> = [
  { kind: 'requirements', filename: 'requirements.txt' },
  { kind: 'pyproject', filename: 'pyproject.toml' },
  { kind: 'package', filename: 'package.json' }
];

function matchesImports(content: string, patterns: readonly string[]): boolean {
  const lower = content.toLowerCase();
  return patterns.some((p) => lower.includes(p.toLowerCase()));
}

/**
 * Dependency names only count inside manifests. Python manifests match loosely;
 * package.json requires the name to appear quoted.
 */
function matchesDependencies(path: string, content: string, names: readonly string[]): boolean {
  for (const { kind, filename } of MANIFESTS) {
    if (!path.includes(filename)) continue;
    if (kind === 'package') {
      if (names.some((n) => content.includes(`"${n}"`) || content.includes(`'${n}'`))) return true;
    } else if (matchesImports(content, names)) {
      return true;
    }
  }
  return false;
}

function matchesExtensions(file: FileRecord, rule: DetectionRule): boolean {
  const extensions = rule.extensions ?? [];
  if (!extensions.some((ext) => file.path.endsWith(ext))) return false;
  const markers = rule.contentMarkers;
  if (!markers || markers.length === 0) return true;
  return markers.some((m) => file.content.includes(m));
}

export function ruleMatchesFile(rule: DetectionRule, file: FileRecord): boolean {
  if (rule.imports && matchesImports(file.content, rule.imports)) return true;
  if (rule.dependencyNames && matchesDependencies(file.path, file.content, rule.dependencyNames)) return true;
  if (rule.configSubstrings?.some((s) => file.content.includes(s))) return true;
  if (rule.filenameSubstrings?.some((s) => file.path.includes(s))) return true;
  if (rule.extensions && matchesExtensions(file, rule)) return true;
  return false;
}

/**
 * Names of every rule that matches at least one file, sorted.
 */
export function evaluateRules(rules: readonly DetectionRule[], files: readonly FileRecord[]): string[] {
  const fired = new Set<string>();
  for (const rule of rules) {
    if (files.some((f) => ruleMatchesFile(rule, f))) fired.add(rule.name);
  }
  return Array.from(fired).sort();
}
