import { getRuleTables } from '../rules/tables.js';
import type { ApplicationEntry, DockerEntry, EntryPointSet, FileRecord, FrameworkEntry } from './types.js';

interface FrameworkMatcher {
  name: string;
  patterns: RegExp[];
}

let compiled: FrameworkMatcher[] | null = null;

function frameworkMatchers(): FrameworkMatcher[] {
  if (compiled) return compiled;
  compiled = getRuleTables().entrypoints.frameworks.map((f) => ({
    name: f.name,
    patterns: f.patterns.map((p) => new RegExp(p, 'im'))
  }));
  return compiled;
}

export function baseName(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? path : path.slice(slash + 1);
}

export function extractDockerDirectives(content: string, directives: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    for (const d of directives) {
      if (line.startsWith(d)) out.push(line);
    }
  }
  return out;
}

function firstPerPath<T extends { path: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    if (seen.has(item.path)) continue;
    seen.add(item.path);
    out.push(item);
  }
  return out;
}

/**
 * Conventional entry files, framework bootstrap code and container start commands.
 */
export function findEntrypoints(files: readonly FileRecord[]): EntryPointSet {
  const table = getRuleTables().entrypoints;
  const matchers = frameworkMatchers();

  const applicationFiles: ApplicationEntry[] = [];
  const frameworkEntrypoints: FrameworkEntry[] = [];
  const dockerEntrypoints: DockerEntry[] = [];

  for (const file of files) {
    const filename = baseName(file.path);

    for (const [language, names] of Object.entries(table.filenames)) {
      if (names.includes(filename)) applicationFiles.push({ path: file.path, language, filename });
    }

    for (const m of matchers) {
      if (m.patterns.some((re) => re.test(file.content))) {
        frameworkEntrypoints.push({ path: file.path, framework: m.name });
      }
    }

    if (filename === table.dockerFilename || file.path.includes(table.dockerFilename)) {
      for (const command of extractDockerDirectives(file.content, table.dockerDirectives)) {
        dockerEntrypoints.push({ path: file.path, command });
      }
    }
  }

  return {
    applicationFiles: firstPerPath(applicationFiles),
    frameworkEntrypoints: firstPerPath(frameworkEntrypoints),
    dockerEntrypoints
  };
}
