import { StructureOptions } from '../config/schema.js';
import { getRuleTables, type StructureTableData } from '../rules/tables.js';
import type { FileRecord, FolderClassification, FolderInfo, FolderRole } from './types.js';

/** Top-level folder of a path; empty for files at the repository root. */
export function topLevelFolder(path: string): string {
  const slash = path.indexOf('/');
  return slash === -1 ? '' : path.slice(0, slash);
}

function extensionOf(path: string): string {
  const dot = path.lastIndexOf('.');
  return dot === -1 ? '' : path.slice(dot);
}

export function classifyFolderByName(folder: string): FolderRole {
  const lower = folder.toLowerCase();
  for (const { role, names } of getRuleTables().structure.roles) {
    if (names.some((n) => lower.includes(n))) return role;
  }
  return 'misc';
}

function hasSegment(pathLower: string, segments: readonly string[]): boolean {
  return segments.some((s) => pathLower.includes(`/${s}/`) || pathLower.endsWith(`/${s}`));
}

export function classifyFolderByContent(
  paths: readonly string[],
  options: StructureOptions,
  table: StructureTableData = getRuleTables().structure
): FolderRole {
  if (paths.length === 0) return 'misc';

  const buckets = {
    frontend: new Set(table.extensions.frontend),
    backend: new Set(table.extensions.backend),
    config: new Set(table.extensions.config),
    scripts: new Set(table.extensions.scripts)
  };

  let frontend = 0;
  let backend = 0;
  let config = 0;
  let scripts = 0;
  let frontendSegment = false;
  let backendSegment = false;

  for (const path of paths) {
    const ext = extensionOf(path);
    if (buckets.frontend.has(ext)) frontend++;
    if (buckets.backend.has(ext)) backend++;
    if (buckets.config.has(ext)) config++;
    if (buckets.scripts.has(ext)) scripts++;

    const lower = path.toLowerCase();
    if (hasSegment(lower, table.segments.frontend)) frontendSegment = true;
    if (hasSegment(lower, table.segments.backend)) backendSegment = true;
  }

  const floor = options.minDominantFiles;
  const majority = paths.length * options.majorityRatio;

  if (frontendSegment || (frontend > backend && frontend > floor)) return 'frontend';
  if (backendSegment || (backend > frontend && backend > floor)) return 'backend';
  if (config > majority) return 'config';
  if (scripts > majority) return 'scripts';
  return 'misc';
}

/**
 * Assign every top-level folder a role: by name first, then by what it contains.
 * Root-level files are not classified.
 */
export function classifyFolders(
  files: readonly FileRecord[],
  options: Partial<StructureOptions> = {}
): FolderClassification {
  const opts = StructureOptions.parse(options);
  const byFolder = new Map<string, string[]>();

  for (const file of files) {
    const folder = topLevelFolder(file.path);
    if (!folder) continue;
    const list = byFolder.get(folder) ?? [];
    list.push(file.path);
    byFolder.set(folder, list);
  }

  // Own keys, `__proto__` included.
  const folders = Array.from(byFolder.keys()).sort();
  return Object.fromEntries(
    folders.map((folder): [string, FolderInfo] => {
      const paths = byFolder.get(folder) ?? [];
      const byName = classifyFolderByName(folder);
      const role = byName === 'misc' ? classifyFolderByContent(paths, opts) : byName;
      return [folder, { role, fileCount: paths.length }];
    })
  );
}
