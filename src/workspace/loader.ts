import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import picomatch from 'picomatch';

import type { FileRecord } from '../analysis/types.js';
import type { IngestionOptions } from '../config/schema.js';
import { getRuleTables } from '../rules/tables.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const BINARY_SAMPLE_BYTES = 8192;
const BINARY_CONTROL_RATIO = 0.3;

/**
 * NUL bytes, or too many control characters (other than tab/LF/CR) in the first 8 KiB.
 */
export function isBinaryContent(bytes: Uint8Array): boolean {
  if (bytes.includes(0)) return true;
  const sample = bytes.subarray(0, BINARY_SAMPLE_BYTES);
  if (sample.length === 0) return false;
  let control = 0;
  for (const b of sample) {
    if (b < 32 && b !== 9 && b !== 10 && b !== 13) control++;
  }
  return control / sample.length > BINARY_CONTROL_RATIO;
}

export interface WorkspaceFilter {
  isIgnoredPath(relPath: string): boolean;
  isAllowedFile(relPath: string): boolean;
}

export function createWorkspaceFilter(options: IngestionOptions): WorkspaceFilter {
  const defaults = getRuleTables().ingestion;
  const ignoredDirs = new Set(options.ignoredDirectories ?? defaults.ignoredDirectories);
  const allowedExts = new Set((options.allowedExtensions ?? defaults.allowedExtensions).map((e) => e.toLowerCase()));
  const allowedNames = new Set(options.allowedFilenames ?? defaults.allowedFilenames);
  const ignoreGlobs = options.ignore.length > 0 ? picomatch(options.ignore, { dot: true }) : null;

  return {
    isIgnoredPath(relPath) {
      if (relPath.split('/').some((part) => ignoredDirs.has(part))) return true;
      return ignoreGlobs !== null && ignoreGlobs(relPath);
    },
    isAllowedFile(relPath) {
      const name = relPath.slice(relPath.lastIndexOf('/') + 1);
      if (allowedNames.has(name)) return true;
      const dot = name.lastIndexOf('.');
      // Dotfiles without a further extension (`.env`) have no extension.
      if (dot <= 0) return false;
      return allowedExts.has(name.slice(dot).toLowerCase());
    }
  };
}

/**
 * Read a local checkout into file records, applying the same filters ingestion
 * applies upstream. Unreadable entries are logged and skipped.
 */
export async function loadWorkspaceFiles(
  root: string,
  options: IngestionOptions,
  logger: Logger = silentLogger
): Promise<FileRecord[]> {
  const filter = createWorkspaceFilter(options);
  const records: FileRecord[] = [];

  async function walk(relDir: string): Promise<void> {
    const absDir = relDir ? join(root, relDir) : root;
    const entries = await readdir(absDir, { withFileTypes: true }).catch((err: unknown) => {
      logger.warn('cannot read directory', { dir: absDir, error: String(err) });
      return null;
    });
    if (!entries) return;

    for (const entry of entries) {
      const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
      if (filter.isIgnoredPath(rel)) continue;

      if (entry.isDirectory()) {
        await walk(rel);
        continue;
      }
      if (!entry.isFile() || !filter.isAllowedFile(rel)) continue;

      const abs = join(root, rel);
      try {
        const info = await stat(abs);
        if (info.size > options.maxFileBytes) {
          logger.debug('skipping large file', { path: rel, bytes: info.size });
          continue;
        }
        const bytes = await readFile(abs);
        if (isBinaryContent(bytes)) {
          logger.debug('skipping binary file', { path: rel });
          continue;
        }
        records.push({ path: rel, content: bytes.toString('utf8') });
      } catch (err) {
        logger.warn('cannot read file', { path: rel, error: String(err) });
      }
    }
  }

  await walk('');
  return records.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
