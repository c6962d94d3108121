import { existsSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  const parsed: unknown = YAML.parse(raw);
  return parsed;
}

/**
 * Walk up from this module until a directory holding `package.json` is found.
 * Works from `src/` (tests, tsx) and from the bundled `dist/` output alike.
 */
export function findPackageRootSync(startUrl: string = import.meta.url): string | null {
  let current = dirname(fileURLToPath(startUrl));
  for (let i = 0; i < 8; i++) {
    if (existsSync(resolve(current, 'package.json'))) return current;
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  return null;
}
