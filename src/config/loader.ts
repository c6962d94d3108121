import { join } from 'node:path';
import { ZodError } from 'zod';

import { fileExists, readYaml } from '../utils/fs.js';
import { ConfigSchema, defaultConfig, type AnalysisConfig } from './schema.js';

export const CONFIG_FILENAMES = ['repo-anatomy.yaml', 'repo-anatomy.yml'] as const;

export class ConfigError extends Error {
  constructor(
    readonly file: string,
    message: string
  ) {
    super(`Invalid config ${file}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load `explicitPath` if given, otherwise the first config file found in `dir`.
 * No file means defaults; a file that does not validate is an error.
 */
export async function loadConfig(dir: string, explicitPath?: string): Promise<{ config: AnalysisConfig; source: string | null }> {
  let source: string | null = explicitPath ?? null;
  if (!source) {
    for (const name of CONFIG_FILENAMES) {
      const candidate = join(dir, name);
      if (await fileExists(candidate)) {
        source = candidate;
        break;
      }
    }
  }
  if (!source) return { config: defaultConfig(), source: null };

  const raw = await readYaml(source);
  try {
    return { config: ConfigSchema.parse(raw ?? {}), source };
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(source, err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    throw err;
  }
}
