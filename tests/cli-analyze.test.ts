import { afterEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runAnalyzeCommand } from '../src/cli/commands/analyze.js';
import { stripAnsi } from '../src/cli/ui/format.js';
import { InteractiveRenderer, QuietRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import { startSpinner, type SpinnerHandle } from '../src/cli/ui/spinner.js';

class TextRenderer extends InteractiveRenderer {
  constructor(readonly output: string[] = []) {
    super((msg) => output.push(stripAnsi(msg)));
  }

  override spinner(): SpinnerHandle {
    return startSpinner('', { quiet: true });
  }
}

const tempDirs: string[] = [];

async function flaskCheckout(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'repo-anatomy-cli-'));
  tempDirs.push(dir);
  await mkdir(join(dir, 'src'), { recursive: true });
  await writeFile(join(dir, 'src', 'app.py'), 'from flask import Flask\napp = Flask(__name__)\n', 'utf8');
  await writeFile(join(dir, 'requirements.txt'), 'flask==2.0\n', 'utf8');
  return dir;
}

afterEach(async () => {
  setRenderer(new QuietRenderer());
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe('runAnalyzeCommand', () => {
  it('prints the report as JSON', async () => {
    setRenderer(new QuietRenderer());
    const dir = await flaskCheckout();
    const chunks: string[] = [];

    const res = await runAnalyzeCommand({ dir, json: true, quiet: true, out: (t) => chunks.push(t) });

    expect(res.ok).toBe(true);
    expect(chunks).toHaveLength(1);
    const printed: unknown = JSON.parse(chunks[0] ?? '');
    expect(printed).toMatchObject({
      frameworks: ['Flask'],
      folders: { src: { role: 'misc', fileCount: 1 } },
      totals: { files: 2, folders: 1, entrypoints: 2 }
    });
  });

  it('renders a summary without --json', async () => {
    const renderer = new TextRenderer();
    setRenderer(renderer);
    const dir = await flaskCheckout();

    const res = await runAnalyzeCommand({ dir, quiet: true });

    expect(res.ok).toBe(true);
    const lines = renderer.output.join('').split('\n');
    expect(lines).toContain('  Frameworks      Flask');
    expect(lines).toContain('  Primary         Python');
    expect(lines).toContain('  Architecture    Modular application');
  });

  it('fails on an invalid config file', async () => {
    setRenderer(new QuietRenderer());
    const dir = await flaskCheckout();
    const file = join(dir, 'repo-anatomy.yaml');
    await writeFile(file, 'flow:\n  maxEntryComponents: 0\n', 'utf8');

    const res = await runAnalyzeCommand({ dir, json: true, quiet: true, out: () => {} });

    expect(res).toEqual({
      ok: false,
      details: `Invalid config ${file}: flow.maxEntryComponents: Number must be greater than 0`
    });
  });
});
