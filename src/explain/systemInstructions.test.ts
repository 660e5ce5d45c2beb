import { describe, expect, it } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { DEFAULT_SYSTEM_INSTRUCTIONS, loadSystemInstructions } from './systemInstructions.js';

describe('loadSystemInstructions', () => {
  it('reads the file when it has content', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'instructions-'));
    const filePath = path.join(dir, 'system_instructions.txt');
    await writeFile(filePath, '  Объясняй коротко.\n', 'utf8');

    await expect(loadSystemInstructions(filePath)).resolves.toEqual({
      text: 'Объясняй коротко.',
      source: 'file',
    });
  });

  it('falls back to the default when the file is missing', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'instructions-'));

    await expect(loadSystemInstructions(path.join(dir, 'missing.txt'))).resolves.toEqual({
      text: DEFAULT_SYSTEM_INSTRUCTIONS,
      source: 'default',
    });
  });

  it('falls back to the default when the file is blank', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'instructions-'));
    const filePath = path.join(dir, 'blank.txt');
    await writeFile(filePath, '\n   \n', 'utf8');

    const loaded = await loadSystemInstructions(filePath);
    expect(loaded.source).toBe('default');
  });
});
