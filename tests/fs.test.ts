import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readJsonIfExists, writeJsonFile } from '../src/utils/fs.js';

describe('JSON files', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'collection-etl-fs-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads nothing from a missing file', async () => {
    await expect(readJsonIfExists(join(root, 'missing.json'))).resolves.toBeUndefined();
  });

  it('fails on a file that is not JSON', async () => {
    const file = join(root, 'broken.json');
    await writeFile(file, '{"id":', 'utf8');

    await expect(readJsonIfExists(file)).rejects.toThrow(SyntaxError);
  });

  it('fails on a path that is a directory', async () => {
    await expect(readJsonIfExists(root)).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('writes into new directories and leaves no staging file', async () => {
    const file = join(root, 'normalized', 'alice', 'collection.json');

    await writeJsonFile(file, [{ release_id: 1 }]);

    expect(await readFile(file, 'utf8')).toBe('[\n  {\n    "release_id": 1\n  }\n]\n');
    expect(await readdir(join(root, 'normalized', 'alice'))).toEqual(['collection.json']);
  });

  it('replaces an existing file', async () => {
    const file = join(root, 'collection.json');
    await writeJsonFile(file, { version: 1 });

    await writeJsonFile(file, { version: 2 });

    await expect(readJsonIfExists(file)).resolves.toEqual({ version: 2 });
  });
});
