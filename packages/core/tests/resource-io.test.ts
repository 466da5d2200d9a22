import { expect, test, describe, beforeEach, afterEach } from '@rstest/core';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createMemoryResourceIO, fileResourceIO } from '../src/resource-io.js';

describe('fileResourceIO', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'brushgen-io-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('creates parent directories on write', async () => {
    const path = join(dir, 'Project', 'Themes', 'Theme.Light.xaml');

    await fileResourceIO.write(path, '<ResourceDictionary />\n');

    expect(readFileSync(path, 'utf8')).toBe('<ResourceDictionary />\n');
    expect(await fileResourceIO.read(path)).toBe('<ResourceDictionary />\n');
  });

  test('rejects reads of missing files with ENOENT', async () => {
    await expect(fileResourceIO.read(join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('createMemoryResourceIO', () => {
  test('records writes in order', async () => {
    const io = createMemoryResourceIO({ '/in.json': '[]' });

    await io.write('/b', 'B');
    await io.write('/a', 'A');

    expect(await io.read('/in.json')).toBe('[]');
    expect(io.writes).toEqual(['/b', '/a']);
    expect(io.files.get('/a')).toBe('A');
  });

  test('rejects reads of unknown paths with ENOENT', async () => {
    await expect(createMemoryResourceIO().read('/missing')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
