import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { NotFoundError } from '../../utils/errors.js';
import { listDirectory, normalizeExtensions } from './path-browser.js';

describe('listDirectory', () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'path-browser-'));
    mkdirSync(path.join(root, 'zeta'));
    mkdirSync(path.join(root, 'Alpha'));
    mkdirSync(path.join(root, '.cache'));
    writeFileSync(path.join(root, 'board.csv'), '');
    writeFileSync(path.join(root, 'Notes.txt'), '');
    writeFileSync(path.join(root, 'widget.kicad_pro'), '');
    writeFileSync(path.join(root, '.hidden.csv'), '');
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists directories before files, sorted, without hidden entries', async () => {
    const listing = await listDirectory(root);

    expect(listing.path).toBe(root);
    expect(listing.parent).toBe(path.dirname(root));
    expect(listing.entries.map((e) => `${e.type}:${e.name}`)).toEqual([
      'directory:Alpha',
      'directory:zeta',
      'file:board.csv',
      'file:Notes.txt',
      'file:widget.kicad_pro',
    ]);
  });

  it('filters files by extension', async () => {
    const listing = await listDirectory(root, { extensions: ['.kicad_pro'] });
    expect(listing.entries.map((e) => e.name)).toEqual(['Alpha', 'zeta', 'widget.kicad_pro']);
  });

  it('can list directories only', async () => {
    const listing = await listDirectory(root, { directoriesOnly: true });
    expect(listing.entries.every((e) => e.type === 'directory')).toBe(true);
    expect(listing.entries[0]?.path).toBe(path.join(root, 'Alpha'));
  });

  it('starts at the home directory when no path is given', async () => {
    const listing = await listDirectory('  ', { homeDir: root, directoriesOnly: true });
    expect(listing.path).toBe(root);
  });

  it('raises NotFoundError for a missing directory', async () => {
    await expect(listDirectory(path.join(root, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('normalizeExtensions', () => {
  it('accepts a comma list with or without dots', () => {
    expect(normalizeExtensions('csv, .YAML,,yml')).toEqual(['.csv', '.yaml', '.yml']);
  });

  it('returns an empty list for nothing', () => {
    expect(normalizeExtensions(undefined)).toEqual([]);
  });
});
