import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileAssetRepository, handleForFile } from '../services/fileAssetRepository.js';
import { ExportLogger } from '../utils/exportLogger.js';
import { fixturePath } from './helpers.js';

let contentDir: string;

function place(relative: string, text: string): void {
  const target = path.join(contentDir, relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, text);
}

beforeEach(() => {
  contentDir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphdoc-repo-test-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  place('Props/Door.json', fs.readFileSync(fixturePath('door.json'), 'utf-8'));
  place('Props/Mechanisms/Lever.json', fs.readFileSync(fixturePath('lever.json'), 'utf-8'));
  place('Textures/Wood.json', JSON.stringify({ asset_class: 'Texture2D', name: 'Wood' }));
  place('Broken.json', '{');
  place('README.txt', 'not an asset');
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(contentDir, { recursive: true, force: true });
});

describe('handleForFile', () => {
  it('is the forward-slash path relative to the content directory', () => {
    expect(handleForFile(contentDir, path.join(contentDir, 'Props', 'Door.json'))).toBe('Props/Door.json');
  });
});

describe('FileAssetRepository', () => {
  it('lists script assets in sorted handle order', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    expect(repository.queryByKind('Blueprint')).toEqual(['Props/Door.json', 'Props/Mechanisms/Lever.json']);
  });

  it('filters by asset kind', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    expect(repository.queryByKind('Texture2D')).toEqual(['Textures/Wood.json']);
  });

  it('warns about unreadable source files', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    repository.queryByKind('Blueprint');
    expect(console.warn).toHaveBeenCalledWith(
      `[graphdoc] Skipping unreadable asset source file=${path.join(contentDir, 'Broken.json')}`,
    );
  });

  it('returns nothing for a missing content directory', () => {
    const repository = new FileAssetRepository(path.join(contentDir, 'absent'), new ExportLogger());
    expect(repository.queryByKind('Blueprint')).toEqual([]);
  });

  it('resolves a handle to its asset', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    const asset = repository.resolve('Props/Mechanisms/Lever.json');
    expect(asset.name).toBe('Lever');
    expect(asset.functionGraphs).toHaveLength(1);
  });

  it('throws for a handle whose source is malformed', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    expect(() => repository.resolve('Broken.json')).toThrow(/invalid JSON/);
  });

  it('rejects handles outside the content directory', () => {
    const repository = new FileAssetRepository(contentDir, new ExportLogger());
    expect(() => repository.filePathFor('../outside.json')).toThrow('outside the content directory');
  });
});
