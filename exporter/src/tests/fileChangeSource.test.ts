import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileChangeSource } from '../services/fileChangeSource.js';
import { ExportLogger } from '../utils/exportLogger.js';
import { fixturePath } from './helpers.js';

let contentDir: string;
let source: FileChangeSource | undefined;

beforeEach(() => {
  contentDir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphdoc-watch-test-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  await source?.close();
  source = undefined;
  vi.restoreAllMocks();
  fs.rmSync(contentDir, { recursive: true, force: true });
});

describe('FileChangeSource', () => {
  it('reports new asset source files with their handle and asset class', async () => {
    source = new FileChangeSource(contentDir, { stabilityThreshold: 50, logger: new ExportLogger() });
    await source.ready();

    const events: Array<[string, string]> = [];
    source.subscribe('asset-added', events, (handle, kind) => events.push([handle, kind]));
    fs.copyFileSync(fixturePath('door.json'), path.join(contentDir, 'Door.json'));

    await vi.waitFor(() => expect(events).toEqual([['Door.json', 'Blueprint']]), { timeout: 5000, interval: 50 });
  }, 10000);

  it('drops handlers on unsubscribeAll', async () => {
    source = new FileChangeSource(contentDir, { stabilityThreshold: 50, logger: new ExportLogger() });
    await source.ready();

    const owner = {};
    const handler = vi.fn();
    source.subscribe('asset-added', owner, handler);
    source.unsubscribeAll(owner);
    const seen = vi.fn();
    source.subscribe('asset-added', {}, seen);
    fs.copyFileSync(fixturePath('door.json'), path.join(contentDir, 'Door.json'));

    await vi.waitFor(() => expect(seen).toHaveBeenCalledTimes(1), { timeout: 5000, interval: 50 });
    expect(handler).not.toHaveBeenCalled();
  }, 10000);
});
