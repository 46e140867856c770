import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FileChangeSource } from '../services/fileChangeSource.js';
import { ExportLogger } from '../utils/exportLogger.js';

interface FakeWatcher {
  emit(event: string, ...args: unknown[]): boolean;
}

const watchers = vi.hoisted(() => {
  const created: FakeWatcher[] = [];
  return created;
});

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('node:events');
  return {
    watch: vi.fn(() => {
      const watcher = Object.assign(new EventEmitter(), { close: vi.fn(async () => {}) });
      watchers.push(watcher);
      return watcher;
    }),
  };
});

function lastWatcher(): FakeWatcher {
  const watcher = watchers[watchers.length - 1];
  if (!watcher) throw new Error('no watcher created');
  return watcher;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('FileChangeSource startup', () => {
  it('rejects ready() when the watcher fails before its initial scan', async () => {
    const source = new FileChangeSource('/content', { logger: new ExportLogger() });
    lastWatcher().emit('error', new Error('EACCES: permission denied'));

    await expect(source.ready()).rejects.toThrow('EACCES: permission denied');
    expect(console.error).toHaveBeenCalledWith('[graphdoc] Content watcher error error=Error: EACCES: permission denied');
  });

  it('stays ready when the watcher fails later', async () => {
    const source = new FileChangeSource('/content', { logger: new ExportLogger() });
    const watcher = lastWatcher();
    watcher.emit('ready');
    await expect(source.ready()).resolves.toBeUndefined();

    watcher.emit('error', new Error('EMFILE: too many open files'));
    await expect(source.ready()).resolves.toBeUndefined();
  });
});
