import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { AssetHandle, AssetRepository } from '../models/collaborators.js';
import type { ScriptAsset } from '../models/scriptAsset.js';
import { ChangeMonitor } from '../services/changeMonitor.js';
import { NotificationHub } from '../services/notificationHub.js';
import { ExportLogger } from '../utils/exportLogger.js';
import { loadFixture } from './helpers.js';

class MemoryRepository implements AssetRepository {
  readonly assets = new Map<AssetHandle, ScriptAsset>();
  resolveCalls: AssetHandle[] = [];

  queryByKind(): AssetHandle[] {
    return [...this.assets.keys()].sort();
  }

  resolve(handle: AssetHandle): ScriptAsset {
    this.resolveCalls.push(handle);
    const asset = this.assets.get(handle);
    if (!asset) throw new Error(`No asset "${handle}"`);
    return asset;
  }
}

let hub: NotificationHub;
let repository: MemoryRepository;
let monitor: ChangeMonitor;
let door: ScriptAsset;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  hub = new NotificationHub();
  repository = new MemoryRepository();
  door = loadFixture('door.json');
  repository.assets.set('Props/Door.json', door);
  monitor = new ChangeMonitor(hub, repository, { logger: new ExportLogger() });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ChangeMonitor', () => {
  it('starts idle with no subscriptions', () => {
    expect(monitor.state).toBe('idle');
    expect(hub.subscriptionCount()).toBe(0);
  });

  it('registers one handler per event class on start', () => {
    monitor.start(() => {});
    expect(monitor.state).toBe('monitoring');
    expect(hub.subscriptionCount(monitor)).toBe(3);
  });

  it('relays added and modified script assets synchronously', () => {
    const received: string[] = [];
    monitor.start((asset) => received.push(asset.name));

    hub.publish('asset-added', 'Props/Door.json', 'Blueprint');
    expect(received).toEqual(['Door']);
    hub.publish('asset-modified', 'Props/Door.json', 'Blueprint');
    expect(received).toEqual(['Door', 'Door']);
  });

  it('ignores removals', () => {
    const callback = vi.fn();
    monitor.start(callback);
    hub.publish('asset-removed', 'Props/Door.json', 'Blueprint');
    expect(callback).not.toHaveBeenCalled();
    expect(repository.resolveCalls).toEqual([]);
  });

  it('ignores other asset kinds without resolving them', () => {
    const callback = vi.fn();
    monitor.start(callback);
    hub.publish('asset-modified', 'Textures/Wood.json', 'Texture2D');
    expect(callback).not.toHaveBeenCalled();
    expect(repository.resolveCalls).toEqual([]);
  });

  it('skips assets that fail to resolve and keeps monitoring', () => {
    const callback = vi.fn();
    monitor.start(callback);
    hub.publish('asset-added', 'Props/Missing.json', 'Blueprint');
    expect(callback).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);

    hub.publish('asset-added', 'Props/Door.json', 'Blueprint');
    expect(callback).toHaveBeenCalledWith(door);
  });

  it('replaces the callback when started twice, without duplicate subscriptions', () => {
    const first = vi.fn();
    const second = vi.fn();
    monitor.start(first);
    monitor.start(second);
    expect(hub.subscriptionCount(monitor)).toBe(3);

    hub.publish('asset-modified', 'Props/Door.json', 'Blueprint');
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('stops relaying after stop', () => {
    const callback = vi.fn();
    monitor.start(callback);
    monitor.stop();
    expect(monitor.state).toBe('idle');
    expect(hub.subscriptionCount(monitor)).toBe(0);

    hub.publish('asset-added', 'Props/Door.json', 'Blueprint');
    expect(callback).not.toHaveBeenCalled();
  });

  it('treats stop while idle as a no-op', () => {
    monitor.stop();
    expect(monitor.state).toBe('idle');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('can be restarted after stopping', () => {
    monitor.start(() => {});
    monitor.stop();
    const callback = vi.fn();
    monitor.start(callback);
    hub.publish('asset-added', 'Props/Door.json', 'Blueprint');
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('leaves other owners subscribed', () => {
    const other = new ChangeMonitor(hub, repository, { logger: new ExportLogger() });
    other.start(() => {});
    monitor.start(() => {});
    monitor.stop();
    expect(hub.subscriptionCount(other)).toBe(3);
    expect(hub.subscriptionCount()).toBe(3);
  });
});
