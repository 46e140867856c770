/**
 * Relays asset change notifications for one asset kind to a single callback.
 *
 * idle --start(cb)--> monitoring --stop()--> idle
 *
 * `start` while monitoring replaces the callback and re-registers, so exactly
 * one set of subscriptions exists per monitor. Added and modified assets of
 * the monitored kind are resolved and handed to the callback synchronously.
 * Removals are ignored.
 */

import type {
  AssetHandle,
  AssetRepository,
  ChangeNotificationSource,
} from '../models/collaborators.js';
import type { ScriptAsset } from '../models/scriptAsset.js';
import { SCRIPT_ASSET_KIND } from '../utils/constants.js';
import type { ExportLogger } from '../utils/exportLogger.js';
import { defaultLogger } from '../utils/exportLogger.js';

export type MonitorState = 'idle' | 'monitoring';

export type AssetChangedCallback = (asset: ScriptAsset) => void;

export interface ChangeMonitorOptions {
  /** Asset kind relayed to the callback. Defaults to script assets. */
  assetKind?: string;
  logger?: ExportLogger;
}

export class ChangeMonitor {
  private source: ChangeNotificationSource;
  private repository: AssetRepository;
  private assetKind: string;
  private logger: ExportLogger;
  private callback: AssetChangedCallback | null = null;
  private currentState: MonitorState = 'idle';

  constructor(source: ChangeNotificationSource, repository: AssetRepository, options: ChangeMonitorOptions = {}) {
    this.source = source;
    this.repository = repository;
    this.assetKind = options.assetKind ?? SCRIPT_ASSET_KIND;
    this.logger = options.logger ?? defaultLogger;
  }

  get state(): MonitorState {
    return this.currentState;
  }

  start(callback: AssetChangedCallback): void {
    if (this.currentState === 'monitoring') {
      this.source.unsubscribeAll(this);
    }
    this.callback = callback;

    this.source.subscribe('asset-added', this, (handle, kind) => this.onAssetAdded(handle, kind));
    this.source.subscribe('asset-removed', this, (handle, kind) => this.onAssetRemoved(handle, kind));
    this.source.subscribe('asset-modified', this, (handle, kind) => this.onAssetModified(handle, kind));

    this.currentState = 'monitoring';
    this.logger.info('Change monitoring started', { assetKind: this.assetKind });
  }

  stop(): void {
    if (this.currentState === 'idle') return;

    this.source.unsubscribeAll(this);
    this.callback = null;
    this.currentState = 'idle';
    this.logger.info('Change monitoring stopped', { assetKind: this.assetKind });
  }

  private onAssetAdded(handle: AssetHandle, kind: string): void {
    this.relay(handle, kind);
  }

  private onAssetRemoved(handle: AssetHandle, kind: string): void {
    this.logger.debug('Asset removed', { handle, kind });
  }

  private onAssetModified(handle: AssetHandle, kind: string): void {
    this.relay(handle, kind);
  }

  private relay(handle: AssetHandle, kind: string): void {
    const callback = this.callback;
    if (this.currentState !== 'monitoring' || !callback) return;
    if (kind !== this.assetKind) return;

    let asset: ScriptAsset;
    try {
      asset = this.repository.resolve(handle);
    } catch (err) {
      this.logger.warn('Skipping changed asset that could not be loaded', {
        handle,
        error: (err as Error).message,
      });
      return;
    }
    callback(asset);
  }
}
