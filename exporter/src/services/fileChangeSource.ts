/** Change notification source backed by a chokidar watcher on the content directory. */

import path from 'node:path';
import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { ChangeEventClass, ChangeHandler, ChangeNotificationSource } from '../models/collaborators.js';
import { UNKNOWN_ASSET_KIND } from '../utils/constants.js';
import type { ExportLogger } from '../utils/exportLogger.js';
import { defaultLogger } from '../utils/exportLogger.js';
import { readAssetClass } from './assetLoader.js';
import { handleForFile } from './fileAssetRepository.js';
import { NotificationHub } from './notificationHub.js';

const ALWAYS_IGNORE = [
  '**/.git/**',
  '**/node_modules/**',
  '**/.DS_Store',
];

export interface FileChangeSourceOptions {
  /** Milliseconds a file must stay unchanged before an event fires. */
  stabilityThreshold?: number;
  logger?: ExportLogger;
}

export class FileChangeSource implements ChangeNotificationSource {
  private contentDir: string;
  private hub = new NotificationHub();
  private watcher: FSWatcher;
  private logger: ExportLogger;
  private readyPromise: Promise<void>;

  constructor(contentDir: string, options: FileChangeSourceOptions = {}) {
    this.contentDir = path.resolve(contentDir);
    this.logger = options.logger ?? defaultLogger;
    this.watcher = watch(this.contentDir, {
      ignoreInitial: true,
      ignored: ALWAYS_IGNORE,
      awaitWriteFinish: {
        stabilityThreshold: options.stabilityThreshold ?? 200,
        pollInterval: 100,
      },
    });

    // An error before the initial scan completes means the watcher never becomes ready.
    this.readyPromise = new Promise((resolve, reject) => {
      const onEarlyError = (err: Error) => reject(err);
      this.watcher.once('error', onEarlyError);
      this.watcher.once('ready', () => {
        this.watcher.off('error', onEarlyError);
        resolve();
      });
    });
    void this.readyPromise.catch((err: unknown) => {
      this.logger.debug('Content watcher failed before ready', { error: String(err) });
    });

    this.watcher
      .on('add', (filePath) => this.forward('asset-added', filePath))
      .on('change', (filePath) => this.forward('asset-modified', filePath))
      .on('unlink', (filePath) => this.forward('asset-removed', filePath))
      .on('error', (err) => this.logger.error('Content watcher error', { error: String(err) }));
  }

  subscribe(eventClass: ChangeEventClass, owner: object, handler: ChangeHandler): void {
    this.hub.subscribe(eventClass, owner, handler);
  }

  unsubscribeAll(owner: object): void {
    this.hub.unsubscribeAll(owner);
  }

  /**
   * Resolves once the initial scan is done; changes after this are reported.
   * Rejects when the watcher fails before then.
   */
  ready(): Promise<void> {
    return this.readyPromise;
  }

  /** Stop watching the content directory. */
  close(): Promise<void> {
    return this.watcher.close();
  }

  private forward(eventClass: ChangeEventClass, filePath: string): void {
    if (!filePath.endsWith('.json')) return;
    const kind = eventClass === 'asset-removed'
      ? UNKNOWN_ASSET_KIND
      : readAssetClass(filePath) ?? UNKNOWN_ASSET_KIND;
    const handle = handleForFile(this.contentDir, filePath);
    this.logger.debug('Content change', { eventClass, handle, kind });
    this.hub.publish(eventClass, handle, kind);
  }
}
