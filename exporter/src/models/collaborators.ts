/** Interfaces of the collaborators the exporter consumes. */

import type { ScriptAsset } from './scriptAsset.js';

/** Opaque identifier of one asset in a repository. */
export type AssetHandle = string;

export interface AssetRepository {
  /** Handles of every asset of the given kind, in a stable order. */
  queryByKind(kind: string): AssetHandle[];
  /** Load an asset. Throws when it cannot be loaded; callers skip it. */
  resolve(handle: AssetHandle): ScriptAsset;
}

export type ChangeEventClass = 'asset-added' | 'asset-removed' | 'asset-modified';

export const CHANGE_EVENT_CLASSES: readonly ChangeEventClass[] = ['asset-added', 'asset-removed', 'asset-modified'];

export type ChangeHandler = (handle: AssetHandle, assetKind: string) => void;

export interface ChangeNotificationSource {
  subscribe(eventClass: ChangeEventClass, owner: object, handler: ChangeHandler): void;
  /** Drop every handler registered by `owner`. */
  unsubscribeAll(owner: object): void;
}

export interface DocumentWriter {
  /** Write document text. Returns false on failure. */
  write(filePath: string, text: string): boolean;
}
