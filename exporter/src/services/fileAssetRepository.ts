/** Asset repository over a directory of asset source files. */

import fs from 'node:fs';
import path from 'node:path';
import type { AssetHandle, AssetRepository } from '../models/collaborators.js';
import type { ScriptAsset } from '../models/scriptAsset.js';
import type { ExportLogger } from '../utils/exportLogger.js';
import { defaultLogger } from '../utils/exportLogger.js';
import { loadAssetFile, readAssetClass } from './assetLoader.js';

/** Handle for a file: its path relative to the content directory, with forward slashes. */
export function handleForFile(contentDir: string, filePath: string): AssetHandle {
  return path.relative(contentDir, filePath).split(path.sep).join('/');
}

export class FileAssetRepository implements AssetRepository {
  private contentDir: string;
  private logger: ExportLogger;

  constructor(contentDir: string, logger: ExportLogger = defaultLogger) {
    this.contentDir = path.resolve(contentDir);
    this.logger = logger;
  }

  get root(): string {
    return this.contentDir;
  }

  /** Absolute path of the source file behind a handle. Rejects handles outside the content directory. */
  filePathFor(handle: AssetHandle): string {
    const resolved = path.resolve(this.contentDir, ...handle.split('/'));
    const relative = path.relative(this.contentDir, resolved);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Asset handle "${handle}" is outside the content directory`);
    }
    return resolved;
  }

  queryByKind(kind: string): AssetHandle[] {
    if (!fs.existsSync(this.contentDir)) {
      this.logger.warn('Content directory does not exist', { contentDir: this.contentDir });
      return [];
    }

    const handles: AssetHandle[] = [];
    for (const filePath of this.listSourceFiles(this.contentDir)) {
      const assetClass = readAssetClass(filePath);
      if (assetClass === null) {
        this.logger.warn('Skipping unreadable asset source', { file: filePath });
        continue;
      }
      if (assetClass === kind) {
        handles.push(handleForFile(this.contentDir, filePath));
      }
    }
    return handles.sort();
  }

  resolve(handle: AssetHandle): ScriptAsset {
    return loadAssetFile(this.filePathFor(handle));
  }

  private listSourceFiles(dir: string): string[] {
    const files: string[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...this.listSourceFiles(full));
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        files.push(full);
      }
    }
    return files;
  }
}
