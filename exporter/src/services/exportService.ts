/** Exports script assets to a directory tree of JSON documents and markdown pages. */

import fs from 'node:fs';
import path from 'node:path';
import type { AssetRepository, DocumentWriter } from '../models/collaborators.js';
import type { AssetDocument } from '../models/document.js';
import type { ScriptAsset } from '../models/scriptAsset.js';
import { CONTENT_MOUNT_PREFIX, SCRIPT_ASSET_KIND } from '../utils/constants.js';
import { AssetDocumentSchema } from '../utils/documentSchema.js';
import type { ExportLogger } from '../utils/exportLogger.js';
import { defaultLogger } from '../utils/exportLogger.js';
import { documentToJson, serializeAsset } from './assetEncoder.js';
import { FileDocumentWriter } from './fileDocumentWriter.js';
import { renderAssetMarkdown, renderIndexMarkdown } from './markdownRenderer.js';

export const INDEX_FILENAME = 'index.md';

/**
 * Map an asset path to a file under the output directory.
 * `/Game/Characters/BP_Player.BP_Player` -> `<out>/Characters/BP_Player.json`
 */
export function outputPathFor(outputDir: string, assetPath: string, extension: string): string {
  let relative = assetPath.startsWith(CONTENT_MOUNT_PREFIX)
    ? assetPath.slice(CONTENT_MOUNT_PREFIX.length)
    : assetPath.replace(/^\/+/, '');

  const segments = relative.split('/').filter((s) => s !== '' && s !== '.' && s !== '..');
  const last = segments.pop() ?? 'Unnamed';
  const dot = last.indexOf('.');
  const fileBase = dot > 0 ? last.slice(0, dot) : last;
  relative = [...segments, fileBase + extension].join('/');

  return path.join(outputDir, ...relative.split('/'));
}

/** Markdown pages below a directory, relative with forward slashes, excluding the index. */
export function listMarkdownPages(outputDir: string): string[] {
  const pages: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() && entry.name.endsWith('.md') && full !== path.join(outputDir, INDEX_FILENAME)) {
        pages.push(path.relative(outputDir, full).split(path.sep).join('/'));
      }
    }
  };
  if (fs.existsSync(outputDir)) walk(outputDir);
  return pages.sort();
}

export interface ExportServiceOptions {
  outputDir: string;
  /** Write a markdown page beside every JSON document. */
  markdown: boolean;
  writer?: DocumentWriter;
  logger?: ExportLogger;
  /** Clock for the index timestamp. */
  now?: () => Date;
}

export interface ExportAllResult {
  exported: number;
  /** Script assets the repository listed, including ones that failed. */
  total: number;
}

export class ExportService {
  private outputDir: string;
  private markdown: boolean;
  private writer: DocumentWriter;
  private logger: ExportLogger;
  private now: () => Date;

  constructor(options: ExportServiceOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.markdown = options.markdown;
    this.logger = options.logger ?? defaultLogger;
    this.writer = options.writer ?? new FileDocumentWriter(this.logger);
    this.now = options.now ?? (() => new Date());
  }

  /** Serialize one asset and write its document. Returns false when nothing was written. */
  exportAsset(asset: ScriptAsset | null | undefined): boolean {
    const result = serializeAsset(asset);
    if (!result.ok) {
      this.logger.error('ExportAsset: invalid script asset', { error: result.error.message });
      return false;
    }

    const jsonPath = outputPathFor(this.outputDir, result.document.path, '.json');
    if (!this.writer.write(jsonPath, documentToJson(result))) {
      return false;
    }
    this.logger.assetExported(result.document.name, jsonPath);

    if (this.markdown) {
      const mdPath = outputPathFor(this.outputDir, result.document.path, '.md');
      if (this.writer.write(mdPath, renderAssetMarkdown(result.document))) {
        this.logger.debug('Exported markdown', { path: mdPath });
      }
    }
    return true;
  }

  /** Export every script asset the repository knows. */
  exportAll(repository: AssetRepository): ExportAllResult {
    const handles = repository.queryByKind(SCRIPT_ASSET_KIND);
    let exported = 0;

    for (const handle of handles) {
      let asset: ScriptAsset;
      try {
        asset = repository.resolve(handle);
      } catch (err) {
        this.logger.warn('Skipping asset that could not be loaded', {
          handle,
          error: (err as Error).message,
        });
        continue;
      }
      if (this.exportAsset(asset)) exported++;
    }

    if (this.markdown) this.writeIndex();
    this.logger.exportSummary(exported, handles.length);
    return { exported, total: handles.length };
  }

  /** Rewrite the index page from the markdown pages currently in the output directory. */
  writeIndex(): boolean {
    const indexPath = path.join(this.outputDir, INDEX_FILENAME);
    const content = renderIndexMarkdown(listMarkdownPages(this.outputDir), this.now().toISOString());
    const ok = this.writer.write(indexPath, content);
    if (ok) this.logger.info('Generated index', { path: indexPath });
    return ok;
  }
}

/** Parse an exported document file. Null (and an error log) when it cannot be read. */
export function readDocumentFile(filePath: string, logger: ExportLogger = defaultLogger): AssetDocument | null {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = AssetDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Not an exported document', { file: filePath, issues: parsed.error.issues.map((i) => i.message) });
      return null;
    }
    const document: AssetDocument = parsed.data;
    return document;
  } catch (err) {
    logger.error('Failed to read document', { file: filePath, error: (err as Error).message });
    return null;
  }
}

/** Write the markdown sibling of every exported document under a directory. Returns the count. */
export function regenerateMarkdown(
  jsonDir: string,
  writer: DocumentWriter,
  logger: ExportLogger = defaultLogger,
): number {
  const files: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && entry.name.endsWith('.json') && entry.name !== 'index.json') files.push(full);
    }
  };
  if (!fs.existsSync(jsonDir)) {
    logger.warn('Document directory does not exist', { dir: jsonDir });
    return 0;
  }
  walk(jsonDir);
  files.sort();
  logger.info(`Found ${files.length} JSON files`, { dir: jsonDir });

  let written = 0;
  for (const file of files) {
    const document = readDocumentFile(file, logger);
    if (!document) continue;
    const mdPath = file.replace(/\.json$/, '.md');
    if (writer.write(mdPath, renderAssetMarkdown(document))) {
      logger.info(`Created ${path.basename(mdPath)}`);
      written++;
    }
  }
  logger.info('Markdown regeneration complete', { written, total: files.length });
  return written;
}
