/** Writes exported documents to disk: temp file, then rename into place. */

import fs from 'node:fs';
import path from 'node:path';
import type { DocumentWriter } from '../models/collaborators.js';
import type { ExportLogger } from '../utils/exportLogger.js';
import { defaultLogger } from '../utils/exportLogger.js';

export class FileDocumentWriter implements DocumentWriter {
  private logger: ExportLogger;

  constructor(logger: ExportLogger = defaultLogger) {
    this.logger = logger;
  }

  write(filePath: string, text: string): boolean {
    const tmp = filePath + '.tmp';
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(tmp, text, 'utf-8');
      fs.renameSync(tmp, filePath);
      return true;
    } catch (err) {
      this.logger.error('Failed to save file', { path: filePath, error: (err as Error).message });
      fs.rmSync(tmp, { force: true });
      return false;
    }
  }
}
