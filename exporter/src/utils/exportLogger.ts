/** Structured export logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type LogData = Record<string, string | number | boolean | string[] | null | undefined>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: LogData;
}

export interface ExportLoggerOptions {
  /** Directory for export.jsonl and export.log. Console only when omitted. */
  logDir?: string;
  /** Echo debug entries to the console. */
  verbose?: boolean;
}

export class ExportLogger {
  private jsonlPath: string | null = null;
  private textPath: string | null = null;
  private verbose: boolean;
  private runStart: number;
  private fileWriteFailed = false;

  constructor(options: ExportLoggerOptions = {}) {
    if (options.logDir) {
      fs.mkdirSync(options.logDir, { recursive: true });
      this.jsonlPath = path.join(options.logDir, 'export.jsonl');
      this.textPath = path.join(options.logDir, 'export.log');
    }
    this.verbose = options.verbose ?? false;
    this.runStart = Date.now();
  }

  /** Write a structured log entry. */
  log(level: LogLevel, event: string, data?: LogData): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + this.formatData(data) : '';

    if (this.jsonlPath) {
      this.append(this.jsonlPath, JSON.stringify(entry) + '\n');
    }
    if (this.textPath) {
      this.append(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
    }

    const consoleMsg = `[graphdoc] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else if (level === 'info' || this.verbose) {
      console.log(consoleMsg);
    }
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  /** Log one written document. */
  assetExported(assetName: string, filePath: string): void {
    this.info(`Exported ${assetName}`, { path: filePath });
  }

  /** Log a batch export summary with total elapsed time. */
  exportSummary(exported: number, total: number): void {
    const elapsed = Date.now() - this.runStart;
    this.info('Export complete', {
      exported,
      total,
      skipped: total - exported,
      totalElapsedMs: elapsed,
      totalElapsedStr: this.formatElapsed(elapsed),
    });
  }

  /** Best-effort file append; the first failure is reported once on the console. */
  private append(filePath: string, line: string): void {
    try {
      fs.appendFileSync(filePath, line);
    } catch (err) {
      if (!this.fileWriteFailed) {
        this.fileWriteFailed = true;
        console.warn(`[graphdoc] Log file write failed: ${(err as Error).message}`);
      }
    }
  }

  private formatElapsed(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const remaining = seconds % 60;
    if (minutes === 0) return `${remaining}s`;
    return `${minutes}m ${remaining}s`;
  }

  /** Format data object for human-readable log line. */
  private formatData(data: LogData): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      if (Array.isArray(value) || value === null) {
        parts.push(`${key}=${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}=${value}`);
      }
    }
    return parts.join(', ');
  }
}

/** Console-only logger shared by callers that were not given one. */
export const defaultLogger = new ExportLogger();
