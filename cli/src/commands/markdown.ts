import path from 'node:path';
import { FileDocumentWriter, regenerateMarkdown } from 'graphdoc-exporter';
import type { CommonOptions } from './context.js';
import { createContext } from './context.js';

/** Rebuild markdown pages (and the index) from JSON documents already exported. */
export async function runMarkdown(
  jsonDir: string | undefined,
  options: CommonOptions,
  cwd: string = process.cwd(),
): Promise<number> {
  const { config, logger, service } = createContext(options, cwd);
  const dir = jsonDir ? path.resolve(cwd, jsonDir) : config.outputDir;

  const written = regenerateMarkdown(dir, new FileDocumentWriter(logger), logger);
  if (dir === config.outputDir) {
    service.writeIndex();
  }
  process.stdout.write(`Generated ${written} markdown files in ${dir}\n`);
  return written;
}
