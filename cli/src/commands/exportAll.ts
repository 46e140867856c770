import { FileAssetRepository } from 'graphdoc-exporter';
import type { ExportAllResult } from 'graphdoc-exporter';
import type { CommonOptions } from './context.js';
import { createContext } from './context.js';

/** Export every script asset under the content directory. */
export async function runExportAll(
  options: CommonOptions,
  cwd: string = process.cwd(),
): Promise<ExportAllResult> {
  const { config, logger, service } = createContext(options, cwd);
  const repository = new FileAssetRepository(config.contentDir, logger);

  const result = service.exportAll(repository);
  process.stdout.write(`Exported ${result.exported} of ${result.total} assets to ${config.outputDir}\n`);

  if (result.total > 0 && result.exported === 0) {
    process.exitCode = 1;
  }
  return result;
}
