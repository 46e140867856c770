import path from 'node:path';
import { loadAssetFile, outputPathFor } from 'graphdoc-exporter';
import type { CommonOptions } from './context.js';
import { createContext } from './context.js';

/** Export one asset source file. Prints the written document path. */
export async function runExport(
  assetFile: string,
  options: CommonOptions,
  cwd: string = process.cwd(),
): Promise<void> {
  const { config, service } = createContext(options, cwd);
  const asset = loadAssetFile(path.resolve(cwd, assetFile));

  if (!service.exportAsset(asset)) {
    process.exitCode = 1;
    return;
  }
  process.stdout.write(outputPathFor(config.outputDir, asset.path, '.json') + '\n');
}
