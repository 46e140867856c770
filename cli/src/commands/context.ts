import path from 'node:path';
import { ExportLogger, ExportService, loadConfig } from 'graphdoc-exporter';
import type { ExporterConfig } from 'graphdoc-exporter';

/** Options shared by every command. */
export interface CommonOptions {
  content?: string;
  out?: string;
  config?: string;
  /** False only when --no-markdown was given. */
  markdown?: boolean;
  verbose?: boolean;
}

export interface CommandContext {
  config: ExporterConfig;
  logger: ExportLogger;
  service: ExportService;
}

export const LOG_SUBDIR = path.join('.graphdoc', 'logs');

export function resolveConfig(
  options: CommonOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ExporterConfig {
  return loadConfig({
    configPath: options.config,
    cwd,
    env,
    overrides: {
      contentDir: options.content,
      outputDir: options.out,
      // commander defaults a --no-* option to true, so only an explicit false overrides
      markdown: options.markdown === false ? false : undefined,
      verbose: options.verbose ? true : undefined,
    },
  });
}

export function createContext(
  options: CommonOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): CommandContext {
  const config = resolveConfig(options, cwd, env);
  const logger = new ExportLogger({
    logDir: path.join(config.outputDir, LOG_SUBDIR),
    verbose: config.verbose,
  });
  const service = new ExportService({
    outputDir: config.outputDir,
    markdown: config.markdown,
    logger,
  });
  return { config, logger, service };
}
