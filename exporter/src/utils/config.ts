/**
 * Exporter configuration.
 *
 * Precedence, lowest first: defaults, graphdoc.config.json, environment
 * (GRAPHDOC_CONTENT_DIR, GRAPHDOC_OUTPUT_DIR, GRAPHDOC_MARKDOWN), explicit
 * overrides from the caller.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILENAME, DEFAULT_CONTENT_DIR, DEFAULT_OUTPUT_DIR } from './constants.js';
import { ConfigError } from './errors.js';

const ConfigFileSchema = z.object({
  contentDir: z.string().min(1).max(1000).optional(),
  outputDir: z.string().min(1).max(1000).optional(),
  markdown: z.boolean().optional(),
  verbose: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ExporterConfig {
  contentDir: string;
  outputDir: string;
  markdown: boolean;
  verbose: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file. Missing explicit files are an error; the default file is optional. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ExporterConfig>;
}

function readConfigFile(filePath: string, required: boolean): ConfigFile {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(`Config file not found: ${filePath}`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Failed to parse config file "${filePath}": ${(e as Error).message}`);
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config file "${filePath}": ${issues.join('; ')}`);
  }
  return parsed.data;
}

function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(`Invalid ${name} value: "${value}". Use true or false.`);
}

export function loadConfig(options: LoadConfigOptions = {}): ExporterConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const file = options.configPath
    ? readConfigFile(path.resolve(cwd, options.configPath), true)
    : readConfigFile(path.join(cwd, CONFIG_FILENAME), false);

  const overrides: Partial<ExporterConfig> = options.overrides ?? {};
  const envMarkdown = parseBooleanEnv('GRAPHDOC_MARKDOWN', env.GRAPHDOC_MARKDOWN);

  const merged: ExporterConfig = {
    contentDir: overrides.contentDir ?? (env.GRAPHDOC_CONTENT_DIR || undefined) ?? file.contentDir ?? DEFAULT_CONTENT_DIR,
    outputDir: overrides.outputDir ?? (env.GRAPHDOC_OUTPUT_DIR || undefined) ?? file.outputDir ?? DEFAULT_OUTPUT_DIR,
    markdown: overrides.markdown ?? envMarkdown ?? file.markdown ?? true,
    verbose: overrides.verbose ?? file.verbose ?? false,
  };

  return {
    ...merged,
    contentDir: path.resolve(cwd, merged.contentDir),
    outputDir: path.resolve(cwd, merged.outputDir),
  };
}
