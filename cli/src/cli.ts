#!/usr/bin/env node

import { Command } from 'commander';

function withCommonOptions(command: Command): Command {
  return command
    .option('--content <dir>', 'Content directory holding asset source files')
    .option('--out <dir>', 'Output directory for exported documents')
    .option('--config <path>', 'Path to a graphdoc.config.json file')
    .option('--no-markdown', 'Skip markdown pages')
    .option('--verbose', 'Print debug logs');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('graphdoc')
    .description('Export script asset graphs to JSON and markdown documents')
    .version('0.1.0');

  withCommonOptions(
    program
      .command('export <asset>')
      .description('Export one asset source file'),
  ).action(async (asset: string, options) => {
    const { runExport } = await import('./commands/export.js');
    await runExport(asset, options);
  });

  withCommonOptions(
    program
      .command('export-all')
      .description('Export every script asset in the content directory'),
  ).action(async (options) => {
    const { runExportAll } = await import('./commands/exportAll.js');
    await runExportAll(options);
  });

  withCommonOptions(
    program
      .command('watch')
      .description('Export everything, then re-export assets as they change')
      .option('--debounce <ms>', 'Milliseconds a file must be unchanged before export'),
  ).action(async (options) => {
    const { runWatch } = await import('./commands/watch.js');
    await runWatch(options);
  });

  withCommonOptions(
    program
      .command('markdown [jsonDir]')
      .description('Regenerate markdown pages from exported JSON documents'),
  ).action(async (jsonDir: string | undefined, options) => {
    const { runMarkdown } = await import('./commands/markdown.js');
    await runMarkdown(jsonDir, options);
  });

  return program;
}

const isDirectRun = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isDirectRun) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    });
}
