import { describe, it, expect } from 'vitest';
import { createProgram } from '../cli.js';

function optionNames(commandName: string): string[] {
  const command = createProgram().commands.find((c) => c.name() === commandName);
  return command ? command.options.map((o) => o.long ?? '') : [];
}

describe('CLI program', () => {
  it('creates a commander program with name "graphdoc"', () => {
    const program = createProgram();
    expect(program.name()).toBe('graphdoc');
  });

  it('has the export commands', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['export', 'export-all', 'watch', 'markdown']);
  });

  it('gives every command the shared options', () => {
    for (const command of ['export', 'export-all', 'watch', 'markdown']) {
      expect(optionNames(command)).toEqual(expect.arrayContaining(['--content', '--out', '--config', '--no-markdown', '--verbose']));
    }
  });

  it('has a "--debounce" option on watch only', () => {
    expect(optionNames('watch')).toContain('--debounce');
    expect(optionNames('export-all')).not.toContain('--debounce');
  });
});
