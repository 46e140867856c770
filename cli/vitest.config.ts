import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Command tests share process.exitCode and the stdout spy.
    fileParallelism: false,
    // Exclude compiled output from test discovery
    exclude: ['dist/**', 'node_modules/**'],
  },
});
