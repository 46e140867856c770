import {
  ChangeMonitor,
  FileAssetRepository,
  FileChangeSource,
} from 'graphdoc-exporter';
import type { CommonOptions } from './context.js';
import { createContext } from './context.js';

export interface WatchOptions extends CommonOptions {
  /** Milliseconds a changed file must stay stable before it is exported. */
  debounce?: string;
}

export interface WatchSession {
  monitor: ChangeMonitor;
  /** Stop the monitor and close the file watcher. */
  close(): Promise<void>;
}

export function parseDebounce(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = parseInt(value, 10);
  if (Number.isNaN(ms) || ms < 0) {
    throw new Error(`Invalid --debounce value: "${value}". Must be a non-negative integer (milliseconds).`);
  }
  return ms;
}

/** Export everything once, then re-export each script asset as it changes. */
export async function startWatch(options: WatchOptions, cwd: string = process.cwd()): Promise<WatchSession> {
  const stabilityThreshold = parseDebounce(options.debounce);
  const { config, logger, service } = createContext(options, cwd);
  const repository = new FileAssetRepository(config.contentDir, logger);

  service.exportAll(repository);

  const source = new FileChangeSource(config.contentDir, { stabilityThreshold, logger });
  await source.ready();
  const monitor = new ChangeMonitor(source, repository, { logger });
  monitor.start((asset) => {
    if (service.exportAsset(asset) && config.markdown) {
      service.writeIndex();
    }
  });
  logger.info('Watching for changes', { contentDir: config.contentDir });

  return {
    monitor,
    async close() {
      monitor.stop();
      await source.close();
    },
  };
}

export async function runWatch(options: WatchOptions): Promise<void> {
  const session = await startWatch(options);
  await new Promise<void>((resolve, reject) => {
    process.once('SIGINT', () => {
      process.stderr.write('Stopping...\n');
      session.close().then(resolve, reject);
    });
  });
}
