import chokidar from 'chokidar';
import { resolve } from 'path';
import { ScriptMenuError, errorMessage } from '../errors';
import { DEFAULT_WATCH_DEBOUNCE_MS } from '../config';
import { createDebouncer, isNodeError } from './utils';
import type { Debouncer, DirectoryRegistrar, WatchSource, WatchSourceFactory } from './types';

/**
 * chokidar-backed source. Each directory is watched at depth 0; nested
 * directories get their own registration as the tree discovers them.
 */
export function createChokidarSource(root: string): WatchSource {
  const fsWatcher = chokidar.watch(root, {
    ignoreInitial: true,
    persistent: true,
    depth: 0,
  });

  return {
    add: (path) => {
      fsWatcher.add(path);
    },
    onChange: (listener) => {
      fsWatcher.on('all', () => listener());
    },
    onError: (listener) => {
      fsWatcher.on('error', (err) => listener(err));
    },
    close: () => fsWatcher.close(),
  };
}

export interface DirectoryWatcherOptions {
  debounceMs?: number;
  createSource?: WatchSourceFactory;
}

/**
 * Turns filesystem events under the scripts directory into resync calls.
 *
 * A burst of events inside the debounce window produces one call to
 * `onResync`. Events arriving while a resync runs schedule another one;
 * serializing the passes is the synchronizer's job.
 */
export class DirectoryWatcher implements DirectoryRegistrar {
  private source: WatchSource | null = null;
  private readonly requested = new Set<string>();
  private readonly registered = new Set<string>();
  private readonly debouncer: Debouncer;
  private readonly createSource: WatchSourceFactory;

  constructor(
    private readonly onResync: () => Promise<unknown>,
    options: DirectoryWatcherOptions = {},
  ) {
    this.debouncer = createDebouncer(options.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS);
    this.createSource = options.createSource ?? createChokidarSource;
  }

  /**
   * Arm the watcher on `root`. Returns false when the underlying watch
   * service cannot be created; the tree then only updates on refresh.
   */
  start(root: string): boolean {
    if (this.source) return true;

    const rootPath = resolve(root);
    let source: WatchSource;
    try {
      source = this.createSource(rootPath);
    } catch (err) {
      console.error(`[watcher] Unable to start watching ${rootPath}:`, errorMessage(err));
      return false;
    }

    source.onChange(() => this.signal());
    source.onError((err) => this.handleError(err, rootPath));
    this.source = source;
    this.registered.add(rootPath);
    this.requested.delete(rootPath);

    // Directories discovered before the watcher was armed
    for (const path of [...this.requested]) {
      this.register(path);
    }

    console.log(`[watcher] Watching ${rootPath}`);
    return true;
  }

  /**
   * Register a directory for change notifications. Every call reaches the
   * source: a directory removed and created again under the same path lost
   * its old watch when it was removed.
   */
  watch(dir: string): void {
    const path = resolve(dir);
    if (!this.source) {
      this.requested.add(path);
      return;
    }
    this.register(path);
  }

  get watchedPaths(): string[] {
    return [...this.registered];
  }

  get isWatching(): boolean {
    return this.source !== null;
  }

  async close(): Promise<void> {
    this.debouncer.clear();
    const source = this.source;
    this.source = null;
    this.registered.clear();
    this.requested.clear();
    if (source) {
      await source.close();
    }
  }

  private register(path: string): void {
    if (!this.source) return;
    try {
      this.source.add(path);
      this.registered.add(path);
      this.requested.delete(path);
    } catch (err) {
      this.registrationFailed(path, err);
    }
  }

  /** chokidar reports failed registrations as errors carrying the path */
  private handleError(err: unknown, rootPath: string): void {
    const path = isNodeError(err) && 'path' in err && typeof err.path === 'string' ? resolve(err.path) : undefined;
    if (path && path !== rootPath && this.registered.delete(path)) {
      this.registrationFailed(path, err);
      return;
    }
    console.warn('[watcher] Watch error:', errorMessage(err));
  }

  private registrationFailed(path: string, err: unknown): void {
    const error = new ScriptMenuError('watch-registration-failed', `Unable to watch ${path}`, { cause: err });
    console.warn(`[watcher] ${error.message}:`, errorMessage(err));
  }

  private signal(): void {
    this.debouncer.debounce('resync', () => {
      this.onResync().catch((err: unknown) => {
        console.error('[watcher] Resync failed:', errorMessage(err));
      });
    });
  }
}
