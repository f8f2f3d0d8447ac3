/** Coalesces repeated calls under the same key into one delayed call */
export interface Debouncer {
  debounce(key: string, fn: () => void): void;
  clear(): void;
}

/**
 * Native change notifications for a set of directories.
 *
 * Payloads are dropped on purpose at this boundary: consumers only learn
 * that something under a registered directory changed.
 */
export interface WatchSource {
  /** Start watching one more directory (its direct entries only) */
  add(path: string): void;
  onChange(listener: () => void): void;
  onError(listener: (err: unknown) => void): void;
  close(): Promise<void>;
}

export type WatchSourceFactory = (root: string) => WatchSource;

/** Something that can have new directories registered for watching */
export interface DirectoryRegistrar {
  watch(dir: string): void;
}
