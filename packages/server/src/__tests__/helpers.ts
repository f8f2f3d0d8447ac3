import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { CommandGroupView } from '@script-menu/shared';
import type { WatchSource } from '../watcher/types';

export async function makeTempDir(prefix = 'script-menu-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write a file, creating parent directories as needed */
export async function writeScript(root: string, relativePath: string, body = ''): Promise<string> {
  const file = join(root, relativePath);
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, body);
  return file;
}

/** Indented outline of a tree view; groups end with a slash */
export function outline(group: CommandGroupView, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  return group.children.flatMap((child) =>
    child.kind === 'leaf'
      ? [`${indent}${child.name}`]
      : [`${indent}${child.name}/`, ...outline(child, depth + 1)]
  );
}

/** In-process stand-in for the chokidar watch source */
export class FakeWatchSource implements WatchSource {
  added: string[] = [];
  closed = false;
  /** Paths whose registration throws */
  failing = new Set<string>();

  private changeListeners: Array<() => void> = [];
  private errorListeners: Array<(err: unknown) => void> = [];

  constructor(readonly root: string) {}

  add(path: string): void {
    if (this.failing.has(path)) {
      throw new Error(`ENOSPC: System limit for number of file watchers reached, watch '${path}'`);
    }
    this.added.push(path);
  }

  onChange(listener: () => void): void {
    this.changeListeners.push(listener);
  }

  onError(listener: (err: unknown) => void): void {
    this.errorListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emitChange(): void {
    for (const listener of this.changeListeners) listener();
  }

  emitError(err: unknown): void {
    for (const listener of this.errorListeners) listener(err);
  }
}
