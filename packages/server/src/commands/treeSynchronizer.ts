import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { extname, join } from 'path';
import { findSortedIndex, formatCommandPath } from '@script-menu/shared';
import type { SyncSummary } from '@script-menu/shared';
import { ScriptMenuError, errorMessage } from '../errors';
import { isNodeError } from '../watcher/utils';
import type { DirectoryRegistrar } from '../watcher/types';
import type { CommandTree } from './commandTree';
import { assertNever } from './types';
import type { CommandGroup, CommandNode } from './types';

type EntryKind = 'file' | 'directory';

export interface TreeSynchronizerOptions {
  tree: CommandTree;
  /**
   * Lower-cased extensions (without the dot) that become leaves. File
   * extensions are matched as written, so `LOUD.JS` is not a `js` script.
   */
  supportedExtensions: ReadonlySet<string>;
  /** Builds the invocation callback for a newly discovered script file */
  createInvoker: (file: string) => () => Promise<unknown>;
  /** Receives every directory that gains a group */
  registrar?: DirectoryRegistrar;
}

export function scriptExtension(fileName: string): string {
  return extname(fileName).slice(1);
}

/** Directory errors that mean "gone or replaced" rather than a real failure */
const VANISHED_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Reconciles the command tree with the scripts directory.
 *
 * Every pass compares the full directory listing against the tree, level by
 * level, without looking at which filesystem event triggered it. Nodes whose
 * backing entry still exists are left in place, so references held outside
 * the tree stay valid across passes.
 */
export class TreeSynchronizer {
  private readonly tree: CommandTree;
  private readonly supportedExtensions: ReadonlySet<string>;
  private readonly createInvoker: (file: string) => () => Promise<unknown>;
  private readonly registrar?: DirectoryRegistrar;

  /** Settles when the most recently scheduled pass has finished */
  private tail: Promise<unknown> = Promise.resolve();
  /** A scheduled pass that has not started yet; new triggers join it */
  private queued: Promise<SyncSummary> | null = null;

  constructor(options: TreeSynchronizerOptions) {
    this.tree = options.tree;
    this.supportedExtensions = options.supportedExtensions;
    this.createInvoker = options.createInvoker;
    this.registrar = options.registrar;
  }

  /**
   * Schedule a full resynchronization pass. Passes never overlap: a trigger
   * that arrives while one runs waits for it, then reads the directory fresh.
   */
  synchronize(): Promise<SyncSummary> {
    if (this.queued) return this.queued;

    const pass = this.tail.then(() => {
      this.queued = null;
      return this.runPass();
    });
    this.queued = pass;
    this.tail = pass;
    return pass;
  }

  isSupported(fileName: string): boolean {
    return this.supportedExtensions.has(scriptExtension(fileName));
  }

  private async runPass(): Promise<SyncSummary> {
    const summary: SyncSummary = { added: [], removed: [] };
    try {
      await this.syncGroup(this.tree.root, [], summary);
    } catch (err) {
      console.error(`[sync] Pass over ${this.tree.root.dir} aborted:`, errorMessage(err));
    }

    if (summary.added.length > 0 || summary.removed.length > 0) {
      console.log(`[sync] ${this.tree.root.dir}: +${summary.added.length} -${summary.removed.length}`);
      this.tree.notifyChanged();
    }
    return summary;
  }

  private async syncGroup(group: CommandGroup, path: string[], summary: SyncSummary): Promise<void> {
    const entries = await this.listDirectory(group.dir);

    // Prune children whose entry is gone or changed kind
    for (const child of [...group.children]) {
      if (!this.stillBacked(child, entries.get(child.name))) {
        group.children.splice(group.children.indexOf(child), 1);
        summary.removed.push(formatCommandPath([...path, child.name]));
      }
    }

    for (const [name, kind] of entries) {
      if (kind !== 'file' || !this.isSupported(name) || hasChild(group, name)) continue;
      const file = join(group.dir, name);
      insertSorted(group, { kind: 'leaf', name, file, invoke: this.createInvoker(file) });
      summary.added.push(formatCommandPath([...path, name]));
    }

    for (const [name, kind] of entries) {
      if (kind !== 'directory' || hasChild(group, name)) continue;
      const dir = join(group.dir, name);
      insertSorted(group, { kind: 'group', name, dir, children: [] });
      this.registrar?.watch(dir);
      summary.added.push(formatCommandPath([...path, name]));
    }

    for (const child of [...group.children]) {
      if (child.kind === 'group') {
        await this.syncGroup(child, [...path, child.name], summary);
      }
    }
  }

  private stillBacked(node: CommandNode, kind: EntryKind | undefined): boolean {
    switch (node.kind) {
      case 'leaf':
        return kind === 'file' && this.isSupported(node.name);
      case 'group':
        return kind === 'directory';
      default:
        return assertNever(node);
    }
  }

  /** Current entries of `dir`; empty when the directory cannot be listed */
  private async listDirectory(dir: string): Promise<Map<string, EntryKind>> {
    const entries = new Map<string, EntryKind>();

    let dirents: Dirent[];
    try {
      dirents = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (!(isNodeError(err) && VANISHED_CODES.has(err.code))) {
        const error = new ScriptMenuError('directory-list-unavailable', `Cannot list ${dir}`, { cause: err });
        console.warn(`[sync] ${error.message}, treating as empty:`, errorMessage(err));
      }
      return entries;
    }

    for (const dirent of dirents) {
      const kind = dirent.isSymbolicLink()
        ? await resolveLinkKind(join(dir, dirent.name))
        : direntKind(dirent);
      if (kind) entries.set(dirent.name, kind);
    }
    return entries;
  }
}

function hasChild(group: CommandGroup, name: string): boolean {
  return group.children.some((child) => child.name === name);
}

function insertSorted(group: CommandGroup, node: CommandNode): void {
  const idx = findSortedIndex(group.children.map((child) => child.name), node.name);
  group.children.splice(idx, 0, node);
}

function direntKind(dirent: Dirent): EntryKind | undefined {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return undefined;
}

async function resolveLinkKind(path: string): Promise<EntryKind | undefined> {
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return undefined;
  } catch {
    // Dangling link
    return undefined;
  }
}
