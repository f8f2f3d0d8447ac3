/**
 * Wires the scripts directory to a live command tree:
 * - TreeSynchronizer: reconciles the tree against the directory
 * - DirectoryWatcher: triggers a pass whenever the directory changes
 * - ScriptRunner: executes a leaf's file when the leaf is invoked
 */

import { resolve } from 'path';
import type { SyncSummary } from '@script-menu/shared';
import { CommandTree } from './commands/commandTree';
import { TreeSynchronizer } from './commands/treeSynchronizer';
import { DirectoryWatcher } from './watcher/directoryWatcher';
import type { WatchSourceFactory } from './watcher/types';
import { ScriptRunner } from './scripts/scriptRunner';
import type { InterpreterRegistry, ScriptBindings } from './scripts/interpreters';

export interface ScriptingOptions {
  rootDir: string;
  registry: InterpreterRegistry;
  bindings: ScriptBindings;
  debounceMs?: number;
  createSource?: WatchSourceFactory;
}

export interface Scripting {
  readonly tree: CommandTree;
  readonly runner: ScriptRunner;
  readonly watcher: DirectoryWatcher;
  readonly supportedExtensions: ReadonlySet<string>;
  /** Arm the watcher and run the initial pass */
  start(): Promise<SyncSummary>;
  /** Manual resynchronization */
  refresh(): Promise<SyncSummary>;
  close(): Promise<void>;
}

export function createScripting(options: ScriptingOptions): Scripting {
  const supportedExtensions: ReadonlySet<string> = options.registry.supportedExtensions();
  const tree = new CommandTree(resolve(options.rootDir));
  const runner = new ScriptRunner(options.registry, options.bindings);

  const watcher = new DirectoryWatcher((): Promise<SyncSummary> => synchronizer.synchronize(), {
    debounceMs: options.debounceMs,
    createSource: options.createSource,
  });
  const synchronizer = new TreeSynchronizer({
    tree,
    supportedExtensions,
    createInvoker: (file) => () => runner.run(file),
    registrar: watcher,
  });

  return {
    tree,
    runner,
    watcher,
    supportedExtensions,
    start: () => {
      if (!watcher.start(tree.root.dir)) {
        console.warn('[scripts] Live updates disabled; use refresh to pick up changes');
      }
      return synchronizer.synchronize();
    },
    refresh: () => synchronizer.synchronize(),
    close: () => watcher.close(),
  };
}
