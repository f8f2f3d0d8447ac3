import type { CommandGroupView, CommandNodeView } from '@script-menu/shared';
import { assertNever } from './types';
import type { CommandGroup, CommandLeaf, CommandNode } from './types';

type Listener = (root: CommandGroup) => void;

function toNodeView(node: CommandNode, parentPath: string[]): CommandNodeView {
  const path = [...parentPath, node.name];
  switch (node.kind) {
    case 'leaf':
      return { kind: 'leaf', name: node.name, path };
    case 'group':
      return {
        kind: 'group',
        name: node.name,
        path,
        children: node.children.map((child) => toNodeView(child, path)),
      };
    default:
      return assertNever(node);
  }
}

/**
 * Owner of the live command tree.
 *
 * Only the TreeSynchronizer mutates `root`; everything else reads it or
 * subscribes to change notifications.
 */
export class CommandTree {
  readonly root: CommandGroup;

  private listeners: Set<Listener> = new Set();

  constructor(rootDir: string) {
    this.root = { kind: 'group', name: '', dir: rootDir, children: [] };
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  notifyChanged() {
    for (const listener of this.listeners) {
      try {
        listener(this.root);
      } catch (err) {
        console.warn('[tree] Listener error:', err instanceof Error ? err.message : err);
      }
    }
  }

  toView(): CommandGroupView {
    return {
      kind: 'group',
      name: this.root.name,
      path: [],
      children: this.root.children.map((child) => toNodeView(child, [])),
    };
  }

  findNode(path: readonly string[]): CommandNode | undefined {
    let node: CommandNode = this.root;
    for (const name of path) {
      if (node.kind !== 'group') return undefined;
      const next: CommandNode | undefined = node.children.find((child) => child.name === name);
      if (!next) return undefined;
      node = next;
    }
    return node;
  }

  findLeaf(path: readonly string[]): CommandLeaf | undefined {
    const node = this.findNode(path);
    return node?.kind === 'leaf' ? node : undefined;
  }
}
