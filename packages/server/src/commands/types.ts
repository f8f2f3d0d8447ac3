/** One script file in the command tree */
export interface CommandLeaf {
  kind: 'leaf';
  name: string;
  /** Absolute path of the script file */
  file: string;
  /** Runs the script; rejects with the runner's error */
  invoke: () => Promise<unknown>;
}

/** One directory in the command tree; children are kept in display order */
export interface CommandGroup {
  kind: 'group';
  name: string;
  /** Absolute path of the backing directory */
  dir: string;
  children: CommandNode[];
}

export type CommandNode = CommandLeaf | CommandGroup;

export function assertNever(value: never): never {
  throw new Error(`Unexpected command node: ${JSON.stringify(value)}`);
}
