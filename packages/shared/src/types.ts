export interface CommandLeafView {
  kind: 'leaf';
  name: string;
  /** Names from the root group down to this leaf */
  path: string[];
}

export interface CommandGroupView {
  kind: 'group';
  name: string;
  /** Names from the root group down to this group; empty for the root */
  path: string[];
  children: CommandNodeView[];
}

export type CommandNodeView = CommandLeafView | CommandGroupView;

/** Outcome of one script invocation, as reported to UI clients */
export interface ScriptRunResult {
  path: string[];
  ok: boolean;
  startedAt: number;
  durationMs: number;
  /** Completion value of the script, when it is JSON-representable */
  value?: unknown;
  /** Error message when ok is false */
  error?: string;
  errorType?: string;
}

/** Membership changes made by one resynchronization pass */
export interface SyncSummary {
  added: string[];
  removed: string[];
}

export type WSMessage =
  | { type: 'command_tree'; data: CommandGroupView }
  | { type: 'script_started'; data: { path: string[]; startedAt: number } }
  | { type: 'script_finished'; data: ScriptRunResult }
  | { type: 'script_notice'; data: { text: string; timestamp: number } };
