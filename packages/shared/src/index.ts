export type {
  CommandLeafView,
  CommandGroupView,
  CommandNodeView,
  ScriptRunResult,
  SyncSummary,
  WSMessage,
} from './types';
export { compareCommandNames, findSortedIndex, formatCommandPath } from './order';
