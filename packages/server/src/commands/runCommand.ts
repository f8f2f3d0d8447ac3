import type { ScriptRunResult } from '@script-menu/shared';
import { errorMessage, isScriptMenuError } from '../errors';
import type { UiHost } from '../host/uiHost';
import type { CommandLeaf } from './types';

/** JSON form of a script's completion value, or undefined when it has none */
function toJsonValue(value: unknown): unknown {
  if (value === undefined || typeof value === 'function') return undefined;
  try {
    const json = JSON.stringify(value);
    return json === undefined ? undefined : JSON.parse(json);
  } catch (err) {
    console.warn('[scripts] Result is not JSON-serializable:', errorMessage(err));
    return undefined;
  }
}

/**
 * Invoke a leaf and report its lifecycle to UI clients. Never rejects: the
 * outcome, including failure, is in the returned result.
 */
export async function runCommand(leaf: CommandLeaf, path: string[], host: UiHost): Promise<ScriptRunResult> {
  const startedAt = Date.now();
  host.broadcast({ type: 'script_started', data: { path, startedAt } });
  console.log(`[scripts] Running ${path.join('/')}`);

  let result: ScriptRunResult;
  try {
    const value = await leaf.invoke();
    result = { path, ok: true, startedAt, durationMs: Date.now() - startedAt, value: toJsonValue(value) };
  } catch (err) {
    result = {
      path,
      ok: false,
      startedAt,
      durationMs: Date.now() - startedAt,
      error: errorMessage(err),
      errorType: isScriptMenuError(err) ? err.type : undefined,
    };
    console.warn(`[scripts] ${path.join('/')} failed:`, result.error);
  }

  host.broadcast({ type: 'script_finished', data: result });
  return result;
}
