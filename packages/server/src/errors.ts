/**
 * Categories of failure the script menu reports.
 *
 * `watch-registration-failed` and `directory-list-unavailable` are logged and
 * never leave a synchronization pass. The other two reach whoever invoked
 * the script.
 */
export type ScriptMenuErrorType =
  | 'watch-registration-failed'
  | 'directory-list-unavailable'
  | 'unsupported-script-type'
  | 'script-execution-failed';

export class ScriptMenuError extends Error {
  constructor(
    public readonly type: ScriptMenuErrorType,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ScriptMenuError';
  }
}

export function isScriptMenuError(err: unknown, type?: ScriptMenuErrorType): err is ScriptMenuError {
  return err instanceof ScriptMenuError && (type === undefined || err.type === type);
}

/**
 * Message of anything thrown. Scripts evaluate in their own realm, so their
 * errors fail `instanceof Error` and are read structurally.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
