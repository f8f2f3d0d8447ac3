/** Body of POST /api/commands/run */
export interface RunRequest {
  path: string[];
}

const MAX_PATH_DEPTH = 32;
const MAX_NAME_LENGTH = 255;

/**
 * Validates a run request payload.
 * Returns an error message string if invalid, or null if valid.
 */
export function validateRunRequest(body: unknown): string | null {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return 'Request body must be a JSON object';
  }

  if (!('path' in body) || !Array.isArray(body.path)) {
    return 'path is required and must be an array of names';
  }

  const path: unknown[] = body.path;
  if (path.length === 0) {
    return 'path must name at least one command';
  }
  if (path.length > MAX_PATH_DEPTH) {
    return `path is too deep (max ${MAX_PATH_DEPTH} names)`;
  }

  for (const name of path) {
    if (typeof name !== 'string' || name.length === 0) {
      return 'path entries must be non-empty strings';
    }
    if (name.length > MAX_NAME_LENGTH) {
      return `path entry is too long (max ${MAX_NAME_LENGTH} chars)`;
    }
    // Separators and dot segments never name a command
    if (name === '.' || name === '..' || /[\\/\0]/.test(name)) {
      return `path entry "${name}" is not a valid command name`;
    }
  }

  return null;
}

export function parseRunRequest(body: unknown): { request: RunRequest } | { error: string } {
  const error = validateRunRequest(body);
  if (error) return { error };

  const path = typeof body === 'object' && body !== null && 'path' in body && Array.isArray(body.path)
    ? body.path.filter((name): name is string => typeof name === 'string')
    : [];
  return { request: { path } };
}
