import { join } from 'path';
import { homedir } from 'os';

export const DEFAULT_PORT = 3001;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_SCRIPTS_DIR = join(homedir(), '.script-menu', 'scripts');
/** Quiet period before a burst of filesystem events triggers a resync (ms) */
export const DEFAULT_WATCH_DEBOUNCE_MS = 150;

export interface ServerConfig {
  port: number;
  host: string;
  /** Root of the scripts directory mirrored into the command tree */
  scriptsDir: string;
  debounceMs: number;
  /** Bearer token required on HTTP and WebSocket requests; auth is off when unset */
  authToken?: string;
}

function parseNonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    console.warn(`[config] Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseNonNegativeInt('PORT', env.PORT, DEFAULT_PORT),
    host: env.HOST || DEFAULT_HOST,
    scriptsDir: env.SCRIPTS_DIR || DEFAULT_SCRIPTS_DIR,
    debounceMs: parseNonNegativeInt('WATCH_DEBOUNCE_MS', env.WATCH_DEBOUNCE_MS, DEFAULT_WATCH_DEBOUNCE_MS),
    authToken: env.AUTH_TOKEN || undefined,
  };
}
