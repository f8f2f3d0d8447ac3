import { copyFile, mkdir, readdir, stat } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { errorMessage } from '../errors';
import { isNodeError } from '../watcher/utils';

/** Example scripts shipped with the server */
export const BUNDLED_EXAMPLES_DIR = fileURLToPath(new URL('../../examples', import.meta.url));

export const EXAMPLES_FOLDER = 'Examples';

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Create the scripts directory on first run and seed it with the bundled
 * examples. Returns false when the directory already existed; its contents
 * are then left alone.
 */
export async function ensureScriptsDirectory(root: string, examplesDir = BUNDLED_EXAMPLES_DIR): Promise<boolean> {
  if (await exists(root)) return false;

  const target = join(root, EXAMPLES_FOLDER);
  await mkdir(target, { recursive: true });

  let names: string[] = [];
  try {
    names = await readdir(examplesDir);
  } catch (err) {
    console.warn(`[bootstrap] No example scripts available in ${examplesDir}:`, errorMessage(err));
  }

  let copied = 0;
  for (const name of names) {
    try {
      await copyFile(join(examplesDir, name), join(target, name));
      copied++;
    } catch (err) {
      console.warn(`[bootstrap] Could not copy example ${name}:`, errorMessage(err));
    }
  }

  console.log(`[bootstrap] Created ${root} with ${copied} example script(s)`);
  return true;
}
