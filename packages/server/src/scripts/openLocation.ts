import { execFile } from 'child_process';
import { promisify } from 'util';

export type ExecFileAsync = (cmd: string, args: string[]) => Promise<{ stdout: string }>;

const defaultExecFileAsync: ExecFileAsync = promisify(execFile);

export function fileBrowserCommand(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return 'open';
    case 'win32':
      return 'explorer';
    default:
      return 'xdg-open';
  }
}

/**
 * Show `dir` in the OS file browser. Failures are thrown for the caller to
 * report.
 */
export async function openLocation(
  dir: string,
  execFileAsync: ExecFileAsync = defaultExecFileAsync,
  platform: NodeJS.Platform = process.platform,
): Promise<void> {
  const command = fileBrowserCommand(platform);
  console.log(`[scripts] Opening ${dir} with ${command}`);
  await execFileAsync(command, [dir]);
}
