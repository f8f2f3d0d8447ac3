import { arch, cpus, freemem, hostname, platform, totalmem, uptime } from 'os';

/** What scripts see as `machine`: the computer the server runs on */
export interface MachineHandle {
  readonly hostname: string;
  readonly platform: NodeJS.Platform;
  readonly arch: string;
  readonly cpuCount: number;
  /** Seconds since the OS booted */
  uptime(): number;
  memory(): { total: number; free: number };
}

export function createMachineHandle(): MachineHandle {
  return {
    hostname: hostname(),
    platform: platform(),
    arch: arch(),
    cpuCount: cpus().length,
    uptime: () => uptime(),
    memory: () => ({ total: totalmem(), free: freemem() }),
  };
}
