import type { TargetSystem } from '../x86/types.js';
import { TARGET_SYSTEMS } from '../x86/types.js';

export const SYSTEM_ENV = 'X86_EMIT_SYSTEM';

/**
 * Rendering behaviour shared by a group of target systems.
 */
export type DialectKind = 'gas' | 'masm' | 'unknown';

function isTargetSystem(name: string): name is TargetSystem {
  return TARGET_SYSTEMS.some((s) => s === name);
}

/**
 * Map a configured system name to a target system; unrecognized names are `unknown`.
 */
export function systemFromName(name: string | undefined): TargetSystem {
  if (name === undefined) return 'unknown';
  return isTargetSystem(name) ? name : 'unknown';
}

export function readTargetSystem(env: NodeJS.ProcessEnv = process.env): TargetSystem {
  return systemFromName(env[SYSTEM_ENV]);
}

export function dialectOf(system: TargetSystem): DialectKind {
  switch (system) {
    case 'win32':
    case 'win64':
      return 'masm';
    case 'unknown':
      return 'unknown';
    case 'macosx':
    case 'gnu':
    case 'cygwin':
    case 'solaris':
    case 'linux_elf':
    case 'bsd_elf':
    case 'beos':
    case 'mingw':
    case 'linux':
    case 'mingw64':
      return 'gas';
  }
}
