/**
 * Platform detection and OS-specific helpers
 */

import * as os from 'os';

export enum Platform {
  WINDOWS = 'windows',
  LINUX = 'linux',
  MACOS = 'darwin',
  UNKNOWN = 'unknown',
}

export function getPlatform(): Platform {
  const platform = os.platform();
  switch (platform) {
    case 'win32':
      return Platform.WINDOWS;
    case 'linux':
      return Platform.LINUX;
    case 'darwin':
      return Platform.MACOS;
    default:
      return Platform.UNKNOWN;
  }
}

export const HOST_ENVIRONMENT = Symbol('HOST_ENVIRONMENT');

// The machine the run drives: OS plus the variables that locate its display
export interface HostEnvironment {
  platform: Platform;
  env: NodeJS.ProcessEnv;
}

export function currentHost(): HostEnvironment {
  return { platform: getPlatform(), env: process.env };
}

/**
 * Expands "Mod" in a generic shortcut ("Mod+N") to Cmd on macOS and Ctrl elsewhere.
 */
export function getPlatformShortcut(
  genericShortcut: string,
  platform: Platform = getPlatform(),
): string {
  const modifierKey = platform === Platform.MACOS ? 'Cmd' : 'Ctrl';
  return genericShortcut.replace(/Mod/g, modifierKey);
}

export function logPlatformInfo(
  logger: { log: (message: string) => void },
  platform: Platform = getPlatform(),
): void {
  logger.log(`Platform: ${platform} (${os.arch()})`);
  logger.log(`OS Release: ${os.release()}`);
}
