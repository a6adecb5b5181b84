import * as os from 'os';
import * as path from 'path';
import { PkgsightDirectories } from '../types/index.js';
import { DEFAULT_RUNTIME_ROOTS, DIR_PATTERNS } from '../constants/index.js';

/**
 * Get pkgsight directories using the dotfile convention (~/.pkgsight on
 * every platform)
 */
export function getPkgsightDirectories(homeDir: string = os.homedir()): PkgsightDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.PKGSIGHT)
  };
}

/**
 * Where installed runtimes live when nothing overrides it: the framework
 * install location on macOS, `/usr/lib` elsewhere.
 */
export function getDefaultRuntimeRoot(platform: NodeJS.Platform = process.platform): string {
  return platform === 'darwin' ? DEFAULT_RUNTIME_ROOTS.darwin : DEFAULT_RUNTIME_ROOTS.fallback;
}
