import { platform } from 'node:os'

/** Check if running on macOS */
export function isMac(): boolean {
  return platform() === 'darwin'
}

/** Check if running on Windows */
export function isWindows(): boolean {
  return platform() === 'win32'
}
