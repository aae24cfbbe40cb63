import { spawn } from 'node:child_process'
import { readdir, readFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { hasErrorCode } from '@/shared/lib/error'
import { pathExists } from './fs'
import { isMac, isWindows } from './platform'

export type LaunchCommand = {
  command: string
  args: string[]
}

export const defaultHandlerCommand = (path: string): LaunchCommand => {
  if (isMac()) return { command: 'open', args: [path] }
  if (isWindows()) return { command: 'cmd', args: ['/c', 'start', '', path] }
  return { command: 'xdg-open', args: [path] }
}

export const applicationLaunchCommand = (bundlePath: string): LaunchCommand =>
  isMac() ? { command: 'open', args: ['-a', bundlePath] } : defaultHandlerCommand(bundlePath)

/**
 * Runs a launcher and settles once it exits. The platform launchers hand the
 * path over and return right away, so a non-zero exit means the open failed.
 */
const runLauncher = ({ command, args }: LaunchCommand) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'ignore', windowsHide: true })
    child.once('error', reject)
    child.once('exit', (code, signal) => {
      if (code === 0) {
        resolve()
        return
      }
      const status = code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`
      reject(new Error(`${command} exited with ${status}`))
    })
  })

export const openWithDefaultHandler = (path: string) => runLauncher(defaultHandlerCommand(path))

export const launchApplication = (bundlePath: string) => runLauncher(applicationLaunchCommand(bundlePath))

const ICON_FILE_KEY = /<key>CFBundleIconFile<\/key>\s*<string>([^<]+)<\/string>/

const readDeclaredIcon = async (bundlePath: string) => {
  try {
    const plist = await readFile(join(bundlePath, 'Contents', 'Info.plist'), 'utf8')
    const declared = ICON_FILE_KEY.exec(plist)?.[1]?.trim()
    return declared ? declared : null
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) return null
    throw err
  }
}

/**
 * Icon resource of an application bundle: the `CFBundleIconFile` named in a
 * text Info.plist, else the first `.icns` under Contents/Resources.
 */
export const resolveBundleIcon = async (bundlePath: string): Promise<string | null> => {
  const resources = join(bundlePath, 'Contents', 'Resources')
  const declared = await readDeclaredIcon(bundlePath)
  if (declared) {
    const candidate = join(resources, extname(declared) ? declared : `${declared}.icns`)
    if (await pathExists(candidate)) return candidate
  }

  let names: string[]
  try {
    names = await readdir(resources)
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) return null
    throw err
  }
  const icons = names.filter((name) => name.toLowerCase().endsWith('.icns')).sort()
  return icons.length > 0 ? join(resources, icons[0]) : null
}
