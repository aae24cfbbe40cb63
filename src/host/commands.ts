import { listDirectory, moveEntry, pathExists, replaceEntry, type RawDirEntry } from './fs'
import { launchApplication, openWithDefaultHandler, resolveBundleIcon } from './shell'

export type { RawDirEntry }

type PathArgs = { path: string }
type TransferArgs = { source: string; destination: string }

export type HostCommands = {
  list_dir: { args: PathArgs; result: RawDirEntry[] }
  path_exists: { args: PathArgs; result: boolean }
  move_entry: { args: TransferArgs; result: void }
  replace_entry: { args: TransferArgs; result: void }
  open_entry: { args: PathArgs; result: void }
  launch_app: { args: PathArgs; result: void }
  app_icon: { args: PathArgs; result: string | null }
}

export type HostCommand = keyof HostCommands

export type CommandHandlers = {
  [K in HostCommand]: (args: HostCommands[K]['args']) => Promise<HostCommands[K]['result']>
}

export const commandHandlers: CommandHandlers = {
  list_dir: ({ path }) => listDirectory(path),
  path_exists: ({ path }) => pathExists(path),
  move_entry: ({ source, destination }) => moveEntry(source, destination),
  replace_entry: ({ source, destination }) => replaceEntry(source, destination),
  open_entry: ({ path }) => openWithDefaultHandler(path),
  launch_app: ({ path }) => launchApplication(path),
  app_icon: ({ path }) => resolveBundleIcon(path),
}
