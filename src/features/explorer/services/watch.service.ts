import { watch, type FSWatcher } from 'node:fs'
import { access } from 'node:fs/promises'
import { basename } from 'node:path'
import { hasErrorCode } from '@/shared/lib/error'
import { WatchSetupFailure } from '../model/errors'

export type DirectoryWatcher = {
  readonly path: string
  isActive: () => boolean
  stop: () => void
}

type WatchOptions = {
  /** Called when the watcher gives up: it errored, or the directory itself was deleted. */
  onStopped?: (err: unknown) => void
}

/**
 * Calls `onChange` once per create, delete or rename of a direct child of
 * `path`. Content-only changes are not reported. Throws WatchSetupFailure if
 * the directory cannot be watched.
 */
export const watchDirectory = (
  path: string,
  onChange: () => void,
  options: WatchOptions = {},
): DirectoryWatcher => {
  let active = true
  let watcher: FSWatcher | null = null
  const ownName = basename(path)

  const stop = () => {
    if (!active) return
    active = false
    watcher?.close()
  }

  const giveUp = (err: unknown) => {
    if (!active) return
    console.warn('Directory watcher stopped', { path, err })
    stop()
    options.onStopped?.(err)
  }

  // Deleting the watched directory arrives as a rename of its own name, and
  // the OS watch ends without an error event.
  const checkStillThere = async () => {
    try {
      await access(path)
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) giveUp(err)
      else console.warn('Cannot check watched directory', { path, err })
    }
  }

  try {
    watcher = watch(path, { persistent: false }, (eventType, filename) => {
      if (!active || eventType !== 'rename') return
      onChange()
      if (filename === null || filename === ownName) void checkStillThere()
    })
  } catch (err) {
    throw new WatchSetupFailure(path, err)
  }

  watcher.on('error', giveUp)

  return {
    path,
    isActive: () => active,
    stop,
  }
}

export const unwatch = (handle: DirectoryWatcher | null | undefined) => {
  handle?.stop()
}
