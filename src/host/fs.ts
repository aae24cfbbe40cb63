import { cp, lstat, readdir, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { hasErrorCode } from '@/shared/lib/error'

export type RawDirEntry = {
  name: string
  path: string
  isDirectory: boolean
}

/** Immediate children of `path`. Symbolic links are reported as they are, not followed. */
export const listDirectory = async (path: string): Promise<RawDirEntry[]> => {
  const dirents = await readdir(path, { withFileTypes: true })
  return dirents.map((dirent) => ({
    name: dirent.name,
    path: join(path, dirent.name),
    isDirectory: dirent.isDirectory(),
  }))
}

export const pathExists = async (path: string) => {
  try {
    await lstat(path)
    return true
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) return false
    throw err
  }
}

const alreadyExists = (path: string) =>
  Object.assign(new Error(`EEXIST: file already exists, move '${path}'`), { code: 'EEXIST', path })

// Across devices the item is copied, then the source removed. A copy that fails
// partway is cleared away so `destination` is left as it was found.
const relocate = async (source: string, destination: string) => {
  try {
    await rename(source, destination)
    return
  } catch (err) {
    if (!hasErrorCode(err, 'EXDEV')) throw err
  }
  try {
    await cp(source, destination, { recursive: true, errorOnExist: true, force: false, preserveTimestamps: true })
  } catch (err) {
    if (!hasErrorCode(err, 'EEXIST', 'ERR_FS_CP_EEXIST')) {
      await rm(destination, { recursive: true, force: true })
    }
    throw err
  }
  await rm(source, { recursive: true, force: true })
}

/** Moves `source` to `destination`, which must not exist yet. */
export const moveEntry = async (source: string, destination: string) => {
  if (await pathExists(destination)) throw alreadyExists(destination)
  await relocate(source, destination)
}

/**
 * Puts `source` in place of the existing `destination`. The moved item keeps
 * its own content and metadata. A file replacing a file on the same device
 * is a single rename; anything else sets the old destination aside first and
 * restores it if the move fails.
 */
export const replaceEntry = async (source: string, destination: string) => {
  const [sourceStat, destinationStat] = await Promise.all([lstat(source), lstat(destination)])
  if (!sourceStat.isDirectory() && !destinationStat.isDirectory()) {
    try {
      await rename(source, destination)
      return
    } catch (err) {
      if (!hasErrorCode(err, 'EXDEV')) throw err
    }
  }

  const backup = join(dirname(destination), `.${basename(destination)}.replaced-${process.pid}-${Date.now()}`)
  await rename(destination, backup)
  try {
    await relocate(source, destination)
  } catch (err) {
    try {
      await rename(backup, destination)
    } catch (restoreErr) {
      console.error('Failed to restore replaced item', { destination, backup, restoreErr })
    }
    throw err
  }
  await rm(backup, { recursive: true, force: true })
}
