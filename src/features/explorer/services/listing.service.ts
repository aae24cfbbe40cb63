import { invoke } from '@/shared/lib/host'
import type { RawDirEntry } from '@/host/commands'
import { FilesystemError } from '../model/errors'
import type { DirectoryEntry, FolderSnapshot } from '../model/types'
import { extensionOf } from '../utils'

export type ListingOptions = {
  bundleExtension: string
  hiddenPrefix: string
  caseSensitiveNames: boolean
}

export const isHiddenName = (name: string, hiddenPrefix: string) => name.startsWith(hiddenPrefix)

export const toDirectoryEntry = (raw: RawDirEntry, bundleExtension: string): DirectoryEntry => {
  const ext = extensionOf(raw.name)
  return {
    name: raw.name,
    path: raw.path,
    isDirectory: raw.isDirectory,
    isBundle: raw.isDirectory && ext === bundleExtension,
    ext,
  }
}

/** Orders by Unicode code point, so names outside the BMP sort after U+E000..U+FFFF. */
const ordinal = (a: string, b: string) => {
  let i = 0
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0
    const right = b.codePointAt(i) ?? 0
    if (left !== right) return left < right ? -1 : 1
    i += left > 0xffff ? 2 : 1
  }
  return i < a.length ? 1 : i < b.length ? -1 : 0
}

export const compareNames = (caseSensitive: boolean) =>
  caseSensitive
    ? ordinal
    : (a: string, b: string) => ordinal(a.toLowerCase(), b.toLowerCase()) || ordinal(a, b)

/** Directories first, then names ascending. */
export const sortEntries = (entries: readonly DirectoryEntry[], caseSensitive = true): DirectoryEntry[] => {
  const byName = compareNames(caseSensitive)
  return [...entries].sort((a, b) => {
    if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1
    return byName(a.name, b.name)
  })
}

export const loadSnapshot = async (path: string, options: ListingOptions): Promise<FolderSnapshot> => {
  let listed: RawDirEntry[]
  try {
    listed = await invoke('list_dir', { path })
  } catch (err) {
    throw new FilesystemError(path, err)
  }
  const entries = listed
    .filter((raw) => !isHiddenName(raw.name, options.hiddenPrefix))
    .map((raw) => toDirectoryEntry(raw, options.bundleExtension))
  return {
    directory: path,
    entries: sortEntries(entries, options.caseSensitiveNames),
  }
}
