import { writable, type Readable } from 'svelte/store'
import { FilesystemError } from '../model/errors'
import type { FolderSnapshot } from '../model/types'
import { loadSnapshot, type ListingOptions } from '../services/listing.service'

type Options = {
  path: string
  listing: ListingOptions
  showError: (error: FilesystemError) => void
}

/**
 * The listing on display for one folder. A failed load leaves the previous
 * snapshot in place and reports the failure once.
 */
export const createFolderState = ({ path, listing, showError }: Options) => {
  const snapshot = writable<FolderSnapshot | null>(null)
  let current: FolderSnapshot | null = null

  const load = async () => {
    try {
      const next = await loadSnapshot(path, listing)
      current = next
      snapshot.set(next)
      return true
    } catch (err) {
      const error = err instanceof FilesystemError ? err : new FilesystemError(path, err)
      console.error('Failed to load folder contents', error)
      showError(error)
      return false
    }
  }

  const readable: Readable<FolderSnapshot | null> = { subscribe: snapshot.subscribe }

  return {
    path,
    snapshot: readable,
    current: () => current,
    load,
  }
}

export type FolderState = ReturnType<typeof createFolderState>
