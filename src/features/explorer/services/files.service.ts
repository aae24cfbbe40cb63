import { invoke } from '@/shared/lib/host'
import type { DirectoryEntry } from '../model/types'

export const openFile = (entry: DirectoryEntry) => invoke('open_entry', { path: entry.path })

export const launchBundle = (entry: DirectoryEntry) => invoke('launch_app', { path: entry.path })

export const entryExists = (path: string) => invoke('path_exists', { path })

export const moveItem = (source: string, destination: string) => invoke('move_entry', { source, destination })

export const replaceItem = (source: string, destination: string) =>
  invoke('replace_entry', { source, destination })

export const fetchBundleIcon = (path: string) => invoke('app_icon', { path })
