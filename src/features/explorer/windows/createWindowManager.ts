import { get, writable, type Readable } from 'svelte/store'
import { resolveViewConfig, type ViewConfigOverrides, type WindowFrame } from '../config/viewConfig'
import { createFolderView, type FolderView } from '../pages/createFolderView'
import { baseName, normalizePath } from '../utils'

export type FolderWindow = {
  id: number
  path: string
  title: string
  frame: WindowFrame
  view: FolderView
}

type Options = {
  config?: ViewConfigOverrides
}

/**
 * One window per opened folder. Opening a folder from inside a window adds a
 * sibling window; siblings share configuration but no state.
 */
export const createWindowManager = ({ config: overrides = {} }: Options = {}) => {
  const config = resolveViewConfig(overrides)
  const windows = writable<FolderWindow[]>([])
  let nextId = 1

  const open = (path: string): FolderWindow => {
    const normalized = normalizePath(path)
    const view = createFolderView({
      path: normalized,
      config,
      openFolder: (child) => {
        open(child)
      },
    })
    const folderWindow: FolderWindow = {
      id: nextId++,
      path: normalized,
      title: baseName(normalized) || normalized,
      frame: { ...config.windowFrame },
      view,
    }
    windows.update((list) => [...list, folderWindow])
    void view.start()
    return folderWindow
  }

  const close = (id: number) => {
    const target = get(windows).find((item) => item.id === id)
    if (!target) return false
    target.view.close()
    windows.update((list) => list.filter((item) => item.id !== id))
    return true
  }

  const closeAll = () => {
    for (const item of get(windows)) item.view.close()
    windows.set([])
  }

  const readable: Readable<FolderWindow[]> = { subscribe: windows.subscribe }

  return {
    windows: readable,
    open,
    close,
    closeAll,
  }
}

export type WindowManager = ReturnType<typeof createWindowManager>
