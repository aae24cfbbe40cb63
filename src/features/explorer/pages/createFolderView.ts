import { derived, get, writable, type Readable } from 'svelte/store'
import { hasErrorCode } from '@/shared/lib/error'
import { createSerialQueue } from '@/shared/lib/serialQueue'
import { createBundleIconLoader } from '../bundleIconLoader'
import { resolveViewConfig, type ViewConfigOverrides } from '../config/viewConfig'
import { createDragPayload, readDropPayload, type DragPayload } from '../file-ops/dragPayload'
import { createMoveOrchestrator, type MoveOutcome } from '../file-ops/createMoveOrchestrator'
import { resolveTarget } from '../helpers/dropTargetHitTest'
import { cellRect, columnsPerRow } from '../helpers/gridLayout'
import { createAlerts } from '../hooks/createAlerts'
import { classify } from '../icons'
import { createReplaceConfirmModal } from '../modals/replaceConfirmModal'
import { OpenError, WatchSetupFailure, type FilesystemError } from '../model/errors'
import type { DirectoryEntry, DropSite, GridCell, GridLayout, GridMetrics, Point, ScenePhase } from '../model/types'
import { launchBundle, openFile } from '../services/files.service'
import { unwatch, watchDirectory, type DirectoryWatcher } from '../services/watch.service'
import { createFolderState } from '../state/createFolderState'

export type DropResult = MoveOutcome | 'ignored'

type Options = {
  path: string
  config?: ViewConfigOverrides
  /** Opens `path` in a new, independent window. */
  openFolder: (path: string) => void
}

/**
 * Controller for one folder window: the listing and its grid, live updates,
 * activation of items and drag-and-drop moves. Every listing load and
 * filesystem mutation runs on the view's own control queue.
 */
export const createFolderView = ({ path, config: overrides, openFolder }: Options) => {
  const config = resolveViewConfig(overrides)
  const metrics: GridMetrics = {
    cellWidth: config.cellWidth,
    cellHeight: config.cellHeight,
    spacing: config.spacing,
    margin: config.margin,
    padding: config.padding,
  }

  const control = createSerialQueue()
  const alerts = createAlerts()
  const iconLoader = createBundleIconLoader({ maxConcurrent: config.iconConcurrency })
  const replacePrompt = createReplaceConfirmModal()

  const viewWidth = writable<number | null>(null)
  const dropTargeted = writable(false)
  const watching = writable(false)
  const watchError = writable<WatchSetupFailure | null>(null)

  let watcher: DirectoryWatcher | null = null
  let refreshTimer: ReturnType<typeof setTimeout> | null = null
  let scene: ScenePhase = 'active'
  let started = false
  let closed = false

  const layoutFor = (width: number | null): GridLayout => ({ ...metrics, viewWidth: width })

  // A folder that is gone stays unwatched until retryWatch() finds it again.
  const showLoadError = (error: FilesystemError) => {
    alerts.showError(error)
    if (watcher?.isActive() && hasErrorCode(error.cause, 'ENOENT', 'ENOTDIR')) {
      console.warn('Folder is gone, live updates stopped', { path })
      disarm()
    }
  }

  const folder = createFolderState({ path, listing: config, showError: showLoadError })

  const requestBundleIcons = () => {
    const bundles = (folder.current()?.entries ?? []).filter((entry) => entry.isBundle).map((entry) => entry.path)
    iconLoader.retain(bundles)
    for (const bundle of bundles) iconLoader.request(bundle)
  }

  const reload = () =>
    control.run(async () => {
      if (closed) return
      if (await folder.load()) requestBundleIcons()
    })

  const scheduleRefresh = () => {
    if (closed) return
    if (config.refreshDebounceMs <= 0) {
      void reload()
      return
    }
    if (refreshTimer) clearTimeout(refreshTimer)
    refreshTimer = setTimeout(() => {
      refreshTimer = null
      void reload()
    }, config.refreshDebounceMs)
  }

  const disarm = () => {
    if (refreshTimer) {
      clearTimeout(refreshTimer)
      refreshTimer = null
    }
    unwatch(watcher)
    watcher = null
    watching.set(false)
  }

  const arm = () => {
    if (closed || watcher?.isActive()) return true
    try {
      watcher = watchDirectory(path, scheduleRefresh, {
        onStopped: () => {
          watcher = null
          watching.set(false)
        },
      })
    } catch (err) {
      const failure = err instanceof WatchSetupFailure ? err : new WatchSetupFailure(path, err)
      console.warn('Live updates unavailable', failure)
      watchError.set(failure)
      watching.set(false)
      return false
    }
    watchError.set(null)
    watching.set(true)
    return true
  }

  /** First display: arm the watcher, then load. */
  const start = async () => {
    if (started || closed) return
    started = true
    if (scene === 'active') arm()
    await reload()
  }

  /** Watches only while active. Changes made while unwatched are picked up by one reload on return. */
  const setVisibility = async (next: ScenePhase) => {
    if (closed || next === scene) return
    const wasActive = scene === 'active'
    scene = next
    if (next !== 'active') {
      disarm()
      return
    }
    if (!started || wasActive) return
    arm()
    await reload()
  }

  const retryWatch = async () => {
    if (closed || !started || scene !== 'active') return false
    if (watcher?.isActive()) return true
    if (!arm()) return false
    await reload()
    return true
  }

  const shellOpen = async (entry: DirectoryEntry, action: () => Promise<void>) => {
    try {
      await action()
    } catch (err) {
      const error = new OpenError(entry.path, err)
      console.error('Failed to open item', error)
      alerts.showError(error)
    }
  }

  /** Single-click activation: folders open a new window, bundles launch, files go to their default app. */
  const activate = async (entry: DirectoryEntry) => {
    if (closed) return
    if (entry.isBundle) return shellOpen(entry, () => launchBundle(entry))
    if (entry.isDirectory) {
      openFolder(entry.path)
      return
    }
    return shellOpen(entry, () => openFile(entry))
  }

  const orchestrator = createMoveOrchestrator({
    currentDirectory: () => path,
    resolveTarget: (location: Point) => resolveTarget(location, folder.current(), layoutFor(get(viewWidth))),
    confirmReplace: replacePrompt.ask,
    reload,
    showError: alerts.showError,
    run: control.run,
  })

  const drop = async (payload: DragPayload, site: DropSite): Promise<DropResult> => {
    dropTargeted.set(false)
    if (closed) return 'ignored'
    const source = readDropPayload(payload)
    if (!source) {
      console.info('Ignoring drop without a file path', payload)
      return 'ignored'
    }
    return orchestrator.drop(source, site)
  }

  const dropOnEntry = (entry: DirectoryEntry, payload: DragPayload) => drop(payload, { type: 'entry', entry })

  const dropOnBackground = (location: Point | null, payload: DragPayload) =>
    drop(payload, { type: 'background', location })

  const cells: Readable<GridCell[]> = derived(
    [folder.snapshot, viewWidth, iconLoader.icons],
    ([$snapshot, $viewWidth, $icons]) => {
      if (!$snapshot) return []
      const columns = columnsPerRow(layoutFor($viewWidth))
      return $snapshot.entries.map((entry, index) => ({
        entry,
        index,
        glyph: classify(entry),
        iconPath: entry.isBundle ? ($icons.get(entry.path) ?? null) : null,
        rect: columns === null ? null : cellRect(index, columns, metrics),
      }))
    },
  )

  const close = () => {
    if (closed) return
    closed = true
    disarm()
    iconLoader.destroy()
    replacePrompt.cancel()
    dropTargeted.set(false)
  }

  const asReadable = <T>(store: Readable<T>): Readable<T> => ({ subscribe: store.subscribe })

  return {
    path,
    config,
    snapshot: folder.snapshot,
    cells,
    alert: alerts.current,
    pendingAlerts: alerts.pending,
    replacePrompt: replacePrompt.state,
    movePhase: orchestrator.phase,
    pendingMove: orchestrator.pending,
    watchError: asReadable(watchError),
    dropTargeted: asReadable(dropTargeted),
    watching: asReadable(watching),
    start,
    reload,
    setVisibility,
    retryWatch,
    activate,
    dragPayloadFor: createDragPayload,
    dropOnEntry,
    dropOnBackground,
    isDropInFlight: orchestrator.isBusy,
    setViewWidth: (width: number | null) => viewWidth.set(width),
    setDropTargeted: (targeted: boolean) => dropTargeted.set(!closed && targeted),
    confirmReplace: replacePrompt.confirm,
    cancelReplace: replacePrompt.cancel,
    dismissAlert: alerts.dismiss,
    idle: control.idle,
    close,
  }
}

export type FolderView = ReturnType<typeof createFolderView>
