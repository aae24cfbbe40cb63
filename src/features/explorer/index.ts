export { createFolderView } from './pages/createFolderView'
export type { FolderView, DropResult } from './pages/createFolderView'
export { createWindowManager } from './windows/createWindowManager'
export type { FolderWindow, WindowManager } from './windows/createWindowManager'
export { DEFAULT_VIEW_CONFIG, resolveViewConfig } from './config/viewConfig'
export type { ViewConfig, ViewConfigOverrides, WindowFrame } from './config/viewConfig'
export { classify } from './icons'
export { resolveTarget } from './helpers/dropTargetHitTest'
export { columnsPerRow, cellRect } from './helpers/gridLayout'
export { loadSnapshot, sortEntries } from './services/listing.service'
export { watchDirectory, unwatch } from './services/watch.service'
export type { DirectoryWatcher } from './services/watch.service'
export type { DragPayload } from './file-ops/dragPayload'
export type { MoveOutcome, MovePhase } from './file-ops/createMoveOrchestrator'
export type { ReplaceConfirmState } from './modals/replaceConfirmModal'
export { FilesystemError, MoveError, OpenError, ReplaceError, WatchSetupFailure } from './model/errors'
export type {
  AlertItem,
  DirectoryEntry,
  DropSite,
  FolderSnapshot,
  GlyphId,
  GridCell,
  GridLayout,
  GridMetrics,
  PendingMove,
  Point,
  Rect,
  ScenePhase,
} from './model/types'
