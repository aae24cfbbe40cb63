export type DirectoryEntry = {
  readonly name: string
  readonly path: string
  readonly isDirectory: boolean
  readonly isBundle: boolean
  readonly ext: string | null
}

export type FolderSnapshot = {
  readonly directory: string
  readonly entries: readonly DirectoryEntry[]
}

export type PendingMove = {
  readonly source: string
  readonly destination: string
}

export type Point = { x: number; y: number }

export type Rect = { x: number; y: number; width: number; height: number }

export type GridMetrics = {
  cellWidth: number
  cellHeight: number
  spacing: number
  margin: number
  padding: number
}

export type GridLayout = GridMetrics & {
  viewWidth: number | null
}

export type GlyphId =
  | 'folder'
  | 'text'
  | 'richtext'
  | 'book'
  | 'photo'
  | 'audio'
  | 'video'
  | 'archive'
  | 'spreadsheet'
  | 'presentation'
  | 'code'
  | 'unknown'

export type GridCell = {
  entry: DirectoryEntry
  index: number
  glyph: GlyphId
  iconPath: string | null
  rect: Rect | null
}

export type DropSite =
  | { type: 'entry'; entry: DirectoryEntry }
  | { type: 'background'; location: Point | null }

export type ScenePhase = 'active' | 'inactive' | 'background'

export type AlertItem = {
  id: number
  title: string
  message: string
}
