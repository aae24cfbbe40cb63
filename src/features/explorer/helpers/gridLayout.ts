import type { GridLayout, GridMetrics, Point, Rect } from '../model/types'

/** Columns that fit the view, or null while the view width is unknown. */
export const columnsPerRow = (layout: GridLayout): number | null => {
  const { viewWidth, margin, cellWidth, spacing } = layout
  if (viewWidth === null || !Number.isFinite(viewWidth) || viewWidth <= 0) return null
  return Math.max(1, Math.floor((viewWidth - margin) / (cellWidth + spacing)))
}

export const cellRect = (index: number, columns: number, metrics: GridMetrics): Rect => {
  const { cellWidth, cellHeight, spacing, padding } = metrics
  const row = Math.floor(index / columns)
  const column = index % columns
  return {
    x: column * (cellWidth + spacing) + padding,
    y: row * (cellHeight + spacing) + padding,
    width: cellWidth,
    height: cellHeight,
  }
}

export const containsPoint = (rect: Rect, point: Point) =>
  point.x >= rect.x && point.x < rect.x + rect.width && point.y >= rect.y && point.y < rect.y + rect.height

/** Index of the cell under `point`, or null over gaps, padding or past the last entry. */
export const cellIndexAt = (point: Point, count: number, layout: GridLayout): number | null => {
  const columns = columnsPerRow(layout)
  if (columns === null || count <= 0) return null
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return null
  const { cellWidth, cellHeight, spacing, padding } = layout
  const column = Math.floor((point.x - padding) / (cellWidth + spacing))
  const row = Math.floor((point.y - padding) / (cellHeight + spacing))
  if (column < 0 || column >= columns || row < 0) return null
  const index = row * columns + column
  if (index >= count) return null
  return containsPoint(cellRect(index, columns, layout), point) ? index : null
}
