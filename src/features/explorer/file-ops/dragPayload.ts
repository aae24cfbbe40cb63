import { isAbsolute } from 'node:path'
import { fileURLToPath, pathToFileURL } from 'node:url'
import type { DirectoryEntry } from '../model/types'

export type DragPayload = {
  'text/uri-list'?: string
  'text/plain'?: string
}

/** What a grid cell puts on the drag pasteboard: its own path, as a file URL and as text. */
export const createDragPayload = (entry: DirectoryEntry): DragPayload => ({
  'text/uri-list': pathToFileURL(entry.path).href,
  'text/plain': entry.path,
})

const firstLine = (value: string | undefined) =>
  value
    ?.split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0 && !line.startsWith('#')) ?? null

const fromFileUrl = (value: string) => {
  try {
    return fileURLToPath(value)
  } catch (err) {
    console.warn('Ignoring malformed file URL in drop', { value, err })
    return null
  }
}

/** The single filesystem path a drop carries, or null when it carries none. */
export const readDropPayload = (payload: DragPayload): string | null => {
  const uri = firstLine(payload['text/uri-list'])
  if (uri?.startsWith('file:')) return fromFileUrl(uri)

  const text = firstLine(payload['text/plain'])
  if (!text) return null
  if (text.startsWith('file:')) return fromFileUrl(text)
  return isAbsolute(text) ? text : null
}
