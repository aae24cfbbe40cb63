import fileGlyphs from './config/fileGlyphs.json'
import type { DirectoryEntry, GlyphId } from './model/types'

const FILE_GLYPHS: readonly GlyphId[] = [
  'text',
  'richtext',
  'book',
  'photo',
  'audio',
  'video',
  'archive',
  'spreadsheet',
  'presentation',
  'code',
]

const isFileGlyph = (value: string): value is GlyphId => FILE_GLYPHS.some((glyph) => glyph === value)

const buildGlyphTable = (groups: Record<string, string[]>) => {
  const table = new Map<string, GlyphId>()
  for (const [glyph, extensions] of Object.entries(groups)) {
    if (!isFileGlyph(glyph)) {
      console.warn('Skipping unknown glyph in file glyph table', glyph)
      continue
    }
    for (const ext of extensions) {
      table.set(ext.toLowerCase(), glyph)
    }
  }
  return table
}

const GLYPH_BY_EXTENSION = buildGlyphTable(fileGlyphs)

export const glyphForExtension = (ext: string | null): GlyphId =>
  (ext ? GLYPH_BY_EXTENSION.get(ext.toLowerCase()) : undefined) ?? 'unknown'

/**
 * Display glyph for an entry. Bundles get the folder glyph as a placeholder
 * until their own icon has been loaded.
 */
export const classify = (entry: DirectoryEntry): GlyphId => {
  if (entry.isDirectory) return 'folder'
  return glyphForExtension(entry.ext)
}
