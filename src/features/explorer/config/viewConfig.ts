import type { GridMetrics } from '../model/types'

export type WindowFrame = {
  width: number
  height: number
}

export type ViewConfig = GridMetrics & {
  /** Lowercased extension, without the dot, that marks a directory as an application bundle. */
  bundleExtension: string
  hiddenPrefix: string
  caseSensitiveNames: boolean
  /** 0 reloads once per change notification; above 0, bursts within the window share one reload. */
  refreshDebounceMs: number
  iconConcurrency: number
  windowFrame: WindowFrame
}

export type ViewConfigOverrides = Partial<Omit<ViewConfig, 'windowFrame'>> & {
  windowFrame?: Partial<WindowFrame>
}

export const DEFAULT_VIEW_CONFIG: ViewConfig = {
  cellWidth: 100,
  cellHeight: 100,
  spacing: 20,
  margin: 20,
  padding: 10,
  bundleExtension: 'app',
  hiddenPrefix: '.',
  caseSensitiveNames: true,
  refreshDebounceMs: 0,
  iconConcurrency: 4,
  windowFrame: { width: 600, height: 500 },
}

type NumericKey = 'cellWidth' | 'cellHeight' | 'spacing' | 'margin' | 'padding' | 'refreshDebounceMs' | 'iconConcurrency'

const POSITIVE: NumericKey[] = ['cellWidth', 'cellHeight', 'iconConcurrency']
const NON_NEGATIVE: NumericKey[] = ['spacing', 'margin', 'padding', 'refreshDebounceMs']

const pickNumber = (key: string, value: number | undefined, fallback: number, min: number, inclusive: boolean) => {
  if (value === undefined) return fallback
  const valid = Number.isFinite(value) && (inclusive ? value >= min : value > min)
  if (!valid) {
    console.warn(`Ignoring invalid view setting ${key}`, value)
    return fallback
  }
  return value
}

const pickText = (key: string, value: string | undefined, fallback: string) => {
  if (value === undefined) return fallback
  if (value.trim().length === 0) {
    console.warn(`Ignoring empty view setting ${key}`)
    return fallback
  }
  return value
}

/** Defaults merged with overrides; invalid overrides fall back to the default value. */
export const resolveViewConfig = (overrides: ViewConfigOverrides = {}): ViewConfig => {
  const resolved: ViewConfig = {
    ...DEFAULT_VIEW_CONFIG,
    bundleExtension: pickText('bundleExtension', overrides.bundleExtension, DEFAULT_VIEW_CONFIG.bundleExtension)
      .replace(/^\./, '')
      .toLowerCase(),
    hiddenPrefix: pickText('hiddenPrefix', overrides.hiddenPrefix, DEFAULT_VIEW_CONFIG.hiddenPrefix),
    caseSensitiveNames: overrides.caseSensitiveNames ?? DEFAULT_VIEW_CONFIG.caseSensitiveNames,
    windowFrame: {
      width: pickNumber('windowFrame.width', overrides.windowFrame?.width, DEFAULT_VIEW_CONFIG.windowFrame.width, 0, false),
      height: pickNumber(
        'windowFrame.height',
        overrides.windowFrame?.height,
        DEFAULT_VIEW_CONFIG.windowFrame.height,
        0,
        false,
      ),
    },
  }
  for (const key of POSITIVE) {
    resolved[key] = pickNumber(key, overrides[key], DEFAULT_VIEW_CONFIG[key], 0, false)
  }
  for (const key of NON_NEGATIVE) {
    resolved[key] = pickNumber(key, overrides[key], DEFAULT_VIEW_CONFIG[key], 0, true)
  }
  resolved.iconConcurrency = Math.floor(resolved.iconConcurrency)
  return resolved
}
