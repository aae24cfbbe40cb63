import { writable, type Readable } from 'svelte/store'
import { fetchBundleIcon } from './services/files.service'

type Options = {
  maxConcurrent?: number
}

type IconMap = Map<string, string>

const DEFAULT_CONCURRENCY = 4

/**
 * Loads application bundle icons in the background. Results land in `icons`
 * keyed by bundle path; a failed or missing icon leaves the placeholder in place.
 */
export function createBundleIconLoader(opts: Options = {}) {
  const maxConcurrent = Math.max(1, opts.maxConcurrent ?? DEFAULT_CONCURRENCY)

  const icons = writable<IconMap>(new Map())
  const requested = new Set<string>()
  const queue: string[] = []
  let active = 0
  let destroyed = false

  function request(path: string) {
    if (destroyed || requested.has(path)) return false
    requested.add(path)
    queue.push(path)
    pump()
    return true
  }

  function pump() {
    if (destroyed) return
    while (active < maxConcurrent && queue.length > 0) {
      const path = queue.shift()
      if (path === undefined) break
      active++
      fetchBundleIcon(path)
        .then((iconPath) => {
          if (destroyed || !iconPath) return
          icons.update((m) => {
            const next = new Map(m)
            next.set(path, iconPath)
            return next
          })
        })
        .catch((err: unknown) => {
          console.warn('Failed to load bundle icon', { path, err })
        })
        .finally(() => {
          active--
          pump()
        })
    }
  }

  /** Forgets icons of bundles that are no longer listed, so they load again if they come back. */
  function retain(paths: Iterable<string>) {
    const keep = new Set(paths)
    for (const path of [...requested]) {
      if (!keep.has(path)) requested.delete(path)
    }
    for (let i = queue.length - 1; i >= 0; i--) {
      if (!keep.has(queue[i])) queue.splice(i, 1)
    }
    icons.update((m) => {
      const next = new Map([...m].filter(([path]) => keep.has(path)))
      return next.size === m.size ? m : next
    })
  }

  function destroy() {
    destroyed = true
    queue.length = 0
    requested.clear()
  }

  const readable: Readable<IconMap> = { subscribe: icons.subscribe }

  return {
    icons: readable,
    request,
    retain,
    destroy,
  }
}

export type BundleIconLoader = ReturnType<typeof createBundleIconLoader>
