export const normalizePath = (p: string) => {
  if (!p) return ''
  const withSlashes = p.replace(/\\/g, '/').replace(/\/{2,}/g, '/')
  const trimmed = withSlashes.replace(/\/+$/, '')
  if (trimmed === '') return withSlashes.startsWith('/') ? '/' : ''
  if (/^[A-Za-z]:$/.test(trimmed)) return `${trimmed}/`
  return trimmed
}

export const samePath = (a: string, b: string) => normalizePath(a) === normalizePath(b)

export const isSubPath = (parent: string, child: string) => {
  const normParent = normalizePath(parent)
  const normChild = normalizePath(child)
  const prefix = normParent.endsWith('/') ? normParent : `${normParent}/`
  return normChild === normParent || normChild.startsWith(prefix)
}

export const parentPath = (path: string) => {
  const normalized = normalizePath(path)
  if (!normalized || normalized === '/') return '/'
  const driveRoot = normalized.match(/^([A-Za-z]:)\/?$/)
  if (driveRoot) return `${driveRoot[1]}/`
  const drivePrefix = normalized.match(/^([A-Za-z]:)\//)
  const idx = normalized.lastIndexOf('/')
  if (idx <= 0) {
    return drivePrefix ? `${drivePrefix[1]}/` : '/'
  }
  if (drivePrefix && idx === drivePrefix[1].length) {
    return `${drivePrefix[1]}/`
  }
  return normalized.slice(0, idx)
}

export const baseName = (path: string) => {
  const normalized = normalizePath(path)
  const idx = normalized.lastIndexOf('/')
  return idx === -1 ? normalized : normalized.slice(idx + 1)
}

export const joinPath = (dir: string, name: string) => {
  const base = normalizePath(dir)
  return base.endsWith('/') ? `${base}${name}` : `${base}/${name}`
}

/** Lowercased extension without the dot; names like `.profile` or `README` have none. */
export const extensionOf = (name: string) => {
  const idx = name.lastIndexOf('.')
  if (idx <= 0 || idx === name.length - 1) return null
  return name.slice(idx + 1).toLowerCase()
}
