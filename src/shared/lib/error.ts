export type NormalizedError = Error & {
  code?: string
  path?: string
  details?: unknown
  raw?: unknown
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  path?: unknown
  details?: unknown
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  if (!value || typeof value !== 'object') return null
  const record: object = value
  const read = (key: keyof ErrorLike): unknown => (key in record ? Reflect.get(record, key) : undefined)
  return {
    code: read('code'),
    message: read('message'),
    path: read('path'),
    details: read('details'),
  }
}

// Node system errors carry `code` and `path` as own properties; keep them reachable.
const fromError = (value: Error): NormalizedError => {
  const error: NormalizedError = value
  if ('code' in value && typeof value.code === 'string') error.code = value.code
  if ('path' in value && typeof value.path === 'string') error.path = value.path
  return error
}

export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) {
    return fromError(value)
  }

  const like = asErrorLike(value)
  const message =
    typeof like?.message === 'string'
      ? like.message
      : typeof value === 'string'
        ? value
        : (() => {
            try {
              return JSON.stringify(value)
            } catch {
              return String(value)
            }
          })()

  const error: NormalizedError = new Error(message || 'Unknown error')
  if (typeof like?.code === 'string') error.code = like.code
  if (typeof like?.path === 'string') error.path = like.path
  if (like && like.details !== undefined) error.details = like.details
  error.raw = value
  return error
}

export const getErrorMessage = (value: unknown): string => normalizeError(value).message
export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code

export const hasErrorCode = (value: unknown, ...codes: string[]) => {
  const code = getErrorCode(value)
  return code !== undefined && codes.includes(code)
}
