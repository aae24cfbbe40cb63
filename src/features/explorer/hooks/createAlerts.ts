import { derived, get, writable, type Readable } from 'svelte/store'
import type { FilesystemError, MoveError, OpenError, ReplaceError } from '../model/errors'
import type { AlertItem } from '../model/types'
import { baseName } from '../utils'

export type AlertableError = FilesystemError | MoveError | ReplaceError | OpenError

export const alertMessage = (error: AlertableError) => {
  switch (error.code) {
    case 'filesystem':
      return `Error loading folder contents: ${error.reason}`
    case 'open':
      return `Error opening file: ${baseName(error.path)}`
    case 'move':
      return `Error moving item: ${error.reason}`
    case 'replace':
      return `Error replacing item: ${error.reason}`
  }
}

/**
 * Modal error messages for one window. Alerts raised while one is showing
 * wait their turn instead of replacing it; a repeat of one already waiting
 * or showing is dropped.
 */
export const createAlerts = () => {
  const queue = writable<AlertItem[]>([])
  let nextId = 1

  const show = (title: string, message: string): AlertItem => {
    const queued = get(queue).find((item) => item.title === title && item.message === message)
    if (queued) return queued
    const item: AlertItem = { id: nextId++, title, message }
    queue.update((items) => [...items, item])
    return item
  }

  const showError = (error: AlertableError) => show('Error', alertMessage(error))

  const dismiss = () => {
    queue.update((items) => items.slice(1))
  }

  const current: Readable<AlertItem | null> = derived(queue, ($queue) => $queue[0] ?? null)
  const pending: Readable<number> = derived(queue, ($queue) => $queue.length)

  return {
    current,
    pending,
    show,
    showError,
    dismiss,
  }
}

export type Alerts = ReturnType<typeof createAlerts>
