import { writable, type Readable } from 'svelte/store'
import { MoveError, ReplaceError } from '../model/errors'
import type { DropSite, PendingMove } from '../model/types'
import { entryExists, moveItem, replaceItem } from '../services/files.service'
import { isSubPath, parentPath, samePath } from '../utils'
import { resolveDestination, type DestinationContext } from './resolveDestination'

export type MovePhase = 'idle' | 'resolving' | 'moving' | 'awaiting-confirmation' | 'replacing'

export type MoveOutcome = 'moved' | 'replaced' | 'cancelled' | 'failed' | 'busy'

type Deps = DestinationContext & {
  confirmReplace: (destination: string) => Promise<boolean>
  reload: () => Promise<void>
  showError: (error: MoveError | ReplaceError) => void
  /** Runs a filesystem step on the owning view's control queue. */
  run: <T>(task: () => Promise<T>) => Promise<T>
}

/**
 * Resolves one drop at a time: destination, collision check, optional
 * replace confirmation, then the move or replace and a reload. A drop that
 * arrives while another is unresolved is rejected with `busy`.
 */
export const createMoveOrchestrator = (deps: Deps) => {
  const phase = writable<MovePhase>('idle')
  const pending = writable<PendingMove | null>(null)
  let inFlight = false

  const cancel = (reason: string, move: PendingMove): MoveOutcome => {
    console.info(`Drop cancelled: ${reason}`, move)
    return 'cancelled'
  }

  const fail = (error: MoveError | ReplaceError, message: string): MoveOutcome => {
    console.error(message, error)
    deps.showError(error)
    return 'failed'
  }

  const performMove = async (move: PendingMove): Promise<MoveOutcome> => {
    phase.set('moving')
    try {
      await deps.run(() => moveItem(move.source, move.destination))
    } catch (err) {
      return fail(new MoveError(move.source, move.destination, err), 'Failed to move item')
    }
    await deps.reload()
    return 'moved'
  }

  const performReplace = async (move: PendingMove): Promise<MoveOutcome> => {
    phase.set('replacing')
    try {
      await deps.run(() => replaceItem(move.source, move.destination))
    } catch (err) {
      return fail(new ReplaceError(move.source, move.destination, err), 'Failed to replace item')
    }
    await deps.reload()
    return 'replaced'
  }

  const resolve = async (source: string, site: DropSite): Promise<MoveOutcome> => {
    const move: PendingMove = { source, destination: resolveDestination(source, site, deps) }
    pending.set(move)

    if (samePath(move.source, move.destination)) {
      return cancel('item dropped in the same location', move)
    }
    if (isSubPath(move.source, parentPath(move.destination))) {
      return cancel('a folder cannot be moved into itself', move)
    }
    if (isSubPath(move.destination, move.source)) {
      return cancel('an item cannot replace a folder that contains it', move)
    }

    let exists: boolean
    try {
      exists = await deps.run(() => entryExists(move.destination))
    } catch (err) {
      return fail(new MoveError(move.source, move.destination, err), 'Failed to check drop destination')
    }
    if (!exists) return performMove(move)

    phase.set('awaiting-confirmation')
    const confirmed = await deps.confirmReplace(move.destination)
    if (!confirmed) return cancel('replace declined', move)
    return performReplace(move)
  }

  const drop = async (source: string, site: DropSite): Promise<MoveOutcome> => {
    if (inFlight) {
      console.warn('Drop rejected: another move is still unresolved', { source })
      return 'busy'
    }
    inFlight = true
    phase.set('resolving')
    try {
      return await resolve(source, site)
    } finally {
      inFlight = false
      pending.set(null)
      phase.set('idle')
    }
  }

  const phaseReadable: Readable<MovePhase> = { subscribe: phase.subscribe }
  const pendingReadable: Readable<PendingMove | null> = { subscribe: pending.subscribe }

  return {
    phase: phaseReadable,
    pending: pendingReadable,
    drop,
    isBusy: () => inFlight,
  }
}

export type MoveOrchestrator = ReturnType<typeof createMoveOrchestrator>
