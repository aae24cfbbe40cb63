import { writable, type Readable } from 'svelte/store'
import { baseName } from '../utils'

export type ReplaceConfirmState = {
  open: boolean
  title: string
  name: string
  destination: string | null
  message: string
}

const closedState: ReplaceConfirmState = {
  open: false,
  title: '',
  name: '',
  destination: null,
  message: '',
}

export const replaceMessage = (name: string) =>
  `An item named "${name}" already exists in this location. Do you want to replace it?`

export const createReplaceConfirmModal = () => {
  const state = writable<ReplaceConfirmState>(closedState)
  let settle: ((confirmed: boolean) => void) | null = null

  const answer = (confirmed: boolean) => {
    const pending = settle
    settle = null
    state.set(closedState)
    pending?.(confirmed)
  }

  /** Opens the prompt for `destination`; resolves true only if the user confirms. */
  const ask = (destination: string) =>
    new Promise<boolean>((resolve) => {
      if (settle) answer(false)
      settle = resolve
      const name = baseName(destination)
      state.set({ open: true, title: 'Replace Item?', name, destination, message: replaceMessage(name) })
    })

  const readable: Readable<ReplaceConfirmState> = { subscribe: state.subscribe }

  return {
    state: readable,
    ask,
    confirm: () => answer(true),
    cancel: () => answer(false),
  }
}

export type ReplaceConfirmModal = ReturnType<typeof createReplaceConfirmModal>
