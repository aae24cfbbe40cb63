export type SerialQueue = {
  run: <T>(task: () => T | Promise<T>) => Promise<T>
  idle: () => Promise<void>
}

/**
 * Runs tasks one at a time in submission order. A view routes every state
 * mutation through its own queue, which makes it the view's control thread.
 */
export const createSerialQueue = (): SerialQueue => {
  let tail: Promise<void> = Promise.resolve()

  const run = <T>(task: () => T | Promise<T>): Promise<T> => {
    const next = tail.then(task)
    // The caller observes failures through `next`; the chain itself must keep going.
    tail = next.then(
      () => undefined,
      () => undefined,
    )
    return next
  }

  const idle = () => tail

  return { run, idle }
}
