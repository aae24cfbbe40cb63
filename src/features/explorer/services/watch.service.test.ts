import { EventEmitter } from 'node:events'
import { beforeEach, describe, expect, it, vi } from 'vitest'

type WatchListener = (eventType: string, filename: string | null) => void

type FakeWatcher = {
  listener: WatchListener
  emitter: EventEmitter
  close: () => void
}

const { watchMock, accessMock, watchers } = vi.hoisted(() => {
  const watchers: FakeWatcher[] = []
  return { watchMock: vi.fn(), accessMock: vi.fn(), watchers }
})

vi.mock('node:fs', () => ({
  watch: watchMock,
}))

vi.mock('node:fs/promises', () => ({
  access: accessMock,
}))

import { WatchSetupFailure } from '../model/errors'
import { unwatch, watchDirectory } from './watch.service'

describe('watchDirectory', () => {
  beforeEach(() => {
    watchers.length = 0
    accessMock.mockReset().mockResolvedValue(undefined)
    watchMock.mockReset().mockImplementation((_path: string, _options: unknown, listener: WatchListener) => {
      const emitter = new EventEmitter()
      const close = vi.fn()
      watchers.push({ listener, emitter, close })
      return Object.assign(emitter, { close })
    })
  })

  it('reports child renames and ignores content changes', () => {
    const onChange = vi.fn()
    watchDirectory('/d', onChange)

    expect(watchMock).toHaveBeenCalledWith('/d', { persistent: false }, expect.any(Function))
    const [{ listener }] = watchers
    listener('rename', 'new.txt')
    listener('change', 'new.txt')
    listener('rename', 'old.txt')

    expect(onChange).toHaveBeenCalledTimes(2)
  })

  it('stops delivering and closes the handle once, however often it is stopped', () => {
    const onChange = vi.fn()
    const handle = watchDirectory('/d', onChange)
    const [{ listener, close }] = watchers

    unwatch(handle)
    unwatch(handle)
    listener('rename', 'late.txt')

    expect(handle.isActive()).toBe(false)
    expect(close).toHaveBeenCalledTimes(1)
    expect(onChange).not.toHaveBeenCalled()
  })

  it('stops itself when the underlying watcher errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const onStopped = vi.fn()
    const handle = watchDirectory('/d', vi.fn(), { onStopped })
    const [{ emitter, close }] = watchers
    const failure = new Error('EPERM')

    emitter.emit('error', failure)

    expect(handle.isActive()).toBe(false)
    expect(close).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(onStopped).toHaveBeenCalledWith(failure)
    warn.mockRestore()
  })

  it('stops and reports when the watched directory itself is deleted', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const gone = Object.assign(new Error("ENOENT: no such file or directory, access '/d'"), { code: 'ENOENT' })
    accessMock.mockRejectedValue(gone)
    const onChange = vi.fn()
    const onStopped = vi.fn()
    const handle = watchDirectory('/d', onChange, { onStopped })
    const [{ listener, close }] = watchers

    listener('rename', 'd')

    await vi.waitFor(() => {
      expect(onStopped).toHaveBeenCalledWith(gone)
    })
    expect(accessMock).toHaveBeenCalledWith('/d')
    expect(onChange).toHaveBeenCalledTimes(1)
    expect(handle.isActive()).toBe(false)
    expect(close).toHaveBeenCalledTimes(1)
    warn.mockRestore()
  })

  it('keeps watching when a child shares the directory name', async () => {
    const onStopped = vi.fn()
    const handle = watchDirectory('/d', vi.fn(), { onStopped })
    const [{ listener }] = watchers

    listener('rename', 'd')
    await vi.waitFor(() => {
      expect(accessMock).toHaveBeenCalledWith('/d')
    })

    expect(handle.isActive()).toBe(true)
    expect(onStopped).not.toHaveBeenCalled()
    unwatch(handle)
  })

  it('throws WatchSetupFailure when the directory cannot be watched', () => {
    watchMock.mockImplementation(() => {
      throw Object.assign(new Error("ENOENT: no such file or directory, watch '/gone'"), { code: 'ENOENT' })
    })

    expect(() => watchDirectory('/gone', vi.fn())).toThrow(WatchSetupFailure)
  })
})
