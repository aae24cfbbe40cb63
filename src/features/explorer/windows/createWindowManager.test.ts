import { get } from 'svelte/store'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const { invokeMock, watchDirectoryMock } = vi.hoisted(() => ({
  invokeMock: vi.fn(),
  watchDirectoryMock: vi.fn(),
}))

vi.mock('@/shared/lib/host', () => ({
  invoke: invokeMock,
}))

vi.mock('../services/watch.service', () => ({
  watchDirectory: watchDirectoryMock,
  unwatch: (handle: { stop: () => void } | null | undefined) => handle?.stop(),
}))

import { createWindowManager } from './createWindowManager'

const photos = { name: 'photos', path: '/d/photos', isDirectory: true, isBundle: false, ext: null }

describe('createWindowManager', () => {
  const stops: Array<() => void> = []

  beforeEach(() => {
    stops.length = 0
    invokeMock.mockReset().mockImplementation(async (cmd: string) => (cmd === 'list_dir' ? [] : undefined))
    watchDirectoryMock.mockReset().mockImplementation((path: string) => {
      let active = true
      const stop = vi.fn(() => {
        active = false
      })
      stops.push(stop)
      return { path, isActive: () => active, stop }
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('opens a window titled after the folder with the configured frame', async () => {
    const manager = createWindowManager({ config: { windowFrame: { width: 800 } } })

    const opened = manager.open('/Users/me/Documents/')

    expect(opened).toMatchObject({
      id: 1,
      path: '/Users/me/Documents',
      title: 'Documents',
      frame: { width: 800, height: 500 },
    })
    await opened.view.idle()
    expect(invokeMock).toHaveBeenCalledWith('list_dir', { path: '/Users/me/Documents' })
    expect(get(manager.windows)).toEqual([opened])
    manager.closeAll()
  })

  it('titles the root window with its path', () => {
    const manager = createWindowManager()

    expect(manager.open('/').title).toBe('/')
    manager.closeAll()
  })

  it('opens a sibling window when a folder is activated', async () => {
    const manager = createWindowManager()
    const parent = manager.open('/d')

    await parent.view.activate(photos)

    const [first, second] = get(manager.windows)
    expect(first).toBe(parent)
    expect(second).toMatchObject({ id: 2, path: '/d/photos', title: 'photos' })
    expect(second.view).not.toBe(parent.view)
    manager.closeAll()
  })

  it('closes windows one at a time or all together', () => {
    const manager = createWindowManager()
    const a = manager.open('/a')
    manager.open('/b')
    manager.open('/c')

    expect(manager.close(a.id)).toBe(true)
    expect(manager.close(a.id)).toBe(false)
    expect(get(manager.windows).map((item) => item.title)).toEqual(['b', 'c'])
    expect(stops[0]).toHaveBeenCalledTimes(1)

    manager.closeAll()

    expect(get(manager.windows)).toEqual([])
    for (const stop of stops) expect(stop).toHaveBeenCalledTimes(1)
  })
})
