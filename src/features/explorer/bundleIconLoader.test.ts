import { get } from 'svelte/store'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const { fetchBundleIconMock } = vi.hoisted(() => ({
  fetchBundleIconMock: vi.fn(),
}))

vi.mock('./services/files.service', () => ({
  fetchBundleIcon: fetchBundleIconMock,
}))

import { createBundleIconLoader } from './bundleIconLoader'

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}

describe('createBundleIconLoader', () => {
  beforeEach(() => {
    fetchBundleIconMock.mockReset()
  })

  it('publishes loaded icons and requests each bundle once', async () => {
    fetchBundleIconMock.mockResolvedValue('/d/Tool.app/Contents/Resources/Tool.icns')
    const loader = createBundleIconLoader()

    expect(loader.request('/d/Tool.app')).toBe(true)
    expect(loader.request('/d/Tool.app')).toBe(false)

    await vi.waitFor(() => {
      expect(get(loader.icons).get('/d/Tool.app')).toBe('/d/Tool.app/Contents/Resources/Tool.icns')
    })
    expect(fetchBundleIconMock).toHaveBeenCalledTimes(1)
  })

  it('never runs more than the configured number of lookups at once', async () => {
    const pending = [deferred<string | null>(), deferred<string | null>(), deferred<string | null>()]
    pending.forEach((item) => fetchBundleIconMock.mockReturnValueOnce(item.promise))
    const loader = createBundleIconLoader({ maxConcurrent: 2 })

    loader.request('/d/A.app')
    loader.request('/d/B.app')
    loader.request('/d/C.app')
    expect(fetchBundleIconMock).toHaveBeenCalledTimes(2)

    pending[0].resolve(null)
    await vi.waitFor(() => {
      expect(fetchBundleIconMock).toHaveBeenCalledTimes(3)
    })
    expect(fetchBundleIconMock).toHaveBeenLastCalledWith('/d/C.app')
    expect(get(loader.icons).size).toBe(0)
  })

  it('keeps the placeholder when a lookup fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    fetchBundleIconMock.mockRejectedValue(new Error('EACCES'))
    const loader = createBundleIconLoader()

    loader.request('/d/Locked.app')

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledTimes(1)
    })
    expect(get(loader.icons).has('/d/Locked.app')).toBe(false)
    warn.mockRestore()
  })

  it('drops icons of bundles that disappeared', async () => {
    fetchBundleIconMock.mockImplementation(async (path: string) => `${path}/icon.icns`)
    const loader = createBundleIconLoader()
    loader.request('/d/A.app')
    loader.request('/d/B.app')
    await vi.waitFor(() => {
      expect(get(loader.icons).size).toBe(2)
    })

    loader.retain(['/d/B.app'])

    expect([...get(loader.icons).keys()]).toEqual(['/d/B.app'])
    expect(loader.request('/d/A.app')).toBe(true)
  })

  it('ignores results that arrive after it was destroyed', async () => {
    const pending = deferred<string | null>()
    fetchBundleIconMock.mockReturnValueOnce(pending.promise)
    const loader = createBundleIconLoader()

    loader.request('/d/A.app')
    loader.destroy()
    pending.resolve('/d/A.app/icon.icns')
    await pending.promise
    await Promise.resolve()

    expect(get(loader.icons).size).toBe(0)
    expect(loader.request('/d/B.app')).toBe(false)
  })
})
