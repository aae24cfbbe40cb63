import { get } from 'svelte/store'
import { describe, expect, it } from 'vitest'
import { FilesystemError, MoveError, OpenError, ReplaceError } from '../model/errors'
import { alertMessage, createAlerts } from './createAlerts'

describe('alertMessage', () => {
  it('describes each failure the way the window reports it', () => {
    const denied = new Error('EACCES: permission denied')

    expect(alertMessage(new FilesystemError('/d', denied))).toBe('Error loading folder contents: EACCES: permission denied')
    expect(alertMessage(new OpenError('/d/report.pdf', new Error('xdg-open exited with code 3')))).toBe(
      'Error opening file: report.pdf',
    )
    expect(alertMessage(new MoveError('/e/a.txt', '/d/a.txt', denied))).toBe('Error moving item: EACCES: permission denied')
    expect(alertMessage(new ReplaceError('/e/a.txt', '/d/a.txt', denied))).toBe(
      'Error replacing item: EACCES: permission denied',
    )
  })
})

describe('createAlerts', () => {
  it('shows alerts one at a time in arrival order', () => {
    const alerts = createAlerts()

    alerts.show('Error', 'first')
    alerts.showError(new MoveError('/e/a.txt', '/d/a.txt', 'disk full'))

    expect(get(alerts.current)).toEqual({ id: 1, title: 'Error', message: 'first' })
    expect(get(alerts.pending)).toBe(2)

    alerts.dismiss()
    expect(get(alerts.current)).toEqual({ id: 2, title: 'Error', message: 'Error moving item: disk full' })

    alerts.dismiss()
    expect(get(alerts.current)).toBeNull()
    expect(get(alerts.pending)).toBe(0)
  })

  it('does not queue a repeat of an alert that is still waiting', () => {
    const alerts = createAlerts()
    const gone = new Error("ENOENT: no such file or directory, scandir '/d'")

    const first = alerts.showError(new FilesystemError('/d', gone))
    const repeat = alerts.showError(new FilesystemError('/d', gone))

    expect(repeat).toBe(first)
    expect(get(alerts.pending)).toBe(1)

    alerts.dismiss()
    alerts.showError(new FilesystemError('/d', gone))
    expect(get(alerts.current)).toEqual({
      id: 2,
      title: 'Error',
      message: "Error loading folder contents: ENOENT: no such file or directory, scandir '/d'",
    })
  })
})
