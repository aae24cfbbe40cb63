import { getErrorMessage } from '@/shared/lib/error'

export type ExplorerErrorCode = 'filesystem' | 'move' | 'replace' | 'open' | 'watch-setup'

abstract class ExplorerError extends Error {
  abstract readonly code: ExplorerErrorCode
  readonly reason: string

  protected constructor(message: string, cause: unknown) {
    super(message, { cause })
    this.name = new.target.name
    this.reason = getErrorMessage(cause)
  }
}

/** Listing a directory failed. */
export class FilesystemError extends ExplorerError {
  readonly code = 'filesystem'

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot list ${path}: ${getErrorMessage(cause)}`, cause)
  }
}

export class MoveError extends ExplorerError {
  readonly code = 'move'

  constructor(
    readonly source: string,
    readonly destination: string,
    cause: unknown,
  ) {
    super(`Cannot move ${source} to ${destination}: ${getErrorMessage(cause)}`, cause)
  }
}

export class ReplaceError extends ExplorerError {
  readonly code = 'replace'

  constructor(
    readonly source: string,
    readonly destination: string,
    cause: unknown,
  ) {
    super(`Cannot replace ${destination} with ${source}: ${getErrorMessage(cause)}`, cause)
  }
}

/** The OS shell could not open a file or launch an application. */
export class OpenError extends ExplorerError {
  readonly code = 'open'

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot open ${path}: ${getErrorMessage(cause)}`, cause)
  }
}

export class WatchSetupFailure extends ExplorerError {
  readonly code = 'watch-setup'

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot watch ${path}: ${getErrorMessage(cause)}`, cause)
  }
}
