import { isDropContainer } from '../helpers/dropTargetHitTest'
import type { DirectoryEntry, DropSite, Point } from '../model/types'
import { baseName, joinPath } from '../utils'

export type DestinationContext = {
  currentDirectory: () => string
  resolveTarget: (location: Point) => DirectoryEntry | null
}

/** Folder a drop lands in: a plain directory under the pointer, else the folder on display. */
export const destinationDirectory = (site: DropSite, ctx: DestinationContext) => {
  if (site.type === 'entry') {
    return isDropContainer(site.entry) ? site.entry.path : ctx.currentDirectory()
  }
  const target = site.location ? ctx.resolveTarget(site.location) : null
  return target ? target.path : ctx.currentDirectory()
}

export const resolveDestination = (source: string, site: DropSite, ctx: DestinationContext) =>
  joinPath(destinationDirectory(site, ctx), baseName(source))
