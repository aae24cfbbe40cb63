import { commandHandlers, type CommandHandlers, type HostCommand, type HostCommands } from '@/host/commands'

import { normalizeError } from './error'

export type { HostCommand, HostCommands }

export const invoke = async <K extends HostCommand>(
  cmd: K,
  args: HostCommands[K]['args'],
): Promise<HostCommands[K]['result']> => {
  const handler: CommandHandlers[K] = commandHandlers[cmd]
  try {
    return await handler(args)
  } catch (error) {
    throw normalizeError(error)
  }
}
