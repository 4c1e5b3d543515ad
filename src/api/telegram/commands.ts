export const COMMANDS = ['start', 'help', 'diary', 'weekly'] as const

export type Command = (typeof COMMANDS)[number]

function isCommand(name: string): name is Command {
  return COMMANDS.some((c) => c === name)
}

/**
 * "/diary", "/Diary@SomeBot" and "/diary today" → "diary". Anything that is not a known slash command → null.
 */
export function parseCommand(text: string): Command | null {
  const match = /^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim())
  if (!match) return null
  const name = match[1].toLowerCase()
  return isCommand(name) ? name : null
}
