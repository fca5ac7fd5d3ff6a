export interface ParsedCommand {
  command: string
  args: string[]
}

/**
 * Split message text into a lowercased command token and whitespace-separated args.
 * Empty text yields an empty command.
 */
export function parseCommandText(text: string): ParsedCommand {
  const clean = text.trim()
  if (!clean) return { command: '', args: [] }

  const match = /\s+/.exec(clean)
  if (!match) return { command: clean.toLowerCase(), args: [] }

  const command = clean.slice(0, match.index).toLowerCase()
  const rest = clean.slice(match.index + match[0].length)
  return { command, args: rest.split(/\s+/).filter(Boolean) }
}
