export interface ParsedCommand {
  name: string;
  /** Bot username after `@`, when the command was addressed explicitly. */
  mention: string | null;
  args: string;
}

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@(\w+))?(?:\s+([\s\S]*))?$/i;

export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, name = "", mention, args] = match;
  return {
    name: name.toLowerCase(),
    mention: mention ?? null,
    args: args?.trim() ?? "",
  };
}
