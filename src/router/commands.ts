export type CommandName = 'start' | 'help' | 'status';

export const STATUS_BUTTON_LABEL = 'Check homework status';

export const STATUS_KEYBOARD: string[][] = [[STATUS_BUTTON_LABEL]];

const COMMANDS = new Set<string>(['start', 'help', 'status']);

function isCommandName(value: string): value is CommandName {
  return COMMANDS.has(value);
}

/**
 * Parses `/name args...` (an `@botname` suffix on the name is ignored; the
 * arguments are too) and the status keyboard button, which arrives as plain
 * text.
 */
export function parseCommand(input: string): CommandName | null {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === STATUS_BUTTON_LABEL.toLowerCase()) {
    return 'status';
  }

  if (!trimmed.startsWith('/')) {
    return null;
  }

  const withoutSlash = trimmed.slice(1).trim();
  if (withoutSlash.length === 0) {
    return null;
  }

  const [nameRaw] = withoutSlash.split(/\s+/g);
  if (!nameRaw) {
    return null;
  }

  const name = nameRaw.split('@')[0]?.toLowerCase() ?? '';
  if (!isCommandName(name)) {
    return null;
  }

  return name;
}

export function helpText(): string {
  return [
    'I watch your homework review status and message you when it changes.',
    'Commands:',
    '/status - check the latest homework status now',
    '/help - show this help',
    `Or press "${STATUS_BUTTON_LABEL}".`,
  ].join('\n');
}

export function promptText(): string {
  return `Press "${STATUS_BUTTON_LABEL}" to check your homework status.`;
}
