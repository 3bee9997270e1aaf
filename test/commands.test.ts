import { describe, expect, it } from 'vitest';
import { STATUS_BUTTON_LABEL, helpText, parseCommand } from '../src/router/commands.js';

describe('parseCommand', () => {
  it('parses known slash commands', () => {
    expect(parseCommand('/status')).toBe('status');
    expect(parseCommand('/HELP me')).toBe('help');
    expect(parseCommand('/start@homework_status_bot')).toBe('start');
  });

  it('treats the keyboard button text as the status command', () => {
    expect(parseCommand(STATUS_BUTTON_LABEL)).toBe('status');
    expect(parseCommand('  check HOMEWORK status ')).toBe('status');
  });

  it('returns null for unknown commands or non-commands', () => {
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand('/unknown value')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('helpText', () => {
  it('lists the status command and the button', () => {
    const lines = helpText().split('\n');
    expect(lines).toContain('/status - check the latest homework status now');
    expect(lines).toContain('Or press "Check homework status".');
  });
});
