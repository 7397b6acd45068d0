import { Command } from './types.js';

export const SAY_COMMAND = 'SAY';
export const CHOICE_COMMAND = 'CHOICE';
export const GOTO_COMMAND = 'GOTO';

// Reserved for conditionals, variables and host events; recognized but not executed.
export const IF_COMMAND = 'IF';
export const SET_COMMAND = 'SET';
export const TRIGGER_COMMAND = 'TRIGGER';

export const BUILTIN_COMMANDS: readonly string[] = [
  SAY_COMMAND,
  CHOICE_COMMAND,
  GOTO_COMMAND,
  IF_COMMAND,
  SET_COMMAND,
  TRIGGER_COMMAND
];

export const START_MARKER = 'START';
export const END_MARKER = 'END';

const MARKER_NAME_PATTERN = /^[A-Z-]+$/;

// Matches a jump target written either as "%NAME%" or as a bare "NAME"
const JUMP_TARGET_PATTERN = /^%?([A-Z-]+)%?$/;

export function isValidMarkerName(name: string): boolean {
  return MARKER_NAME_PATTERN.test(name);
}

export function isBuiltinCommand(name: string): boolean {
  return BUILTIN_COMMANDS.includes(name);
}

export function isChoice(command: Command): boolean {
  return command.name === CHOICE_COMMAND;
}

export function isJump(command: Command): boolean {
  return command.name === GOTO_COMMAND;
}

/**
 * The marker a GOTO points at, or undefined when the suffix is missing or malformed.
 * Delimiters must be balanced: "%NAME%" and "NAME" are accepted, "%NAME" is not.
 */
export function jumpTarget(command: Command): string | undefined {
  const suffix = command.suffix;
  if (suffix === undefined) return undefined;

  const match = suffix.match(JUMP_TARGET_PATTERN);
  if (!match) return undefined;

  const opened = suffix.startsWith('%');
  const closed = suffix.endsWith('%');
  if (opened !== closed) return undefined;

  return match[1];
}
