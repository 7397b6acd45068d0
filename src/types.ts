/**
 * A named jump target, written `%NAME%` in a script.
 * Markers never become tree nodes; they resolve to the command that follows them.
 */
export interface Marker {
  kind: 'marker';

  /** Uppercase letters and hyphens only, e.g. "START" or "GO-BACK" */
  name: string;
}

/**
 * A named instruction, written `[PREFIX ]|NAME|[ SUFFIX]`.
 */
export interface Command {
  kind: 'command';

  /** The command name between the pipes, e.g. "SAY" */
  name: string;

  /** Text before the command name (the speaker for SAY) */
  prefix?: string;

  /** Text after the command name (dialogue, choice text, jump target) */
  suffix?: string;
}

/**
 * A line is either a command or a marker.
 */
export type Line = Command | Marker;

/**
 * A `//` comment. Ignored at run time but kept so a document formats back to its source.
 */
export interface Comment {
  kind: 'comment';

  /** Everything after the `//`, verbatim (usually starts with a space) */
  text: string;
}

/**
 * One indentation level beneath the line that precedes it.
 */
export interface Block {
  kind: 'block';

  elements: Element[];
}

/**
 * Anything that can appear at a given indentation level.
 */
export type Element = Line | Comment | Block;

/**
 * A parsed script: the top-level elements in source order.
 */
export interface Document {
  elements: Element[];

  /** Whether the source text ended with a newline (formatting assumes it did when unset) */
  finalNewline?: boolean;
}

export function command(name: string, prefix?: string, suffix?: string): Command {
  const result: Command = { kind: 'command', name };
  if (prefix !== undefined) {
    result.prefix = prefix;
  }
  if (suffix !== undefined) {
    result.suffix = suffix;
  }
  return result;
}

export function marker(name: string): Marker {
  return { kind: 'marker', name };
}

export function comment(text: string): Comment {
  return { kind: 'comment', text };
}

export function block(elements: Element[]): Block {
  return { kind: 'block', elements };
}

/**
 * Structural equality: same name, prefix and suffix.
 */
export function commandsEqual(a: Command, b: Command): boolean {
  return a.name === b.name && a.prefix === b.prefix && a.suffix === b.suffix;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
