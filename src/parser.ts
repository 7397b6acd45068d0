import { ParseFailure } from './errors.js';
import {
  Block,
  Command,
  Comment,
  Document,
  Element,
  Line,
  assertNever,
  block,
  command,
  comment,
  marker
} from './types.js';

/**
 * Regex patterns for parsing script lines
 */

export const INDENT = '    ';

// Leading indentation and the rest of the line
// Group 1: leading whitespace (spaces, possibly tabs)
// Group 2: the line body
const INDENT_PATTERN = /^([ \t]*)(.*)$/;

// Matches a comment line: "// anything"
// Group 1: everything after the slashes, verbatim
const COMMENT_PATTERN = /^\/\/(.*)$/;

// Matches a marker line: "%START%", "%GO-BACK%"
// Group 1: the marker name (validated separately for a precise error)
const MARKER_PATTERN = /^%([^%]*)%$/;

// Command names are ALL-CAPS-KEBAB-CASE
const COMMAND_NAME_PATTERN = /^[A-Z-]+$/;

const MARKER_NAME_PATTERN = /^[A-Z-]+$/;

// Text before the command name, then exactly one space: "OLD MAN |SAY|"
// Group 1: the prefix
const PREFIX_PATTERN = /^(\S(?:.*\S)?) $/;

// Exactly one space after the command name, then text: "|SAY| Hello"
// Group 1: the suffix
const SUFFIX_PATTERN = /^ (\S(?:.*\S)?)$/;

/**
 * Parse the body of a single line (indentation already removed).
 * Returns an error reason instead of throwing so the caller can attach the line number.
 */
function parseBody(body: string): Line | Comment | { error: string } {
  const commentMatch = body.match(COMMENT_PATTERN);
  if (commentMatch) {
    return comment(commentMatch[1]);
  }

  if (body !== body.trimEnd()) {
    return { error: 'Lines may not end with whitespace' };
  }

  const markerMatch = body.match(MARKER_PATTERN);
  if (markerMatch) {
    const name = markerMatch[1];
    if (!MARKER_NAME_PATTERN.test(name)) {
      return { error: 'Marker names may only contain uppercase letters and hyphens' };
    }
    return marker(name);
  }

  const parts = body.split('|');
  if (parts.length === 1) {
    return { error: 'Expected a command, marker or comment' };
  }
  if (parts.length !== 3) {
    return { error: 'Lines may only contain "|" around the command name' };
  }

  const [rawPrefix, name, rawSuffix] = parts;
  if (!COMMAND_NAME_PATTERN.test(name)) {
    return { error: 'Command names may only contain uppercase letters and hyphens' };
  }

  const prefixMatch = rawPrefix.match(PREFIX_PATTERN);
  if (rawPrefix !== '' && !prefixMatch) {
    return { error: 'Expected exactly one space between the prefix and the command name' };
  }
  const suffixMatch = rawSuffix.match(SUFFIX_PATTERN);
  if (rawSuffix !== '' && !suffixMatch) {
    return { error: 'Expected exactly one space between the command name and the text after it' };
  }

  return command(name, prefixMatch?.[1], suffixMatch?.[1]);
}

/**
 * Parse a single line into a command, marker or comment. Surrounding whitespace is ignored;
 * spacing inside the line must be canonical.
 */
export function parseLine(text: string, lineNumber = 1): Line | Comment {
  const result = parseBody(text.trim());
  if ('error' in result) {
    throw new ParseFailure(result.error, lineNumber, text);
  }
  return result;
}

/**
 * Parse script text into a document.
 *
 * Each 4-space indentation step opens a block beneath the previous line; dedenting closes
 * blocks back to the matching level. Blank lines are dropped. Any malformed line fails the
 * whole parse.
 */
export function parseScript(content: string): Document {
  // Normalize line endings (handle Windows \r\n)
  const normalized = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  const lines = normalized.split('\n');

  const elements: Element[] = [];

  // Element list for each open indentation level; index = level
  const levels: Element[][] = [elements];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNum = i + 1;

    if (line.trim() === '') {
      continue;
    }

    const [, indentation, body] = line.match(INDENT_PATTERN) ?? ['', '', line];

    if (indentation.includes('\t')) {
      throw new ParseFailure('Indentation must use spaces, not tabs', lineNum, line);
    }
    if (indentation.length % INDENT.length !== 0) {
      throw new ParseFailure(`Indentation must be a multiple of ${INDENT.length} spaces`, lineNum, line);
    }

    const level = indentation.length / INDENT.length;
    const depth = levels.length - 1;

    if (level > depth + 1) {
      throw new ParseFailure('Indentation may only increase by one level at a time', lineNum, line);
    }

    if (level === depth + 1) {
      const enclosing = levels[depth];
      if (enclosing.length === 0) {
        throw new ParseFailure('Indented line has no line above it to nest under', lineNum, line);
      }
      const opened: Block = block([]);
      enclosing.push(opened);
      levels.push(opened.elements);
    } else {
      // Close any blocks deeper than this line
      levels.length = level + 1;
    }

    const parsed = parseBody(body);
    if ('error' in parsed) {
      throw new ParseFailure(parsed.error, lineNum, line);
    }
    levels[level].push(parsed);
  }

  return { elements, finalNewline: normalized.endsWith('\n') };
}

/**
 * Format a command as `[PREFIX ]|NAME|[ SUFFIX]`
 */
export function formatCommand(cmd: Command): string {
  let text = `|${cmd.name}|`;
  if (cmd.prefix !== undefined) {
    text = `${cmd.prefix} ${text}`;
  }
  if (cmd.suffix !== undefined) {
    text = `${text} ${cmd.suffix}`;
  }
  return text;
}

export function formatLine(line: Line | Comment): string {
  switch (line.kind) {
    case 'command':
      return formatCommand(line);
    case 'marker':
      return `%${line.name}%`;
    case 'comment':
      return `//${line.text}`;
    default:
      return assertNever(line);
  }
}

function formatElements(elements: Element[], level: number, out: string[]): void {
  for (const element of elements) {
    if (element.kind === 'block') {
      formatElements(element.elements, level + 1, out);
    } else {
      out.push(INDENT.repeat(level) + formatLine(element));
    }
  }
}

/**
 * Format a document back to script text. Parsing a script with LF endings and no blank
 * lines, then formatting the result, reproduces the input exactly.
 */
export function formatScript(document: Document): string {
  const out: string[] = [];
  formatElements(document.elements, 0, out);
  if (out.length === 0) {
    return '';
  }
  const trailer = document.finalNewline === false ? '' : '\n';
  return out.join('\n') + trailer;
}
