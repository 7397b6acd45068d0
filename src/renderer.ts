import { Marked } from 'marked';
import { CHOICE_COMMAND, GOTO_COMMAND, SAY_COMMAND, jumpTarget } from './commands.js';
import { Command, assertNever } from './types.js';

export interface SpeechLine {
  kind: 'speech';
  speaker?: string;
  text: string;
  /** `text` rendered as inline Markdown */
  html: string;
}

export interface ChoiceLine {
  kind: 'choice';
  text: string;
  html: string;
}

export interface JumpLine {
  kind: 'jump';
  /** Marker name without the percent delimiters */
  target: string;
}

/** Any command without a dedicated presentation (IF, SET, TRIGGER, custom names) */
export interface OtherCommandLine {
  kind: 'command';
  name: string;
  prefix?: string;
  suffix?: string;
}

/**
 * A command prepared for display
 */
export type PresentedLine = SpeechLine | ChoiceLine | JumpLine | OtherCommandLine;

/**
 * A numbered option of a pending choice
 */
export interface PresentedChoice {
  index: number;
  text: string;
  html: string;
}

// Raw HTML is never recognised as a tag, so marked escapes it like any other text
const inline = new Marked({
  gfm: true,
  breaks: false,
  tokenizer: {
    tag() {
      return undefined;
    }
  }
});

/**
 * Render dialogue text as inline Markdown (emphasis, code spans, links).
 */
export function renderInline(text: string): string {
  const html = inline.parseInline(text);
  if (typeof html !== 'string') {
    throw new Error('marked returned a promise; async extensions are not supported here');
  }
  return html;
}

export function presentCommand(command: Command): PresentedLine {
  const text = command.suffix ?? '';

  switch (command.name) {
    case SAY_COMMAND: {
      const line: SpeechLine = { kind: 'speech', text, html: renderInline(text) };
      if (command.prefix !== undefined) {
        line.speaker = command.prefix;
      }
      return line;
    }
    case CHOICE_COMMAND:
      return { kind: 'choice', text, html: renderInline(text) };
    case GOTO_COMMAND:
      return { kind: 'jump', target: jumpTarget(command) ?? text };
    default: {
      const line: OtherCommandLine = { kind: 'command', name: command.name };
      if (command.prefix !== undefined) {
        line.prefix = command.prefix;
      }
      if (command.suffix !== undefined) {
        line.suffix = command.suffix;
      }
      return line;
    }
  }
}

export function presentChoices(options: Command[]): PresentedChoice[] {
  return options.map((option, index) => {
    const text = option.suffix ?? '';
    return { index, text, html: renderInline(text) };
  });
}

/**
 * Plain-text form for terminals and logs
 */
export function formatPresentedLine(line: PresentedLine): string {
  switch (line.kind) {
    case 'speech':
      return line.speaker !== undefined ? `${line.speaker}:\t${line.text}` : line.text;
    case 'choice':
      return `> ${line.text}`;
    case 'jump':
      return `-> ${line.target}`;
    case 'command': {
      const parts = [line.prefix, `|${line.name}|`, line.suffix].filter((part): part is string => part !== undefined);
      return parts.join(' ');
    }
    default:
      return assertNever(line);
  }
}
