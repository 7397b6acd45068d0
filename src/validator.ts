import {
  CHOICE_COMMAND,
  END_MARKER,
  GOTO_COMMAND,
  IF_COMMAND,
  SAY_COMMAND,
  SET_COMMAND,
  START_MARKER,
  TRIGGER_COMMAND,
  isValidMarkerName,
  jumpTarget
} from './commands.js';
import { DialogueError, ValidationFailure } from './errors.js';
import { formatLine, parseScript } from './parser.js';
import { Command, Document, Element, Line, assertNever } from './types.js';

/**
 * How to treat a rule that may be relaxed
 */
export type RuleSeverity = 'allow' | 'warn' | 'deny';

export interface ValidationOptions {
  /** Commands outside the built-in vocabulary (default: deny) */
  unknownCommands?: RuleSeverity;
  /** A top-level block that follows a marker instead of a command (default: allow) */
  topLevelBlock?: RuleSeverity;
}

export interface ValidationResult {
  /** Messages for rules set to "warn" */
  warnings: string[];
}

/**
 * Outcome of checking a script without throwing
 */
export interface CheckResult {
  ok: boolean;
  error?: string;
  rule?: string;
  warnings: string[];
}

const SEVERITIES: readonly string[] = ['allow', 'warn', 'deny'];

export function isRuleSeverity(value: unknown): value is RuleSeverity {
  return typeof value === 'string' && SEVERITIES.includes(value);
}

export const DEFAULT_VALIDATION_OPTIONS: Required<ValidationOptions> = {
  unknownCommands: 'deny',
  topLevelBlock: 'allow'
};

interface ValidationContext {
  options: Required<ValidationOptions>;
  warnings: string[];
  /** Every marker declared anywhere in the document */
  declared: Set<string>;
  /** Markers seen so far during the walk */
  seen: Set<string>;
  /** Last marker not yet followed by a command, carried across block boundaries like the builder does */
  pendingMarker: string | null;
}

function fail(rule: string, message: string): never {
  throw new ValidationFailure(message, rule);
}

function applySeverity(context: ValidationContext, severity: RuleSeverity, rule: string, message: string): void {
  switch (severity) {
    case 'allow':
      return;
    case 'warn':
      console.warn(`[validate] ${message}`);
      context.warnings.push(message);
      return;
    case 'deny':
      fail(rule, message);
    default:
      assertNever(severity);
  }
}

/**
 * Elements with comments removed; comments are allowed anywhere and never affect structure.
 */
function significant(elements: Element[]): Element[] {
  return elements.filter(element => element.kind !== 'comment');
}

/**
 * Every marker and command in document order, blocks flattened.
 */
function* linesInOrder(elements: Element[]): Generator<Line> {
  for (const element of elements) {
    if (element.kind === 'block') {
      yield* linesInOrder(element.elements);
    } else if (element.kind !== 'comment') {
      yield element;
    }
  }
}

function collectMarkers(elements: Element[], into: Set<string>): void {
  for (const element of elements) {
    if (element.kind === 'marker') {
      into.add(element.name);
    } else if (element.kind === 'block') {
      collectMarkers(element.elements, into);
    }
  }
}

function checkCommand(context: ValidationContext, cmd: Command, hasBlock: boolean, followedBy: Element | undefined): void {
  const text = formatLine(cmd);

  switch (cmd.name) {
    case SAY_COMMAND:
      if (cmd.suffix === undefined) {
        fail('say-without-text', `SAY command must have text: ${text}`);
      }
      return;

    case CHOICE_COMMAND:
      if (cmd.suffix === undefined) {
        fail('choice-without-text', `CHOICE command must have text: ${text}`);
      }
      if (cmd.prefix !== undefined) {
        fail('choice-with-prefix', `The CHOICE command doesn't allow a prefix, but one was found: ${text}`);
      }
      if (!hasBlock) {
        fail('choice-without-block', `A CHOICE must be followed by an indented block: ${text}`);
      }
      return;

    case GOTO_COMMAND: {
      if (cmd.prefix !== undefined) {
        fail('goto-with-prefix', `The GOTO command doesn't allow a prefix, but one was found: ${text}`);
      }
      if (cmd.suffix === undefined) {
        fail('goto-without-target', `The GOTO command requires a marker, but none was found: ${text}`);
      }
      const target = jumpTarget(cmd);
      if (target === undefined || !isValidMarkerName(target)) {
        fail('goto-invalid-target', `The GOTO command requires a valid marker name, but ${cmd.suffix} was found`);
      }
      if (!context.declared.has(target)) {
        fail('goto-unknown-target', `The GOTO command points at %${target}%, which is never declared`);
      }
      if (hasBlock || (followedBy !== undefined && followedBy.kind !== 'marker')) {
        fail('unreachable-after-goto', `Lines after a GOTO command in the same block are unreachable: ${text}`);
      }
      return;
    }

    case SET_COMMAND:
      if (cmd.suffix === undefined) {
        fail('set-without-text', `SET command must have an assignment: ${text}`);
      }
      return;

    case IF_COMMAND:
      if (cmd.suffix === undefined) {
        fail('if-without-text', `IF command must have a condition: ${text}`);
      }
      return;

    case TRIGGER_COMMAND:
      if (cmd.prefix !== undefined) {
        fail('trigger-with-prefix', `The TRIGGER command doesn't allow a prefix, but one was found: ${text}`);
      }
      if (cmd.suffix === undefined) {
        fail('trigger-without-text', `The TRIGGER command requires an event name: ${text}`);
      }
      return;

    default:
      applySeverity(context, context.options.unknownCommands, 'unknown-command', `Unknown command: ${cmd.name}`);
  }
}

function checkElements(context: ValidationContext, elements: Element[], topLevel: boolean): void {
  const items = significant(elements);

  for (let i = 0; i < items.length; i++) {
    const element = items[i];
    const next = items[i + 1];

    switch (element.kind) {
      case 'command': {
        const hasBlock = next?.kind === 'block';
        const followedBy = hasBlock ? items[i + 2] : next;
        checkCommand(context, element, hasBlock, followedBy);
        context.pendingMarker = null;
        break;
      }
      case 'marker':
        if (context.seen.has(element.name)) {
          fail('duplicate-marker', `Marker %${element.name}% shouldn't be declared more than once`);
        }
        context.seen.add(element.name);
        if (context.pendingMarker !== null) {
          fail(
            'consecutive-markers',
            `Marker %${element.name}% directly follows %${context.pendingMarker}%; a command must come between them`
          );
        }
        context.pendingMarker = element.name;
        break;
      case 'block': {
        const previous = items[i - 1];
        if (topLevel && previous?.kind === 'marker') {
          applySeverity(
            context,
            context.options.topLevelBlock,
            'top-level-block',
            `Top-level block after marker %${previous.name}%`
          );
        }
        checkElements(context, element.elements, false);
        break;
      }
      case 'comment':
        break;
      default:
        assertNever(element);
    }
  }
}

/**
 * Check the structure of a parsed script. Throws a ValidationFailure naming the first
 * broken rule; rules relaxed to "warn" are logged and returned instead.
 */
export function validate(document: Document, options: ValidationOptions = {}): ValidationResult {
  const context: ValidationContext = {
    options: { ...DEFAULT_VALIDATION_OPTIONS, ...options },
    warnings: [],
    declared: new Set(),
    seen: new Set(),
    pendingMarker: null
  };

  const items = significant(document.elements);
  const first = items[0];

  if (!first) {
    fail('empty-script', `Script is empty. Valid scripts must have ${START_MARKER} and ${END_MARKER} markers, and at least one command.`);
  }
  if (first.kind === 'marker' && first.name !== START_MARKER) {
    fail('marker-before-start', `Marker %${first.name}% shouldn't be declared before the ${START_MARKER} marker.`);
  }
  if (first.kind !== 'marker') {
    fail('missing-start', `Script must start with a %${START_MARKER}% marker.`);
  }

  const [, afterStart] = linesInOrder(document.elements);
  if (afterStart === undefined || afterStart.kind === 'marker') {
    fail('empty-start', `The ${START_MARKER} marker should be followed by at least one command.`);
  }

  const last = items[items.length - 1];
  collectMarkers(document.elements, context.declared);
  if (!context.declared.has(END_MARKER)) {
    fail('missing-end', `Script must end with a %${END_MARKER}% marker.`);
  }
  if (last.kind !== 'marker' || last.name !== END_MARKER) {
    fail('end-not-last', `The %${END_MARKER}% marker must be the last line of the script.`);
  }

  checkElements(context, document.elements, true);

  return { warnings: context.warnings };
}

/**
 * Like validate, but reports the outcome instead of throwing.
 */
export function checkScript(document: Document, options: ValidationOptions = {}): CheckResult {
  try {
    const { warnings } = validate(document, options);
    return { ok: true, warnings };
  } catch (err) {
    if (err instanceof ValidationFailure) {
      return { ok: false, error: err.message, rule: err.rule, warnings: [] };
    }
    if (err instanceof DialogueError) {
      return { ok: false, error: err.message, warnings: [] };
    }
    throw err;
  }
}

/**
 * Parse and check script text; a parse error is reported the same way as a broken rule.
 */
export function checkSource(source: string, options: ValidationOptions = {}): CheckResult {
  try {
    return checkScript(parseScript(source), options);
  } catch (err) {
    if (err instanceof DialogueError) {
      return { ok: false, error: err.message, warnings: [] };
    }
    throw err;
  }
}
