export * from './types.js';
export * from './errors.js';
export * from './commands.js';
export { INDENT, parseLine, parseScript, formatCommand, formatLine, formatScript } from './parser.js';
export { ArenaTree } from './tree.js';
export type { NodeId, TreeEntry } from './tree.js';
export { buildTree } from './builder.js';
export type { BuiltTree, MarkerTable } from './builder.js';
export { DialogueEngine } from './engine.js';
export type { ChoiceSource, ExecutionState, Tick } from './engine.js';
export { DEFAULT_VALIDATION_OPTIONS, checkScript, checkSource, isRuleSeverity, validate } from './validator.js';
export type { CheckResult, RuleSeverity, ValidationOptions, ValidationResult } from './validator.js';
export { formatPresentedLine, presentChoices, presentCommand, renderInline } from './renderer.js';
export type {
  ChoiceLine,
  JumpLine,
  OtherCommandLine,
  PresentedChoice,
  PresentedLine,
  SpeechLine
} from './renderer.js';
export { compileScript, loadScripts, scriptIdOf, SCRIPT_EXTENSION } from './loader.js';
export type { LoadOptions, LoadResult, LoadedScript } from './loader.js';
export { Session, SessionStore } from './session.js';
export type { SessionView, StepResult } from './session.js';
export { createApp } from './app.js';
export type { AppOptions } from './app.js';
