import * as fs from 'node:fs';
import * as path from 'node:path';
import { buildTree, BuiltTree } from './builder.js';
import { DialogueError } from './errors.js';
import { parseScript } from './parser.js';
import { Document } from './types.js';
import { validate, ValidationOptions } from './validator.js';

export const SCRIPT_EXTENSION = '.script';

/**
 * Options for loading script files
 */
export interface LoadOptions {
  /** Directory to scan for .script files */
  scriptDir: string;
  /** Rule policies passed to the validator */
  validation?: ValidationOptions;
}

/**
 * A script that parsed, validated and built
 */
export interface LoadedScript {
  /** File name without the extension */
  scriptId: string;
  document: Document;
  /** Shared, read-only tree every playthrough of this script runs on */
  built: BuiltTree;
  warnings: string[];
}

/**
 * Result of loading all script files
 */
export interface LoadResult {
  scripts: Map<string, LoadedScript>;
  /** Raw text of every file read, keyed by script id, including ones that failed */
  corpus: Map<string, string>;
  /** One entry per file that was left out, as `<file>: <message>` */
  errors: string[];
}

/**
 * Check if a filename is a draft (starts with _)
 */
function isDraftFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

export function scriptIdOf(filePath: string): string {
  return path.basename(filePath, SCRIPT_EXTENSION);
}

/**
 * Find all script files in a directory (non-recursive), sorted by name
 */
function findScriptFiles(dir: string): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith(SCRIPT_EXTENSION) && !isDraftFile(entry.name))
    .map(entry => path.join(dir, entry.name))
    .sort();
}

/**
 * Parse, validate and build one script's text.
 */
export function compileScript(scriptId: string, content: string, validation: ValidationOptions = {}): LoadedScript {
  const document = parseScript(content);
  const { warnings } = validate(document, validation);
  return { scriptId, document, built: buildTree(document), warnings };
}

/**
 * Load every script in a directory. A file that fails is reported in `errors` and left out;
 * the others still load.
 */
export function loadScripts(options: LoadOptions): LoadResult {
  const { scriptDir, validation = {} } = options;

  const scripts = new Map<string, LoadedScript>();
  const corpus = new Map<string, string>();
  const errors: string[] = [];

  let files: string[];
  try {
    files = findScriptFiles(scriptDir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    errors.push(`${scriptDir}: Cannot read script directory: ${reason}`);
    return { scripts, corpus, errors };
  }

  for (const filePath of files) {
    const fileName = path.basename(filePath);
    const scriptId = scriptIdOf(filePath);

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      errors.push(`${fileName}: Failed to read: ${reason}`);
      continue;
    }
    corpus.set(scriptId, content);

    try {
      scripts.set(scriptId, compileScript(scriptId, content, validation));
    } catch (err) {
      if (!(err instanceof DialogueError)) {
        throw err;
      }
      errors.push(`${fileName}: ${err.message}`);
    }
  }

  return { scripts, corpus, errors };
}
