/**
 * check.ts - Parses and validates a dialogue script, optionally rewriting it in canonical form
 *
 * Usage: npm run check -- <file.script> [--fix]
 * With --fix: overwrites the file, saves original as .script.old
 */

import * as fs from 'fs';
import { DialogueError } from '../src/errors.js';
import { formatScript, parseScript } from '../src/parser.js';
import { validate } from '../src/validator.js';

function main() {
    const args = process.argv.slice(2);
    const fix = args.includes('--fix');
    const files = args.filter(arg => arg !== '--fix');

    if (files.length !== 1) {
        console.error('Usage: npm run check -- <file.script> [--fix]');
        process.exit(1);
    }

    const inputFile = files[0];

    if (!fs.existsSync(inputFile)) {
        console.error(`File not found: ${inputFile}`);
        process.exit(1);
    }

    if (!inputFile.endsWith('.script')) {
        console.error('File must be a .script file');
        process.exit(1);
    }

    const originalContent = fs.readFileSync(inputFile, 'utf-8');

    let formatted: string;
    try {
        const document = parseScript(originalContent);
        const { warnings } = validate(document, { unknownCommands: 'warn', topLevelBlock: 'warn' });
        formatted = formatScript(document);
        console.log(`${inputFile}: OK (${warnings.length} warning(s))`);
    } catch (err) {
        if (err instanceof DialogueError) {
            console.error(`${inputFile}: ${err.message}`);
            process.exit(1);
        }
        throw err;
    }

    if (!fix) {
        return;
    }

    if (formatted === originalContent) {
        console.log('Already in canonical form');
        return;
    }

    // Rename original to .script.old
    const oldFile = inputFile.replace(/\.script$/, '.script.old');
    fs.renameSync(inputFile, oldFile);
    console.log(`Original saved as: ${oldFile}`);

    fs.writeFileSync(inputFile, formatted, 'utf-8');
    console.log(`Formatted file written: ${inputFile}`);
}

main();
