import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseLine } from '../parser.js';
import { command, commandsEqual } from '../types.js';

const { describe, it } = test;

describe('command', () => {

  it('should leave out an absent prefix and suffix', () => {
    assert.deepStrictEqual(command('CHOICE'), { kind: 'command', name: 'CHOICE' });
    assert.strictEqual('prefix' in command('SAY', undefined, 'hi'), false);
  });
});

describe('commandsEqual', () => {

  it('should match commands with the same name, prefix and suffix', () => {
    assert.strictEqual(commandsEqual(command('SAY', 'GUARD', 'Halt!'), command('SAY', 'GUARD', 'Halt!')), true);
    assert.strictEqual(commandsEqual(command('CHOICE'), command('CHOICE')), true);
  });

  it('should tell apart different names', () => {
    assert.strictEqual(commandsEqual(command('SAY', undefined, 'x'), command('SET', undefined, 'x')), false);
  });

  it('should tell apart different prefixes', () => {
    assert.strictEqual(commandsEqual(command('SAY', 'GUARD', 'Halt!'), command('SAY', 'KING', 'Halt!')), false);
    assert.strictEqual(commandsEqual(command('SAY', 'GUARD', 'Halt!'), command('SAY', undefined, 'Halt!')), false);
  });

  it('should tell apart different suffixes', () => {
    assert.strictEqual(commandsEqual(command('SAY', 'GUARD', 'Halt!'), command('SAY', 'GUARD', 'Halt?')), false);
    assert.strictEqual(commandsEqual(command('GOTO', undefined, '%END%'), command('GOTO')), false);
  });

  it('should not treat an empty prefix or suffix as absent', () => {
    assert.strictEqual(commandsEqual(command('SAY', '', 'x'), command('SAY', undefined, 'x')), false);
    assert.strictEqual(commandsEqual(command('SAY', undefined, ''), command('SAY')), false);
  });

  it('should match a parsed line against the command it spells', () => {
    const parsed = parseLine('OLD MAN |SAY| Mind the gap.');

    assert.strictEqual(parsed.kind, 'command');
    if (parsed.kind === 'command') {
      assert.strictEqual(commandsEqual(parsed, command('SAY', 'OLD MAN', 'Mind the gap.')), true);
    }
  });
});
