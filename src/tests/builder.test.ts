import * as test from 'node:test';
import * as assert from 'node:assert';
import { buildTree } from '../builder.js';
import { BuildFailure } from '../errors.js';
import { parseScript } from '../parser.js';

const { describe, it } = test;

const YES_NO = `%START%
A |SAY| "hi"
|CHOICE| "yes"
    B |SAY| "ok"
|CHOICE| "no"
    B |SAY| "not ok"
%END%
`;

describe('buildTree', () => {

  it('should store every command as a node in document order', () => {
    const { tree, first } = buildTree(parseScript(YES_NO));

    assert.strictEqual(tree.size, 5);
    assert.strictEqual(first, 0);
    assert.deepStrictEqual(
      Array.from(tree.entries()).map(entry => entry.data.suffix),
      ['"hi"', '"yes"', '"ok"', '"no"', '"not ok"']
    );
  });

  it('should hang a block beneath the command before it', () => {
    const { tree } = buildTree(parseScript(YES_NO));

    assert.deepStrictEqual(tree.childrenOf(1), [2]);
    assert.deepStrictEqual(tree.childrenOf(3), [4]);
    assert.strictEqual(tree.parentOf(4), 3);
    assert.strictEqual(tree.nextSiblingOf(1), 3);
  });

  it('should bind markers to the next command and a trailing marker to null', () => {
    const { markers } = buildTree(parseScript(YES_NO));

    assert.deepStrictEqual(Array.from(markers.entries()), [['START', 0], ['END', null]]);
  });

  it('should not nest a block that follows a marker', () => {
    const { tree, markers } = buildTree(parseScript('%START%\n    |SAY| a\n|SAY| b\n%END%\n'));

    assert.strictEqual(markers.get('START'), 0);
    assert.strictEqual(tree.parentOf(0), undefined);
    assert.strictEqual(tree.nextSiblingOf(0), 1);
  });

  it('should bind a marker inside a block to the command after it', () => {
    const { tree, markers } = buildTree(parseScript('|SAY| a\n    %INNER%\n    |SAY| b\n'));

    assert.strictEqual(markers.get('INNER'), 1);
    assert.strictEqual(tree.parentOf(1), 0);
  });

  it('should carry a marker at the end of a block to the next command outside it', () => {
    const { markers } = buildTree(parseScript('|SAY| a\n    |SAY| b\n    %NEXT%\n|SAY| c\n'));

    assert.strictEqual(markers.get('NEXT'), 2);
  });

  it('should ignore comments', () => {
    const { tree } = buildTree(parseScript('// one\n|SAY| a\n// two\n|SAY| b\n'));

    assert.strictEqual(tree.size, 2);
    assert.strictEqual(tree.nextSiblingOf(0), 1);
  });

  it('should build nothing from an empty document', () => {
    const { tree, markers, first } = buildTree({ elements: [] });

    assert.strictEqual(tree.size, 0);
    assert.strictEqual(markers.size, 0);
    assert.strictEqual(first, undefined);
  });

  it('should reject a marker directly after another marker', () => {
    assert.throws(
      () => buildTree(parseScript('%A%\n%B%\n|SAY| x\n')),
      (err: unknown) => err instanceof BuildFailure
        && err.message === 'Marker %B% directly follows %A% with no command between them'
    );
  });
});
