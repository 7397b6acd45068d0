import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { NotFound, UnknownMarker } from '../errors.js';
import { compileScript, LoadedScript } from '../loader.js';
import { SessionStore } from '../session.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

function loadTavern(): LoadedScript {
  const content = fs.readFileSync(path.join(__dirname, 'fixtures', 'tavern.script'), 'utf-8');
  return compileScript('tavern', content);
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `session-${++n}`;
}

describe('Session', () => {

  it('should play the tavern through the first option, following jumps', () => {
    const store = new SessionStore(sequentialIds());
    const session = store.create(loadTavern());

    assert.deepStrictEqual(session.step(), {
      step: 0,
      lines: [{
        kind: 'speech',
        speaker: 'BARKEEP',
        text: 'Welcome to the *Rusty Anchor*.',
        html: 'Welcome to the <em>Rusty Anchor</em>.'
      }],
      choices: [],
      finished: false
    });

    assert.deepStrictEqual(session.step(), {
      step: 1,
      lines: [{ kind: 'choice', text: 'Order a drink', html: 'Order a drink' }],
      choices: [
        { index: 0, text: 'Order a drink', html: 'Order a drink' },
        { index: 1, text: 'Ask about rumours', html: 'Ask about rumours' }
      ],
      finished: false
    });

    assert.deepStrictEqual(session.choose(0), {
      sessionId: 'session-1',
      scriptId: 'tavern',
      finished: false,
      choices: [],
      step: 2
    });

    assert.deepStrictEqual(session.step().lines, [
      { kind: 'speech', speaker: 'BARKEEP', text: 'One ale, coming up.', html: 'One ale, coming up.' }
    ]);
    assert.deepStrictEqual(session.step(), {
      step: 3,
      lines: [{ kind: 'jump', target: 'PAY' }],
      choices: [],
      finished: false
    });
    assert.deepStrictEqual(session.step().lines, [
      { kind: 'speech', speaker: 'BARKEEP', text: 'Two coins, please.', html: 'Two coins, please.' }
    ]);
    assert.deepStrictEqual(session.step(), {
      step: 5,
      lines: [{ kind: 'jump', target: 'END' }],
      choices: [],
      finished: true
    });
    assert.deepStrictEqual(session.step(), { step: 6, lines: [], choices: [], finished: true });
  });

  it('should continue after the choice group on the second option', () => {
    const session = new SessionStore(sequentialIds()).create(loadTavern());
    session.step();
    session.step();
    session.choose(1);

    const texts: string[] = [];
    while (!session.finished) {
      for (const line of session.step().lines) {
        texts.push(line.kind === 'speech' ? line.text : line.kind);
      }
    }

    assert.deepStrictEqual(texts, [
      'Folk say the old mill is haunted.',
      'You sit down by the fire.',
      'Two coins, please.',
      'jump'
    ]);
  });

  it('should jump to a marker on request', () => {
    const session = new SessionStore(sequentialIds()).create(loadTavern());

    assert.strictEqual(session.goto('PAY').step, 0);
    assert.strictEqual(session.step().lines[0].kind, 'speech');
    assert.throws(() => session.goto('CELLAR'), UnknownMarker);
  });

  it('should share one built script between sessions', () => {
    const store = new SessionStore(sequentialIds());
    const script = loadTavern();
    const first = store.create(script);
    const second = store.create(script);

    first.step();
    first.step();

    assert.strictEqual(first.view().choices.length, 2);
    assert.strictEqual(second.view().step, 0);
    assert.deepStrictEqual(second.view().choices, []);
  });
});

describe('SessionStore', () => {

  it('should hand out ids from its generator', () => {
    const store = new SessionStore(sequentialIds());
    const script = loadTavern();

    assert.strictEqual(store.create(script).sessionId, 'session-1');
    assert.strictEqual(store.create(script).sessionId, 'session-2');
    assert.strictEqual(store.size, 2);
    assert.strictEqual(store.get('session-2').scriptId, 'tavern');
  });

  it('should throw NotFound for unknown sessions', () => {
    const store = new SessionStore(sequentialIds());

    assert.throws(() => store.get('nope'), NotFound);
    assert.throws(() => store.delete('nope'), NotFound);
  });

  it('should forget deleted sessions', () => {
    const store = new SessionStore(sequentialIds());
    const { sessionId } = store.create(loadTavern());

    store.delete(sessionId);

    assert.strictEqual(store.size, 0);
    assert.throws(() => store.get(sessionId), NotFound);
  });

  it('should generate distinct ids by default', () => {
    const store = new SessionStore();
    const script = loadTavern();

    assert.notStrictEqual(store.create(script).sessionId, store.create(script).sessionId);
  });
});
