import test from 'node:test';
import assert from 'node:assert/strict';
import { CallbackCompletionService, ServiceError } from './completion.js';
import { logger } from './logger.js';
import {
  OpinionGenerator,
  resolvePersonaName,
  stripJudgeSelfIdentification,
  truncateUtterance,
} from './opinionGenerator.js';

logger.setConsoleOutputEnabled(false);

const roster = ['Dr. Alex Morgan', 'Riley Jordan', 'Sam Taylor'];

test('resolvePersonaName: case-insensitive substring match', () => {
  assert.equal(resolvePersonaName('my vote goes to SAM TAYLOR.', roster), 'Sam Taylor');
});

test('resolvePersonaName: roster order wins when several names appear', () => {
  assert.equal(resolvePersonaName('Sam Taylor, or maybe Riley Jordan', roster), 'Riley Jordan');
});

test('resolvePersonaName: partial names do not resolve', () => {
  assert.equal(resolvePersonaName('Riley, definitely', roster), null);
});

test('truncateUtterance: short text is only trimmed', () => {
  assert.equal(truncateUtterance('  Ben.  ', 20), 'Ben.');
});

test('truncateUtterance: long text is cut with a trailing ellipsis within the limit', () => {
  const out = truncateUtterance('abcdefghij klmnop', 10);
  assert.equal(out, 'abcdefg...');
  assert.equal(out.length, 10);
});

test('stripJudgeSelfIdentification: removes another judge\'s speaker label', () => {
  assert.equal(stripJudgeSelfIdentification('Judge Watson: I think Ana.', ['Watson']), 'I think Ana.');
  assert.equal(stripJudgeSelfIdentification('**Watson:** Ben is the odd one.', ['Watson']), 'Ben is the odd one.');
  assert.equal(stripJudgeSelfIdentification('Fine.\nWatson: Ben.', ['Watson']), 'Fine.\nBen.');
});

test('stripJudgeSelfIdentification: removes self-introductions as another judge', () => {
  assert.equal(stripJudgeSelfIdentification('As Judge Watson, I say Ben.', ['Watson', 'Poirot']), 'I say Ben.');
});

test('stripJudgeSelfIdentification: keeps plain references and the speaker\'s own label', () => {
  assert.equal(
    stripJudgeSelfIdentification('I disagree with Watson about Ben.', ['Watson']),
    'I disagree with Watson about Ben.'
  );
  assert.equal(stripJudgeSelfIdentification('Holmes: Ana.', ['Watson', 'Poirot']), 'Holmes: Ana.');
});

test('stripJudgeSelfIdentification: removes introductions that open a later sentence', () => {
  assert.equal(
    stripJudgeSelfIdentification('I suspect Ben. I am Watson. Ben hesitates.', ['Watson', 'Poirot']),
    'I suspect Ben. Ben hesitates.'
  );
  assert.equal(stripJudgeSelfIdentification('Ben, clearly. This is Judge Poirot.', ['Watson', 'Poirot']), 'Ben, clearly.');
});

test('stripJudgeSelfIdentification: mid-sentence references to other judges stay intact', () => {
  const others = ['Watson', 'Poirot'];
  for (const text of [
    'Same as Watson, I suspect Ben.',
    'Just as Watson said, Ben hesitates.',
    "This is Watson's strongest point about Ben.",
    'I see Ben as Poirot does.',
    'As Watson said, Ben hesitates.',
  ]) {
    assert.equal(stripJudgeSelfIdentification(text, others), text);
  }
});

test('OpinionGenerator.generate: returns trimmed text on success', async () => {
  const gen = new OpinionGenerator(new CallbackCompletionService(() => '  hello  '));
  const result = await gen.generate({ kind: 'response', requester: 'Ana', prompt: 'p', fallback: 'fb' });
  assert.deepEqual(result, { ok: true, text: 'hello' });
});

test('OpinionGenerator.generate: service failure degrades to the fallback text', async () => {
  const gen = new OpinionGenerator(
    new CallbackCompletionService(() => {
      throw new Error('network down');
    })
  );
  const result = await gen.generate({ kind: 'suspicion', requester: 'Holmes', prompt: 'p', fallback: 'fb' });

  assert.equal(result.ok, false);
  assert.equal(result.text, 'fb');
  if (!result.ok) assert.ok(result.error instanceof ServiceError);
});

test('OpinionGenerator.generate: an empty completion counts as a failure', async () => {
  const gen = new OpinionGenerator(new CallbackCompletionService(() => '   '));
  const result = await gen.generate({ kind: 'discussion', requester: 'Poirot', prompt: 'p', fallback: 'fb' });
  assert.equal(result.ok, false);
  assert.equal(result.text, 'fb');
});

test('OpinionGenerator.choose: resolves, reports unresolved output, reports service failure', async () => {
  const replies = ['I pick riley jordan', 'no idea at all'];
  const gen = new OpinionGenerator(
    new CallbackCompletionService((_p, i) => {
      const reply = replies[i];
      if (reply === undefined) throw new Error('quota');
      return reply;
    })
  );
  const req = { kind: 'vote' as const, requester: 'Holmes', prompt: 'p', candidates: roster };

  assert.deepEqual(await gen.choose(req), { ok: true, name: 'Riley Jordan', text: 'I pick riley jordan' });
  assert.deepEqual(await gen.choose(req), { ok: false, reason: 'unresolved', text: 'no idea at all' });

  const failed = await gen.choose(req);
  assert.equal(failed.ok, false);
  assert.equal(failed.ok === false && failed.reason, 'service');
});

test('OpinionGenerator: prompt logging emits private PROMPT entries', async () => {
  const gen = new OpinionGenerator(new CallbackCompletionService(() => 'ok'), { logPrompts: true });
  const seen: string[] = [];
  const off = logger.subscribe(e => {
    if (e.type === 'PROMPT') seen.push(`${e.player}|${e.content}|${e.metadata?.visibility}`);
  });

  await gen.generate({ kind: 'introduction', requester: 'Ana', prompt: 'introduce yourself', fallback: '' });
  off();

  assert.deepEqual(seen, ['Ana|introduce yourself|private']);
});
