import test from 'node:test';
import assert from 'node:assert/strict';
import { HistoryError, Persona, createPersonas } from './persona.js';

const profile = {
  name: 'Riley Jordan',
  profile: 'Creative Artist',
  personality: 'Imaginative',
  background: 'Painter',
  speech_style: 'Metaphors',
};

test('Persona: responses and suspicions append one per round', () => {
  const p = new Persona(profile);
  p.addResponse(1, 'first');
  p.addResponse(2, 'second');
  p.addSuspicion(1, 'hmm');

  assert.deepEqual(p.responses, ['first', 'second']);
  assert.deepEqual(p.suspicions, ['hmm']);
});

test('Persona: recording the same round twice is rejected', () => {
  const p = new Persona(profile);
  p.addResponse(1, 'first');

  assert.throws(() => p.addResponse(1, 'again'), HistoryError);
  assert.deepEqual(p.responses, ['first']);
});

test('Persona: skipping a round is rejected', () => {
  const p = new Persona(profile);
  assert.throws(() => p.addSuspicion(2, 'too early'), HistoryError);
});

test('Persona: reset clears histories, vote and introduction but keeps traits', () => {
  const p = new Persona(profile);
  p.addResponse(1, 'first');
  p.addSuspicion(1, 'hmm');
  p.setVote('Sam Taylor');
  p.setIntroduction('Hello there.');

  p.reset();

  assert.deepEqual(p.responses, []);
  assert.deepEqual(p.suspicions, []);
  assert.equal(p.vote, null);
  assert.equal(p.introduction, null);
  assert.equal(p.speechStyle, 'Metaphors');
});

test('createPersonas: rejects duplicate names regardless of case', () => {
  assert.throws(() => createPersonas([profile, { ...profile, name: 'riley jordan' }]), /Duplicate persona name/);
});
