import test from 'node:test';
import assert from 'node:assert/strict';
import { formatTally, isUnanimous, resolveMajority, tallyEntries, tallyVotes } from './tally.js';

test('tallyVotes: counts in first-seen order', () => {
  const tally = tallyVotes(['Bea', 'Ana', 'Bea']);
  assert.deepEqual(Array.from(tally), [
    ['Bea', 2],
    ['Ana', 1],
  ]);
});

test('tallyVotes: re-tallying the same votes gives identical counts', () => {
  const votes = ['Ana', 'Cal', 'Ana'];
  const first = tallyVotes(votes);
  const second = tallyVotes(votes);
  assert.deepEqual(Array.from(first), Array.from(second));
  assert.notEqual(first, second);
});

test('isUnanimous: only when a single name holds every vote', () => {
  assert.equal(isUnanimous(tallyVotes(['Ana', 'Ana', 'Ana'])), true);
  assert.equal(isUnanimous(tallyVotes(['Ana', 'Ana', 'Bea'])), false);
  assert.equal(isUnanimous(tallyVotes([])), false);
});

test('resolveMajority: strict majority wins regardless of position', () => {
  assert.equal(resolveMajority(tallyVotes(['Ana', 'Bea', 'Bea'])), 'Bea');
});

test('resolveMajority: ties go to the first name inserted', () => {
  assert.equal(resolveMajority(tallyVotes(['Cal', 'Ana', 'Bea'])), 'Cal');
  assert.equal(resolveMajority(tallyVotes(['Bea', 'Ana', 'Ana', 'Bea'])), 'Bea');
});

test('resolveMajority: empty tally throws', () => {
  assert.throws(() => resolveMajority(new Map()), /empty tally/);
});

test('formatTally / tallyEntries', () => {
  const tally = tallyVotes(['Ana', 'Bea', 'Ana']);
  assert.equal(formatTally(tally), 'Ana: 2, Bea: 1');
  assert.equal(formatTally(new Map()), '(no votes)');
  assert.deepEqual(tallyEntries(tally), [
    ['Ana', 2],
    ['Bea', 1],
  ]);
});

test('tallyEntries: integer-like names keep first-voted order', () => {
  const tally = tallyVotes(['Zed', '7', 'Zed', '7']);
  assert.deepEqual(tallyEntries(tally), [
    ['Zed', 2],
    ['7', 2],
  ]);
  assert.equal(resolveMajority(tally), 'Zed');
});
