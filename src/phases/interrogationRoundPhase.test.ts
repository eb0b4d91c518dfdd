import test from 'node:test';
import assert from 'node:assert/strict';
import { interrogationTargets } from './interrogationRoundPhase.js';

const roster = ['Ana', 'Ben', 'Cal', 'Dee'];

test('interrogationTargets: anyone but oneself and the already questioned, in roster order', () => {
  const order = ['Cal', 'Ana', 'Dee', 'Ben'];
  assert.deepEqual(interrogationTargets(roster, order, 0, []), ['Ana', 'Ben', 'Dee']);
  assert.deepEqual(interrogationTargets(roster, order, 1, ['Ben']), ['Cal', 'Dee']);
});

test('interrogationTargets: an unquestioned last interrogator must be taken on the turn before', () => {
  const order = ['Ana', 'Ben', 'Cal'];
  assert.deepEqual(interrogationTargets(['Ana', 'Ben', 'Cal'], order, 1, ['Ben']), ['Cal']);
  assert.deepEqual(interrogationTargets(['Ana', 'Ben', 'Cal'], order, 1, ['Cal']), ['Ana']);
  assert.deepEqual(interrogationTargets(['Ana', 'Ben', 'Cal'], order, 2, ['Ben', 'Cal']), ['Ana']);
});

test('interrogationTargets: two players question each other', () => {
  assert.deepEqual(interrogationTargets(['Ana', 'Ben'], ['Ben', 'Ana'], 0, []), ['Ana']);
  assert.deepEqual(interrogationTargets(['Ana', 'Ben'], ['Ben', 'Ana'], 1, ['Ana']), ['Ben']);
});

test('interrogationTargets: every order leaves each player questioned exactly once', () => {
  const orders = [
    ['Ana', 'Ben', 'Cal', 'Dee'],
    ['Dee', 'Cal', 'Ben', 'Ana'],
    ['Ben', 'Dee', 'Ana', 'Cal'],
  ];
  for (const order of orders) {
    // Always take the first open target: the greediest path towards a dead end.
    const questioned: string[] = [];
    order.forEach((self, turn) => {
      const [target] = interrogationTargets(roster, order, turn, questioned);
      assert.ok(target, `no target for ${self}`);
      assert.notEqual(target, self);
      questioned.push(target);
    });
    assert.deepEqual([...questioned].sort(), roster);
  }
});
