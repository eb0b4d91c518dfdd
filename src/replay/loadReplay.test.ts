import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { GameLogEntry } from '../types.js';
import { inferSpeakers, loadReplayEntries, resolveReplayPath } from './loadReplay.js';

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'replay-test-'));
}

const entries: GameLogEntry[] = [
  { id: '1', timestamp: '2026-01-01T00:00:00.000Z', type: 'SYSTEM', content: 'Game Starting...' },
  { id: '2', timestamp: '2026-01-01T00:00:01.000Z', type: 'RESPONSE', player: 'Ana', content: 'Tea.' },
  {
    id: '3',
    timestamp: '2026-01-01T00:00:02.000Z',
    type: 'SUSPICION',
    player: 'Holmes',
    content: 'Ana is plain.',
    metadata: { stance: 'trait', round: 1 },
  },
  { id: '4', timestamp: '2026-01-01T00:00:03.000Z', type: 'RESPONSE', player: 'Ben', content: 'Coffee.' },
  { id: '5', timestamp: '2026-01-01T00:00:04.000Z', type: 'PROMPT', player: 'Ghost', content: 'x' },
];

test('resolveReplayPath: latest picks the newest game log', () => {
  const dir = tmpDir();
  fs.writeFileSync(path.join(dir, 'game-2026-01-01T00-00-00-000Z.json'), '[]');
  fs.writeFileSync(path.join(dir, 'game-2026-02-01T00-00-00-000Z.json'), '[]');
  fs.writeFileSync(path.join(dir, 'transcript-2026-03-01T00-00-00-000Z.txt'), '');

  assert.equal(resolveReplayPath('latest', dir), path.join(dir, 'game-2026-02-01T00-00-00-000Z.json'));
});

test('resolveReplayPath: finds names inside the log directory without .json', () => {
  const dir = tmpDir();
  fs.writeFileSync(path.join(dir, 'game-a.json'), '[]');

  assert.equal(resolveReplayPath('game-a', dir), path.resolve(path.join(dir, 'game-a.json')));
});

test('resolveReplayPath: latest with no logs throws', () => {
  assert.throws(() => resolveReplayPath('latest', tmpDir()), /No game logs found/);
});

test('loadReplayEntries: parses and validates entries', () => {
  const file = path.join(tmpDir(), 'game.json');
  fs.writeFileSync(file, JSON.stringify(entries));

  assert.deepEqual(loadReplayEntries(file), entries);
});

test('loadReplayEntries: rejects malformed files', () => {
  const dir = tmpDir();
  const notJson = path.join(dir, 'a.json');
  const wrongShape = path.join(dir, 'b.json');
  fs.writeFileSync(notJson, '{nope');
  fs.writeFileSync(wrongShape, JSON.stringify([{ id: 'x', type: 'CHAT', content: 'hi' }]));

  assert.throws(() => loadReplayEntries(notJson), /Failed to parse replay file/);
  assert.throws(() => loadReplayEntries(wrongShape), /not a list of log entries \(at 0\./);
  assert.throws(() => loadReplayEntries(path.join(dir, 'missing.json')), /Replay file not found/);
});

test('inferSpeakers: splits personas from judges in order of appearance', () => {
  assert.deepEqual(inferSpeakers(entries), { personas: ['Ana', 'Ben'], judges: ['Holmes'] });
});
