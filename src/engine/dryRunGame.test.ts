import test from 'node:test';
import assert from 'node:assert/strict';
import { DryRunCompletionService } from '../completion.js';
import { parseConfig } from '../config.js';
import { ScriptedHumanInput } from '../humanInput.js';
import { logger } from '../logger.js';
import { GameEngine } from './gameEngine.js';

test('dry-run harness: a game on the bundled content runs to a verdict', async () => {
  logger.setConsoleOutputEnabled(false);

  const engine = new GameEngine({
    config: parseConfig({ rounds: 3, question_seed: 1 }),
    service: new DryRunCompletionService(1),
    humanInput: new ScriptedHumanInput(),
    humanName: 'Riley Jordan',
  });
  await engine.start();

  assert.equal(engine.state.abortReason, undefined);
  assert.equal(engine.transcript.roundsPlayed, 3);
  assert.equal(new Set(engine.transcript.questions.map(q => q.category)).size, 3);

  const verdict = engine.state.verdict ?? '';
  assert.ok(engine.transcript.names.includes(verdict));
  assert.equal(engine.state.humanWon, verdict !== 'Riley Jordan');

  const discussion = engine.panelVerdict?.discussion ?? [];
  assert.ok(discussion.length <= 3);
  for (const record of discussion) assert.equal(record.utterances.length, 3);
});

test('dry-run harness: an interrogation game on the bundled content runs to a verdict', async () => {
  logger.setConsoleOutputEnabled(false);

  const engine = new GameEngine({
    config: parseConfig({ mode: 'interrogation', rounds: 2, question_seed: 1 }),
    service: new DryRunCompletionService(1),
    humanInput: new ScriptedHumanInput(),
    humanName: 'Riley Jordan',
  });
  await engine.start();

  assert.equal(engine.state.abortReason, undefined);
  assert.equal(engine.transcript.roundsPlayed, 2);
  for (const persona of engine.personas) assert.equal(persona.responses.length, 2);
  assert.equal(engine.state.history.filter(e => e.type === 'INTERROGATION').length, 2 * engine.personas.length);
  assert.ok(engine.transcript.names.includes(engine.state.verdict ?? ''));
});
