import type { GameEngine } from '../engine/gameEngine.js';
import { shuffleInPlace } from '../utils.js';

/**
 * Who the player at `turn` may question: anyone but themselves not yet
 * questioned this round, in roster order. On the second-to-last turn an
 * unquestioned final interrogator is the only choice, so every player is
 * questioned exactly once per round.
 */
export function interrogationTargets(
  roster: readonly string[],
  order: readonly string[],
  turn: number,
  questioned: readonly string[]
): string[] {
  const self = order[turn];
  const open = roster.filter(n => n !== self && !questioned.includes(n));
  const last = order[order.length - 1];
  if (turn === order.length - 2 && last !== undefined && open.includes(last)) return [last];
  return open;
}

export class InterrogationRoundPhase {
  async run(engine: GameEngine): Promise<void> {
    const { transcript } = engine;
    if (engine.players.length < 2) throw new Error('Interrogation needs at least two players.');

    const round = transcript.beginInterrogationRound();
    engine.state.round = round;

    const order = [...engine.players];
    shuffleInPlace(order, engine.rng);
    const orderNames = order.map(p => p.name);

    engine.recordPublic({
      type: 'SYSTEM',
      content: `--- Interrogation Round ${round} ---`,
      metadata: { round, kind: 'interrogation_round' },
    });
    engine.recordPublic({ type: 'SYSTEM', content: `Interrogation order: ${orderNames.join(', ')}` });

    // Turns are sequential: each target depends on who has been questioned already.
    for (const [turn, interrogator] of order.entries()) {
      const candidates = interrogationTargets(transcript.names, orderNames, turn, transcript.questionedIn(round));
      const target = await interrogator.chooseTarget(transcript, candidates, round);
      const targetPlayer = engine.players.find(p => p.name === target);
      if (!targetPlayer || !candidates.includes(target)) {
        throw new Error(`${interrogator.name} cannot question "${target}" in round ${round}.`);
      }

      const question = await interrogator.interrogate(targetPlayer.persona, transcript, round);
      transcript.recordInterrogation(round, { interrogator: interrogator.name, target, question });
      engine.recordPublic({
        type: 'INTERROGATION',
        player: interrogator.name,
        content: `asks ${target}: ${question}`,
        metadata: { round, kind: 'interrogation', target, question },
      });

      const answer = await targetPlayer.answerInterrogation(interrogator.name, question, transcript);
      targetPlayer.persona.addResponse(round, answer);
      engine.recordPublic({
        type: 'RESPONSE',
        player: target,
        content: answer,
        metadata: { round, kind: 'interrogation_answer', askedBy: interrogator.name },
      });
    }
  }
}
