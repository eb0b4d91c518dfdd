import type { GameEngine } from '../engine/gameEngine.js';
import type { Question } from '../types.js';

export class QuestionRoundPhase {
  async run(engine: GameEngine, question: Question): Promise<void> {
    const round = engine.transcript.recordQuestion(question);
    engine.state.round = round;

    engine.recordPublic({ type: 'SYSTEM', content: `--- Round ${round} ---` });
    engine.recordPublic({
      type: 'SYSTEM',
      content: `Question (${question.category}): ${question.text}`,
      metadata: { round, kind: 'question', category: question.category },
    });

    // Everyone answers without seeing the others; answers are recorded in roster order.
    const answers = await Promise.all(engine.players.map(p => p.answer(question, engine.transcript)));

    engine.players.forEach((player, i) => {
      const text = answers[i];
      player.persona.addResponse(round, text);
      engine.recordPublic({ type: 'RESPONSE', player: player.name, content: text, metadata: { round } });
    });
  }
}
