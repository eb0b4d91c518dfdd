import type { GameEngine } from '../engine/gameEngine.js';
import type { OpinionSource } from '../opinionGenerator.js';

export class SuspicionPhase {
  async run(engine: GameEngine): Promise<void> {
    const round = engine.state.round;
    engine.recordPublic({ type: 'SYSTEM', content: `--- Round ${round} Suspicions ---` });

    const sources: OpinionSource[] = [...engine.players, ...engine.judges];
    const texts = await Promise.all(sources.map(s => s.formSuspicion(engine.transcript, round)));

    // Judges keep their own notes; persona histories are appended here.
    engine.players.forEach((player, i) => {
      const text = texts[i];
      player.persona.addSuspicion(round, text);
      engine.recordPublic({ type: 'SUSPICION', player: player.name, content: text, metadata: { round } });
    });
    engine.judges.forEach((judge, i) => {
      const text = texts[engine.players.length + i];
      engine.recordPublic({
        type: 'SUSPICION',
        player: judge.name,
        content: text,
        metadata: { round, judge: judge.name, stance: judge.stance },
      });
    });
  }
}
