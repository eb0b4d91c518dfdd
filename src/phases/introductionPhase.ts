import type { GameEngine } from '../engine/gameEngine.js';

export class IntroductionPhase {
  async run(engine: GameEngine): Promise<void> {
    engine.recordPublic({ type: 'SYSTEM', content: '--- Introductions ---' });

    const texts = await Promise.all(engine.players.map(p => p.introduce(engine.transcript)));

    engine.players.forEach((player, i) => {
      const text = texts[i];
      player.persona.setIntroduction(text);
      engine.recordPublic({ type: 'INTRODUCTION', player: player.name, content: text });
    });
  }
}
