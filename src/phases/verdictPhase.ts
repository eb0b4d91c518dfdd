import type { GameEngine } from '../engine/gameEngine.js';
import { formatTally, tallyVotes } from '../deliberation/tally.js';

export class VerdictPhase {
  async run(engine: GameEngine): Promise<void> {
    engine.recordPublic({ type: 'SYSTEM', content: '--- Final Votes ---' });

    const votes = await Promise.all(engine.players.map(p => p.castVote(engine.transcript)));
    engine.players.forEach((player, i) => {
      const vote = votes[i];
      engine.recordPublic({
        type: 'VOTE',
        player: player.name,
        content: `votes for ${vote}`,
        metadata: { vote, kind: 'player_vote' },
      });
    });
    engine.recordPublic({ type: 'SYSTEM', content: `Player votes: ${formatTally(tallyVotes(votes))}` });

    // Player votes are on the record only; the panel decides.
    const result = await engine.deliberation.runPanel(engine.judges, engine.personas, engine.transcript);
    engine.panelVerdict = result;

    const human = engine.requireHumanName();
    const humanWon = result.verdict !== human;
    engine.state.verdict = result.verdict;
    engine.state.humanWon = humanWon;

    engine.recordPublic({
      type: 'WIN',
      content: humanWon
        ? `${human} was the human and the judges named ${result.verdict}. The human wins!`
        : `The judges unmasked ${human} as the human. The judges win!`,
      metadata: { human, vote: result.verdict, outcome: humanWon ? 'human' : 'judges' },
    });
  }
}
