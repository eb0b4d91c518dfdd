import type { Judge } from '../judge.js';
import type { Persona } from '../persona.js';
import type { Transcript } from '../transcript.js';
import { logger } from '../logger.js';
import type { GameLogEntry, RoundRecord, TallyEntry, Utterance } from '../types.js';
import { formatTally, isUnanimous, resolveMajority, tallyEntries, tallyVotes } from './tally.js';

/** Malformed input to `runPanel`; raised before any completion call. */
export class PanelPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PanelPreconditionError';
  }
}

export interface PanelVerdict {
  verdict: string;
  discussion: RoundRecord[];
  consensus: boolean;
  initialVotes: Record<string, string>;
  finalTally: TallyEntry[];
}

export type RecordEntry = (entry: Omit<GameLogEntry, 'id' | 'timestamp'>) => void;

export interface DeliberationOptions {
  maxDiscussionRounds?: number;
  // Where panel log entries go; the game engine passes its own recorder.
  record?: RecordEntry;
}

const PANEL_SIZE = 3;

/**
 * Runs the judge panel: independent first votes, then up to
 * `maxDiscussionRounds` rounds of speaking in panel order followed by
 * concurrent revotes. Unanimity ends it early; otherwise the last tally's
 * majority wins, ties going to the name voted for first.
 */
export class DeliberationEngine {
  readonly maxDiscussionRounds: number;
  private readonly record: RecordEntry;

  constructor(opts: DeliberationOptions = {}) {
    this.maxDiscussionRounds = opts.maxDiscussionRounds ?? 3;
    this.record =
      opts.record ??
      (entry => {
        logger.log(entry);
      });
  }

  async runPanel(judges: readonly Judge[], personas: readonly Persona[], transcript: Transcript): Promise<PanelVerdict> {
    this.assertPreconditions(judges, personas, transcript);
    const panel = judges.map(j => j.name);

    this.record({ type: 'SYSTEM', content: '--- Judge Panel Deliberation ---' });

    // Initial votes are independent of each other; keep them in panel order.
    let votes = await Promise.all(judges.map(j => j.castVote(transcript)));
    this.recordVotes(judges, votes, 0);
    const initialVotes = byJudge(panel, votes);

    let tally = tallyVotes(votes);
    this.record({ type: 'SYSTEM', content: `Initial tally: ${formatTally(tally)}` });

    const discussion: RoundRecord[] = [];
    let consensus = isUnanimous(tally);

    for (let round = 1; !consensus && round <= this.maxDiscussionRounds; round++) {
      this.record({ type: 'SYSTEM', content: `--- Discussion Round ${round} ---` });

      const utterances: Utterance[] = [];
      for (const judge of judges) {
        const message = await judge.speak({
          transcript,
          tally,
          history: discussion,
          currentRound: utterances.slice(),
          round,
          panel,
        });
        utterances.push({ judge: judge.name, message });
        this.record({
          type: 'DISCUSSION',
          player: judge.name,
          content: message,
          metadata: { round, judge: judge.name, stance: judge.stance },
        });
      }

      const heard = [...discussion, { round, utterances }];
      const previous = votes;
      votes = await Promise.all(judges.map((j, i) => j.revoteAfterDiscussion(transcript, heard, previous[i])));
      this.recordVotes(judges, votes, round);

      tally = tallyVotes(votes);
      discussion.push({ round, utterances, votes: byJudge(panel, votes), tally: tallyEntries(tally) });
      consensus = isUnanimous(tally);
      this.record({ type: 'SYSTEM', content: `Tally after round ${round}: ${formatTally(tally)}` });
    }

    const verdict = resolveMajority(tally);
    if (!consensus) {
      this.record({
        type: 'SYSTEM',
        content: `No consensus after ${discussion.length} discussion round(s); majority decides (${formatTally(tally)}).`,
      });
    }
    this.record({
      type: 'VERDICT',
      content: `The judges name ${verdict} as the human${consensus ? ' unanimously' : ' by majority'}.`,
      metadata: { vote: verdict, consensus, rounds: discussion.length },
    });

    return { verdict, discussion, consensus, initialVotes, finalTally: tallyEntries(tally) };
  }

  private recordVotes(judges: readonly Judge[], votes: readonly string[], round: number) {
    judges.forEach((judge, i) => {
      const vote = votes[i];
      this.record({
        type: 'VOTE',
        player: judge.name,
        content: round === 0 ? `votes for ${vote}` : `votes for ${vote} after round ${round}`,
        metadata: { round, judge: judge.name, stance: judge.stance, vote, kind: round === 0 ? 'initial_vote' : 'revote' },
      });
    });
  }

  private assertPreconditions(judges: readonly Judge[], personas: readonly Persona[], transcript: Transcript) {
    if (!Number.isInteger(this.maxDiscussionRounds) || this.maxDiscussionRounds < 0) {
      throw new PanelPreconditionError(`maxDiscussionRounds must be a non-negative integer, got ${this.maxDiscussionRounds}.`);
    }
    if (judges.length !== PANEL_SIZE) {
      throw new PanelPreconditionError(`The panel needs exactly ${PANEL_SIZE} judges, got ${judges.length}.`);
    }
    if (new Set(judges.map(j => j.stance)).size !== PANEL_SIZE) {
      throw new PanelPreconditionError('Every judge must hold a different stance.');
    }
    if (new Set(judges.map(j => j.name.toLowerCase())).size !== PANEL_SIZE) {
      throw new PanelPreconditionError('Judge names must be distinct.');
    }
    if (personas.length === 0) {
      throw new PanelPreconditionError('No personas to judge.');
    }
    const silent = personas.find(p => p.responses.length === 0);
    if (silent) {
      throw new PanelPreconditionError(`${silent.name} has no recorded responses.`);
    }
    const names = transcript.names;
    if (names.length !== personas.length || personas.some((p, i) => p.name !== names[i])) {
      throw new PanelPreconditionError('Transcript roster does not match the personas.');
    }
  }
}

function byJudge(panel: readonly string[], votes: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  panel.forEach((name, i) => {
    out[name] = votes[i];
  });
  return out;
}
