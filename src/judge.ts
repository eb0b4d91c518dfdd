import { HistoryError } from './persona.js';
import type { Transcript } from './transcript.js';
import {
  stripJudgeSelfIdentification,
  truncateUtterance,
  type OpinionGenerator,
  type OpinionSource,
} from './opinionGenerator.js';
import {
  judgeDiscussionPrompt,
  judgeRevotePrompt,
  judgeSuspicionPrompt,
  judgeVotePrompt,
  type JudgePromptBase,
} from './prompts.js';
import { formatTally, type VoteTally } from './deliberation/tally.js';
import {
  DEFAULT_JUDGES,
  type DiscussionRound,
  type JudgeConfig,
  type RoundRecord,
  type Stance,
  type Utterance,
} from './types.js';

export interface SpeakContext {
  transcript: Transcript;
  tally: VoteTally;
  history: readonly RoundRecord[];
  // Utterances already made in this round, panel order.
  currentRound: readonly Utterance[];
  round: number;
  panel: readonly string[];
}

export interface JudgeOptions {
  utteranceMaxChars?: number;
}

/**
 * A panel member bound to one analytical stance. Judges never answer
 * questions; they only read what the personas produced.
 */
export class Judge implements OpinionSource {
  readonly role = 'judge' as const;
  readonly name: string;
  readonly stance: Stance;

  private readonly generator: OpinionGenerator;
  private readonly utteranceMaxChars: number;
  private panelNames: readonly string[];
  private suspicionHistory: string[] = [];
  private currentVote: string | null = null;

  constructor(config: JudgeConfig, generator: OpinionGenerator, opts: JudgeOptions = {}) {
    this.name = config.name;
    this.stance = config.stance;
    this.generator = generator;
    this.utteranceMaxChars = opts.utteranceMaxChars ?? 300;
    this.panelNames = [config.name];
  }

  get suspicions(): readonly string[] {
    return this.suspicionHistory;
  }

  get vote(): string | null {
    return this.currentVote;
  }

  /** Names of the whole panel, this judge included; set by `createJudgePanel`. */
  setPanel(names: readonly string[]) {
    this.panelNames = [...names];
  }

  private promptBase(transcript: Transcript, panel: readonly string[] = this.panelNames): JudgePromptBase {
    return { judge: this.name, stance: this.stance, panel, roster: transcript.names };
  }

  private fullHistory(transcript: Transcript): string {
    return transcript.formatFullHistory({ notes: this.suspicionHistory, notesLabel: 'Your notes after this round' });
  }

  async formSuspicion(transcript: Transcript, round: number): Promise<string> {
    const expected = this.suspicionHistory.length + 1;
    if (round !== expected) {
      throw new HistoryError(`Judge ${this.name} suspicion for round ${round} rejected: next round to record is ${expected}.`);
    }

    const slice = transcript.roundSlice(round);
    const result = await this.generator.generate({
      kind: 'suspicion',
      requester: this.name,
      prompt: judgeSuspicionPrompt(this.promptBase(transcript), round, transcript.formatRoundSlice(slice)),
      fallback: `Judge ${this.name} could not analyze the responses this round.`,
    });
    this.suspicionHistory.push(result.text);
    return result.text;
  }

  async castVote(transcript: Transcript): Promise<string> {
    const names = transcript.names;
    const choice = await this.generator.choose({
      kind: 'vote',
      requester: this.name,
      prompt: judgeVotePrompt(this.promptBase(transcript), this.fullHistory(transcript)),
      candidates: names,
    });
    // First votes fall back to the first persona in roster order.
    const vote = choice.ok ? choice.name : names[0];
    if (vote === undefined) throw new Error(`Judge ${this.name} cannot vote: no personas.`);
    this.currentVote = vote;
    return vote;
  }

  async speak(ctx: SpeakContext): Promise<string> {
    const result = await this.generator.generate({
      kind: 'discussion',
      requester: this.name,
      prompt: judgeDiscussionPrompt({
        ...this.promptBase(ctx.transcript, ctx.panel),
        history: this.fullHistory(ctx.transcript),
        tally: formatTally(ctx.tally),
        ownVote: this.currentVote,
        earlierRounds: ctx.history,
        currentRound: ctx.currentRound,
        round: ctx.round,
        maxChars: this.utteranceMaxChars,
      }),
      fallback: `Judge ${this.name} could not analyze the discussion this turn.`,
    });
    if (!result.ok) return result.text;

    const others = ctx.panel.filter(n => n !== this.name);
    const cleaned = stripJudgeSelfIdentification(result.text, others);
    if (!cleaned) return `Judge ${this.name} could not analyze the discussion this turn.`;
    return truncateUtterance(cleaned, this.utteranceMaxChars);
  }

  async revoteAfterDiscussion(
    transcript: Transcript,
    history: readonly DiscussionRound[],
    previousVote: string
  ): Promise<string> {
    const choice = await this.generator.choose({
      kind: 'revote',
      requester: this.name,
      prompt: judgeRevotePrompt(this.promptBase(transcript), this.fullHistory(transcript), history, previousVote),
      candidates: transcript.names,
    });
    // Revotes keep the previous vote instead.
    const vote = choice.ok ? choice.name : previousVote;
    this.currentVote = vote;
    return vote;
  }
}

/** Holmes (trait), Watson (divergence), Poirot (blended) unless configured otherwise. */
export function createJudgePanel(
  generator: OpinionGenerator,
  configs: readonly JudgeConfig[] = DEFAULT_JUDGES,
  opts: JudgeOptions = {}
): Judge[] {
  const judges = configs.map(c => new Judge(c, generator, opts));
  const names = judges.map(j => j.name);
  for (const judge of judges) judge.setPanel(names);
  return judges;
}
