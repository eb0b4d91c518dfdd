import type { HumanInput } from './humanInput.js';
import type { OpinionGenerator, OpinionSource } from './opinionGenerator.js';
import type { ParticipantKind, Persona } from './persona.js';
import {
  participantInterrogationAnswerPrompt,
  participantInterrogationPrompt,
  participantIntroductionPrompt,
  participantResponsePrompt,
  participantSuspicionPrompt,
  participantTargetPrompt,
  participantVotePrompt,
} from './prompts.js';
import type { Transcript } from './transcript.js';
import type { Question } from './types.js';
import { pickRandom } from './utils.js';

/**
 * A seat at the table. Players produce text; the game engine decides where
 * it is recorded. Only `castVote` touches the persona (its current vote).
 */
export interface Player extends OpinionSource {
  readonly role: 'participant';
  readonly kind: ParticipantKind;
  readonly persona: Persona;
  introduce(transcript: Transcript): Promise<string>;
  answer(question: Question, transcript: Transcript): Promise<string>;
  // Interrogation rounds: pick one of `candidates`, ask them, or answer a question put to this player.
  chooseTarget(transcript: Transcript, candidates: readonly string[], round: number): Promise<string>;
  interrogate(target: Persona, transcript: Transcript, round: number): Promise<string>;
  answerInterrogation(interrogator: string, question: string, transcript: Transcript): Promise<string>;
}

function otherNames(persona: Persona, transcript: Transcript): string[] {
  return transcript.names.filter(n => n !== persona.name);
}

export class Participant implements Player {
  readonly role = 'participant' as const;
  readonly kind = 'simulated' as const;

  constructor(
    readonly persona: Persona,
    private readonly generator: OpinionGenerator,
    private readonly rng: () => number = Math.random
  ) {}

  get name(): string {
    return this.persona.name;
  }

  async introduce(transcript: Transcript): Promise<string> {
    const result = await this.generator.generate({
      kind: 'introduction',
      requester: this.name,
      prompt: participantIntroductionPrompt(this.persona, transcript.names),
      fallback: `Hello, I'm ${this.name}.`,
    });
    return result.text;
  }

  async answer(question: Question, transcript: Transcript): Promise<string> {
    const result = await this.generator.generate({
      kind: 'response',
      requester: this.name,
      prompt: participantResponsePrompt(this.persona, transcript.names, question, transcript.formatIntroductions()),
      fallback: '...',
    });
    return result.text;
  }

  async formSuspicion(transcript: Transcript, round: number): Promise<string> {
    const slice = transcript.roundSlice(round);
    const result = await this.generator.generate({
      kind: 'suspicion',
      requester: this.name,
      prompt: participantSuspicionPrompt(this.persona, transcript.names, transcript.formatRoundSlice(slice)),
      fallback: `${this.name} has no strong read this round.`,
    });
    return result.text;
  }

  async castVote(transcript: Transcript): Promise<string> {
    const candidates = otherNames(this.persona, transcript);
    const choice = await this.generator.choose({
      kind: 'vote',
      requester: this.name,
      prompt: participantVotePrompt(
        this.persona,
        transcript.names,
        transcript.formatFullHistory({ includeSuspicions: true })
      ),
      candidates,
    });
    const vote = choice.ok ? choice.name : candidates[0];
    if (vote === undefined) throw new Error(`${this.name} has nobody to vote for.`);
    this.persona.setVote(vote);
    return vote;
  }

  /** Random in the first round; afterwards asks the model, random when it names nobody usable. */
  async chooseTarget(transcript: Transcript, candidates: readonly string[], round: number): Promise<string> {
    if (round <= 1) return pickRandom(candidates, this.rng);
    const choice = await this.generator.choose({
      kind: 'target',
      requester: this.name,
      prompt: participantTargetPrompt(
        this.persona,
        transcript.names,
        candidates,
        transcript.formatFullHistory({ includeSuspicions: true })
      ),
      candidates,
    });
    return choice.ok ? choice.name : pickRandom(candidates, this.rng);
  }

  async interrogate(target: Persona, transcript: Transcript, round: number): Promise<string> {
    const result = await this.generator.generate({
      kind: 'interrogation',
      requester: this.name,
      prompt: participantInterrogationPrompt(
        this.persona,
        transcript.names,
        target,
        transcript.formatInterrogationsOf(target.name, round)
      ),
      fallback: `${target.name}, what is something you changed your mind about recently?`,
    });
    return result.text;
  }

  async answerInterrogation(interrogator: string, question: string, transcript: Transcript): Promise<string> {
    const result = await this.generator.generate({
      kind: 'response',
      requester: this.name,
      prompt: participantInterrogationAnswerPrompt(this.persona, transcript.names, interrogator, question),
      fallback: '...',
    });
    return result.text;
  }
}

/** The human's seat; every operation is answered through `HumanInput`. */
export class HumanParticipant implements Player {
  readonly role = 'participant' as const;
  readonly kind = 'human' as const;

  constructor(
    readonly persona: Persona,
    private readonly input: HumanInput
  ) {}

  get name(): string {
    return this.persona.name;
  }

  introduce(_transcript: Transcript): Promise<string> {
    return this.input.ask(`Introduce yourself to the group as ${this.name} (2-3 sentences).`);
  }

  answer(question: Question, transcript: Transcript): Promise<string> {
    return this.input.ask(
      `Round ${transcript.roundsPlayed} (${question.category}): ${question.text}\nAnswer as ${this.name}.`
    );
  }

  formSuspicion(transcript: Transcript, round: number): Promise<string> {
    const text = transcript.formatRoundSlice(transcript.roundSlice(round));
    return this.input.ask(`${text}\n\nWho seems most likely to be the human, and why? (1-2 sentences)`);
  }

  async castVote(transcript: Transcript): Promise<string> {
    const candidates = otherNames(this.persona, transcript);
    const vote = await this.input.choose('Cast your vote: who is the human?', candidates);
    if (!candidates.includes(vote)) {
      throw new Error(`${this.name} cannot vote for "${vote}".`);
    }
    this.persona.setVote(vote);
    return vote;
  }

  async chooseTarget(_transcript: Transcript, candidates: readonly string[], round: number): Promise<string> {
    const target = await this.input.choose(`Round ${round}: who will you question?`, candidates);
    if (!candidates.includes(target)) {
      throw new Error(`${this.name} cannot question "${target}".`);
    }
    return target;
  }

  interrogate(target: Persona): Promise<string> {
    return this.input.ask(`Ask ${target.name} one question (answerable in 1-2 sentences).`);
  }

  answerInterrogation(interrogator: string, question: string): Promise<string> {
    return this.input.ask(`${interrogator} asks you: "${question}"\nAnswer as ${this.name}.`);
  }
}
