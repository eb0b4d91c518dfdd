import type { Persona } from './persona.js';
import type { Question } from './types.js';

export interface RoundResponse {
  name: string;
  text: string;
}

/** One turn of an interrogation round: who asked whom, and what. */
export interface Interrogation {
  interrogator: string;
  target: string;
  question: string;
}

export interface InterrogationExchange extends Interrogation {
  // Absent until the target has answered.
  response?: string;
}

/** What a per-round suspicion prompt may see: that round's questions and answers. */
export type RoundSlice =
  | { kind: 'question'; round: number; question: Question; responses: RoundResponse[] }
  | { kind: 'interrogation'; round: number; exchanges: InterrogationExchange[] };

type RecordedRound =
  | { kind: 'question'; question: Question }
  | { kind: 'interrogation'; interrogations: Interrogation[] };

export interface FullHistoryOptions {
  // Extra per-round notes shown after each round (e.g. a judge's own suspicions).
  notes?: readonly string[];
  notesLabel?: string;
  // Include every persona's suspicion statements.
  includeSuspicions?: boolean;
}

function formatExchanges(exchanges: readonly InterrogationExchange[]): string[] {
  const lines: string[] = [];
  for (const x of exchanges) {
    lines.push(`${x.interrogator} asked ${x.target}: "${x.question}"`);
    if (x.response !== undefined) lines.push(`${x.target} responded: "${x.response}"`);
  }
  return lines;
}

/**
 * The rounds played so far, read together with the personas' histories.
 *
 * A round is either one shared question or an interrogation round, in which
 * every persona is questioned exactly once by another. Either way each persona
 * answers once per round. Only the orchestrator appends; everyone else reads.
 */
export class Transcript {
  private rounds: RecordedRound[] = [];

  constructor(readonly personas: readonly Persona[]) {}

  get names(): string[] {
    return this.personas.map(p => p.name);
  }

  get roundsPlayed(): number {
    return this.rounds.length;
  }

  /** Shared questions, in round order; interrogation rounds have none. */
  get questions(): readonly Question[] {
    return this.rounds.flatMap(r => (r.kind === 'question' ? [r.question] : []));
  }

  recordQuestion(question: Question): number {
    this.rounds.push({ kind: 'question', question: { ...question } });
    return this.rounds.length;
  }

  beginInterrogationRound(): number {
    this.rounds.push({ kind: 'interrogation', interrogations: [] });
    return this.rounds.length;
  }

  recordInterrogation(round: number, interrogation: Interrogation): void {
    const recorded = this.requireRound(round);
    if (recorded.kind !== 'interrogation') throw new Error(`Round ${round} is not an interrogation round.`);
    const { interrogator, target } = interrogation;
    for (const name of [interrogator, target]) {
      if (!this.names.includes(name)) throw new Error(`Unknown player "${name}" in round ${round}.`);
    }
    if (interrogator === target) throw new Error(`${interrogator} cannot question themselves.`);
    if (recorded.interrogations.some(i => i.target === target)) {
      throw new Error(`${target} has already been questioned in round ${round}.`);
    }
    recorded.interrogations.push({ ...interrogation });
  }

  /** Players already questioned in an interrogation round, in turn order. */
  questionedIn(round: number): string[] {
    const recorded = this.requireRound(round);
    return recorded.kind === 'interrogation' ? recorded.interrogations.map(i => i.target) : [];
  }

  questionFor(round: number): Question {
    const recorded = this.requireRound(round);
    if (recorded.kind !== 'question') throw new Error(`Round ${round} has no shared question.`);
    return recorded.question;
  }

  roundSlice(round: number): RoundSlice {
    const recorded = this.requireRound(round);
    if (recorded.kind === 'interrogation') {
      const exchanges = recorded.interrogations.map(i => {
        const response = this.personas.find(p => p.name === i.target)?.responses[round - 1];
        return response === undefined ? { ...i } : { ...i, response };
      });
      return { kind: 'interrogation', round, exchanges };
    }

    const responses: RoundResponse[] = [];
    for (const persona of this.personas) {
      const text = persona.responses[round - 1];
      if (text !== undefined) responses.push({ name: persona.name, text });
    }
    return { kind: 'question', round, question: recorded.question, responses };
  }

  formatRoundSlice(slice: RoundSlice): string {
    if (slice.kind === 'interrogation') return formatExchanges(slice.exchanges).join('\n');
    const lines = [`Question: ${slice.question.text}`, ''];
    for (const r of slice.responses) {
      lines.push(`${r.name}: "${r.text}"`);
    }
    return lines.join('\n');
  }

  /** Earlier rounds' exchanges in which `target` was questioned. */
  formatInterrogationsOf(target: string, beforeRound: number): string {
    const lines: string[] = [];
    for (let round = 1; round < beforeRound && round <= this.rounds.length; round++) {
      const slice = this.roundSlice(round);
      if (slice.kind !== 'interrogation') continue;
      for (const x of slice.exchanges) {
        if (x.target !== target) continue;
        lines.push(`In round ${round}, ${x.interrogator} asked: "${x.question}"`);
        if (x.response !== undefined) lines.push(`${target} responded: "${x.response}"`);
      }
    }
    return lines.join('\n');
  }

  formatIntroductions(): string {
    return this.personas
      .filter(p => p.introduction)
      .map(p => `${p.name}: "${p.introduction}"`)
      .join('\n');
  }

  formatFullHistory(opts: FullHistoryOptions = {}): string {
    const blocks: string[] = [];
    for (let round = 1; round <= this.rounds.length; round++) {
      const slice = this.roundSlice(round);
      const lines = [`--- ROUND ${round} ---`];
      if (slice.kind === 'question') {
        lines.push(`Question: ${slice.question.text}`, '');
        for (const r of slice.responses) {
          lines.push(`${r.name}'s response: "${r.text}"`);
        }
      } else {
        lines.push(...formatExchanges(slice.exchanges));
      }

      if (opts.includeSuspicions) {
        const suspicions = this.personas
          .map(p => ({ name: p.name, text: p.suspicions[round - 1] }))
          .filter((s): s is { name: string; text: string } => s.text !== undefined);
        if (suspicions.length) {
          lines.push('', 'Suspicions after this round:');
          for (const s of suspicions) lines.push(`${s.name}: "${s.text}"`);
        }
      }

      const note = opts.notes?.[round - 1];
      if (note !== undefined) {
        lines.push('', `${opts.notesLabel ?? 'Notes after this round'}:`, `"${note}"`);
      }
      blocks.push(lines.join('\n'));
    }
    return blocks.join('\n\n');
  }

  private requireRound(round: number): RecordedRound {
    const recorded = this.rounds[round - 1];
    if (!recorded) throw new Error(`No question recorded for round ${round}.`);
    return recorded;
  }
}
