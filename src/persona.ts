import type { PersonaProfile } from './types.js';

export type ParticipantKind = 'human' | 'simulated';

/** Raised when a persona's per-round history would skip or rewrite a round. */
export class HistoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HistoryError';
  }
}

/**
 * One seat in the game: fixed character traits plus the per-round record of
 * what this persona said. Histories are append-only and hold at most one entry
 * per round.
 */
export class Persona {
  readonly name: string;
  readonly profile: string;
  readonly personality: string;
  readonly background: string;
  readonly speechStyle: string;

  private responseHistory: string[] = [];
  private suspicionHistory: string[] = [];
  private currentVote: string | null = null;
  private currentIntroduction: string | null = null;

  constructor(profile: PersonaProfile) {
    this.name = profile.name;
    this.profile = profile.profile;
    this.personality = profile.personality;
    this.background = profile.background;
    this.speechStyle = profile.speech_style;
  }

  get responses(): readonly string[] {
    return this.responseHistory;
  }

  get suspicions(): readonly string[] {
    return this.suspicionHistory;
  }

  get vote(): string | null {
    return this.currentVote;
  }

  get introduction(): string | null {
    return this.currentIntroduction;
  }

  toProfile(): PersonaProfile {
    return {
      name: this.name,
      profile: this.profile,
      personality: this.personality,
      background: this.background,
      speech_style: this.speechStyle,
    };
  }

  addResponse(round: number, text: string): void {
    appendForRound(this.responseHistory, round, text, `${this.name} response`);
  }

  addSuspicion(round: number, text: string): void {
    appendForRound(this.suspicionHistory, round, text, `${this.name} suspicion`);
  }

  setVote(name: string | null): void {
    this.currentVote = name;
  }

  setIntroduction(text: string | null): void {
    this.currentIntroduction = text;
  }

  /** Clear everything said in a game; traits stay. */
  reset(): void {
    this.responseHistory = [];
    this.suspicionHistory = [];
    this.currentVote = null;
    this.currentIntroduction = null;
  }
}

function appendForRound(history: string[], round: number, text: string, label: string): void {
  const expected = history.length + 1;
  if (round !== expected) {
    throw new HistoryError(`${label} for round ${round} rejected: next round to record is ${expected}.`);
  }
  history.push(text);
}

export function createPersonas(profiles: readonly PersonaProfile[]): Persona[] {
  const seen = new Set<string>();
  return profiles.map(p => {
    const key = p.name.toLowerCase();
    if (seen.has(key)) {
      throw new Error(`Duplicate persona name "${p.name}".`);
    }
    seen.add(key);
    return new Persona(p);
  });
}
