import { createInterface, type Interface } from 'node:readline/promises';
import { resolvePersonaName } from './opinionGenerator.js';

/**
 * Where the human player's words come from. `choose` must resolve to one of
 * `candidates`.
 */
export interface HumanInput {
  ask(prompt: string): Promise<string>;
  choose(prompt: string, candidates: readonly string[]): Promise<string>;
  close(): void;
}

/** Reads answers from stdin, asking again until the input is usable. */
export class TerminalHumanInput implements HumanInput {
  private rl: Interface | null = null;

  private get readline(): Interface {
    if (!this.rl) this.rl = createInterface({ input: process.stdin, output: process.stdout });
    return this.rl;
  }

  async ask(prompt: string): Promise<string> {
    for (;;) {
      const answer = (await this.readline.question(`\n${prompt}\n> `)).trim();
      if (answer) return answer;
      console.log('Please type something.');
    }
  }

  async choose(prompt: string, candidates: readonly string[]): Promise<string> {
    const numbered = candidates.map((c, i) => `  ${i + 1}. ${c}`).join('\n');
    for (;;) {
      const answer = (await this.readline.question(`\n${prompt}\n${numbered}\n> `)).trim();
      const byIndex = candidates[Number(answer) - 1];
      if (/^\d+$/.test(answer) && byIndex !== undefined) return byIndex;
      const byName = resolvePersonaName(answer, candidates);
      if (byName) return byName;
      console.log(`Pick one of: ${candidates.join(', ')}`);
    }
  }

  close() {
    this.rl?.close();
    this.rl = null;
  }
}

export interface ScriptedHumanInputOptions {
  answers?: readonly string[];
  choices?: readonly string[];
}

/**
 * Plays the human from fixed lists (autoplay and tests). Free-text prompts
 * take the next answer; choices take the next scripted name, or the first
 * candidate once the script runs out or names nobody.
 */
export class ScriptedHumanInput implements HumanInput {
  readonly asked: string[] = [];
  private answers: string[];
  private choices: string[];

  constructor(opts: ScriptedHumanInputOptions = {}) {
    this.answers = [...(opts.answers ?? [])];
    this.choices = [...(opts.choices ?? [])];
  }

  async ask(prompt: string): Promise<string> {
    this.asked.push(prompt);
    return this.answers.shift() ?? 'I would rather keep my answer short this time.';
  }

  async choose(prompt: string, candidates: readonly string[]): Promise<string> {
    this.asked.push(prompt);
    const scripted = this.choices.shift();
    const picked = scripted === undefined ? null : resolvePersonaName(scripted, candidates);
    const fallback = candidates[0];
    if (picked) return picked;
    if (fallback === undefined) throw new Error('No candidates to choose from.');
    return fallback;
  }

  close() {}
}
