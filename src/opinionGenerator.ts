import { toServiceError, type CompletionService, type ServiceError } from './completion.js';
import { logger } from './logger.js';
import type { Transcript } from './transcript.js';

export type OpinionKind =
  | 'introduction'
  | 'response'
  | 'suspicion'
  | 'vote'
  | 'revote'
  | 'discussion'
  | 'target'
  | 'interrogation';

export interface OpinionRequest {
  kind: OpinionKind;
  requester: string;
  prompt: string;
  // Shown in place of the model's text when the service fails.
  fallback: string;
}

export type Generation =
  | { ok: true; text: string }
  | { ok: false; text: string; error: ServiceError };

export interface ChoiceRequest {
  kind: OpinionKind;
  requester: string;
  prompt: string;
  candidates: readonly string[];
}

export type Choice =
  | { ok: true; name: string; text: string }
  | { ok: false; reason: 'service'; error: ServiceError }
  | { ok: false; reason: 'unresolved'; text: string };

export type OpinionRole = 'participant' | 'judge';

/** Anything that reads the transcript and forms suspicions and votes. */
export interface OpinionSource {
  readonly role: OpinionRole;
  readonly name: string;
  formSuspicion(transcript: Transcript, round: number): Promise<string>;
  castVote(transcript: Transcript): Promise<string>;
}

export interface OpinionGeneratorOptions {
  logPrompts?: boolean;
  // Tags private entries with the game they belong to.
  gameId?: string;
}

/**
 * Turns a prompt into one piece of text through the completion service.
 *
 * Failures come back as the `ok: false` variant carrying the caller's fallback;
 * nothing is thrown. The generator never touches persona or judge state.
 */
export class OpinionGenerator {
  private readonly service: CompletionService;
  private readonly logPrompts: boolean;
  private readonly gameId?: string;

  constructor(service: CompletionService, opts: OpinionGeneratorOptions = {}) {
    this.service = service;
    this.logPrompts = opts.logPrompts ?? false;
    this.gameId = opts.gameId;
  }

  async generate(request: OpinionRequest): Promise<Generation> {
    if (this.logPrompts) {
      logger.log({
        game: this.gameId,
        type: 'PROMPT',
        player: request.requester,
        content: request.prompt,
        metadata: { visibility: 'private', kind: request.kind },
      });
    }

    try {
      const text = (await this.service.complete(request.prompt)).trim();
      if (!text) throw new Error('Empty completion');
      return { ok: true, text };
    } catch (err) {
      const error = toServiceError(err);
      logger.log({
        game: this.gameId,
        type: 'SYSTEM',
        content: `OpinionGenerator: ${request.kind} for ${request.requester} failed: ${error.message}`,
        metadata: { visibility: 'private', kind: request.kind, fallback: true },
      });
      return { ok: false, text: request.fallback, error };
    }
  }

  /** Generate, then resolve the output to exactly one of `candidates`. */
  async choose(request: ChoiceRequest): Promise<Choice> {
    const generation = await this.generate({ ...request, fallback: '' });
    if (!generation.ok) return { ok: false, reason: 'service', error: generation.error };

    const name = resolvePersonaName(generation.text, request.candidates);
    if (name === null) {
      logger.log({
        game: this.gameId,
        type: 'SYSTEM',
        content: `OpinionGenerator: ${request.kind} for ${request.requester} named nobody: "${generation.text}"`,
        metadata: { visibility: 'private', kind: request.kind, fallback: true },
      });
      return { ok: false, reason: 'unresolved', text: generation.text };
    }
    return { ok: true, name, text: generation.text };
  }
}

/**
 * First name (in roster order) that appears anywhere in `text`, compared
 * case-insensitively. `null` when no name appears.
 */
export function resolvePersonaName(text: string, names: readonly string[]): string | null {
  const lowered = text.toLowerCase();
  return names.find(n => lowered.includes(n.toLowerCase())) ?? null;
}

export function truncateUtterance(text: string, maxChars: number): string {
  const clean = text.trim();
  if (clean.length <= maxChars) return clean;
  return `${clean.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove text in which the speaker presents itself as another judge: speaker
 * labels at line starts ("Judge Watson:", "**Watson:**") and introductions
 * that open a line or sentence and end in punctuation ("As Judge Watson, ...",
 * "I am Watson."). Mentions of other judges are kept, including "as Watson
 * said" and "Watson's point".
 */
export function stripJudgeSelfIdentification(text: string, otherJudges: readonly string[]): string {
  let out = text;
  for (const judge of otherJudges) {
    const name = escapeRegExp(judge);
    const label = new RegExp(`^[ \\t]*(?:[*_]{1,2})?(?:Judge[ \\t]+)?${name}(?:[*_]{1,2})?[ \\t]*:(?:[*_]{1,2})?[ \\t]*`, 'gim');
    const intro = new RegExp(
      `(^[ \\t]*|[.!?][ \\t]+)(?:as|i am|i'm|this is)[ \\t]+(?:judge[ \\t]+)?${name}(?:[,:!]|\\.(?=\\s|$))[ \\t]*`,
      'gim'
    );
    out = out.replace(label, '').replace(intro, '$1');
  }
  return out.replace(/[ \t]{2,}/g, ' ').trim();
}
