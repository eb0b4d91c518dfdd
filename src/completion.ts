import { generateText, gateway } from 'ai';
import { dryRunSeed, errorMessage, fnv1a32 } from './utils.js';

/**
 * The remote text-completion call, treated as an opaque, fallible function.
 * Implementations reject with `ServiceError` when the call fails.
 */
export interface CompletionService {
  complete(prompt: string): Promise<string>;
}

export class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;
  return new ServiceError(`Completion failed: ${errorMessage(error)}`, { cause: error });
}

export interface GatewayCompletionOptions {
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

export class GatewayCompletionService implements CompletionService {
  private readonly opts: GatewayCompletionOptions;
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(opts: GatewayCompletionOptions) {
    // AI Gateway expects `provider/model` (e.g. `openai/gpt-4o-mini`).
    // Fail fast so config issues are obvious.
    if (!opts.model.includes('/')) {
      throw new Error(
        `Invalid model id "${opts.model}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o-mini").`
      );
    }
    this.opts = opts;
  }

  get model(): string {
    return this.opts.model;
  }

  private getModel() {
    if (!this.cachedModel) this.cachedModel = gateway(this.opts.model);
    return this.cachedModel;
  }

  async complete(prompt: string): Promise<string> {
    try {
      const result = await generateText({
        model: this.getModel(),
        prompt,
        temperature: this.opts.temperature,
        maxOutputTokens: this.opts.maxOutputTokens,
      });
      const text = result.text.trim();
      if (!text) throw new Error('Empty completion');
      return text;
    } catch (error) {
      throw toServiceError(error);
    }
  }
}

const PLAYERS_LINE = /^Players:\s*(.+)$/m;

export function parsePlayersLine(prompt: string): string[] {
  const m = prompt.match(PLAYERS_LINE);
  if (!m?.[1]) return [];
  return m[1]
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * Offline stand-in used by `--dry-run`: picks a player from the prompt's
 * `Players:` line by hashing the prompt, so runs repeat for a given seed.
 */
export class DryRunCompletionService implements CompletionService {
  constructor(private readonly seed: number = dryRunSeed()) {}

  async complete(prompt: string): Promise<string> {
    const names = parsePlayersLine(prompt);
    const pick = names.length ? names[fnv1a32(`${this.seed}|${prompt}`) % names.length] : undefined;

    if (/Respond with ONLY the character's name/i.test(prompt)) {
      return pick ?? '';
    }
    if (/^Task: INTERROGATION QUESTION$/m.test(prompt)) {
      return 'What is a small habit of yours that you could never give up?';
    }
    if (pick) {
      return `Something in how ${pick} phrased things feels different from the rest of the group.`;
    }
    return 'I would keep it simple: I go with what feels right and explain it plainly.';
  }
}

export type CompletionCallback = (prompt: string, callIndex: number) => string | Promise<string>;

/**
 * Wraps a plain function as a completion service and records every prompt it
 * receives. A throwing callback surfaces as `ServiceError`.
 */
export class CallbackCompletionService implements CompletionService {
  readonly prompts: string[] = [];

  constructor(private readonly callback: CompletionCallback) {}

  get callCount(): number {
    return this.prompts.length;
  }

  async complete(prompt: string): Promise<string> {
    const callIndex = this.prompts.length;
    this.prompts.push(prompt);
    try {
      return await this.callback(prompt, callIndex);
    } catch (error) {
      throw toServiceError(error);
    }
  }
}
