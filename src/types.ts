import { z } from 'zod';

// --- Content Types ---

export const PersonaProfileSchema = z.object({
  name: z.string().min(1),
  profile: z.string(),
  personality: z.string(),
  background: z.string(),
  speech_style: z.string(),
});
export type PersonaProfile = z.infer<typeof PersonaProfileSchema>;

export const QuestionSchema = z.object({
  text: z.string().min(1),
  category: z.string().min(1),
});
export type Question = z.infer<typeof QuestionSchema>;

// --- Configuration Types ---

// trait: looks for affect, anecdotes and stylistic "humanness".
// divergence: looks for the outlier against the group's dominant pattern.
// blended: weighs both.
export const StanceSchema = z.enum(['trait', 'divergence', 'blended']);
export type Stance = z.infer<typeof StanceSchema>;

export const JudgeConfigSchema = z.object({
  name: z.string().min(1),
  stance: StanceSchema,
});
export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;

export const DEFAULT_JUDGES: readonly JudgeConfig[] = [
  { name: 'Holmes', stance: 'trait' },
  { name: 'Watson', stance: 'divergence' },
  { name: 'Poirot', stance: 'blended' },
];

// standard: every persona answers the same question each round.
// interrogation: each round every persona questions another one.
export const GameModeSchema = z.enum(['standard', 'interrogation']);
export type GameMode = z.infer<typeof GameModeSchema>;

export const GameConfigSchema = z.object({
  mode: GameModeSchema.default('standard'),
  rounds: z.number().int().positive().default(5),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o-mini`.
  model: z.string().default('openai/gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.7),
  max_output_tokens: z.number().int().positive().default(150),
  max_discussion_rounds: z.number().int().nonnegative().default(3),
  utterance_max_chars: z.number().int().min(10).default(300),
  judges: z.array(JudgeConfigSchema).default(() => DEFAULT_JUDGES.map(j => ({ ...j }))),
  // Every persona introduces itself before the first round (always on in interrogation mode).
  introductions: z.boolean().default(false),
  // Seed for question selection (optional). Time-based when omitted.
  question_seed: z.number().int().optional(),
  log_prompts: z.boolean().default(false),
});
export type GameConfig = z.infer<typeof GameConfigSchema>;

// --- Game State Types ---

export type Phase =
  | 'setup'
  | 'introductions'
  | 'question'
  | 'interrogation'
  | 'suspicion'
  | 'verdict'
  | 'game_over';

export interface GameState {
  phase: Phase;
  round: number; // Question or interrogation round, 1-based once play starts
  humanName: string | null;
  history: GameLogEntry[];
  verdict?: string;
  humanWon?: boolean;
  abortReason?: string;
}

// --- Logging Types ---

export const LogTypeSchema = z.enum([
  'SYSTEM',
  'INTRODUCTION',
  'RESPONSE',
  'INTERROGATION',
  'SUSPICION',
  'VOTE',
  'DISCUSSION',
  'VERDICT',
  'WIN',
  'PROMPT',
]);
export type LogType = z.infer<typeof LogTypeSchema>;

export const LogVisibilitySchema = z.enum(['public', 'private']);
export type LogVisibility = z.infer<typeof LogVisibilitySchema>;

export const GameLogMetadataSchema = z
  .object({
    visibility: LogVisibilitySchema.optional(),
    stance: StanceSchema.optional(),
    round: z.number().optional(),
    judge: z.string().optional(),
    vote: z.string().optional(),
    kind: z.string().optional(),
    fallback: z.boolean().optional(),
  })
  // Additional structured fields are kept as-is.
  .passthrough();
export type GameLogMetadata = z.infer<typeof GameLogMetadataSchema>;

export const GameLogEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  // Id of the game that produced the entry; absent on session-level lines.
  game: z.string().optional(),
  type: LogTypeSchema,
  player: z.string().optional(),
  content: z.string(),
  metadata: GameLogMetadataSchema.optional(),
});
export type GameLogEntry = z.infer<typeof GameLogEntrySchema>;

// --- Deliberation Types ---

export interface Utterance {
  judge: string;
  message: string;
}

export interface DiscussionRound {
  round: number; // Discussion round, starting at 1
  utterances: Utterance[]; // One per judge, panel order
}

// Persona and vote count, kept in the order personas were first voted for.
export type TallyEntry = [persona: string, count: number];

export interface RoundRecord extends DiscussionRound {
  votes: Record<string, string>; // judge -> persona
  tally: TallyEntry[];
}
