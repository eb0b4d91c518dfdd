import type { CompletionService } from '../completion.js';
import { loadCharacters, loadQuestionBank, selectGameQuestions } from '../content.js';
import { DeliberationEngine, type PanelVerdict } from '../deliberation/engine.js';
import type { HumanInput } from '../humanInput.js';
import { createJudgePanel, type Judge } from '../judge.js';
import { logger } from '../logger.js';
import { OpinionGenerator } from '../opinionGenerator.js';
import { HumanParticipant, Participant, type Player } from '../participant.js';
import { createPersonas, type Persona } from '../persona.js';
import { InterrogationRoundPhase } from '../phases/interrogationRoundPhase.js';
import { IntroductionPhase } from '../phases/introductionPhase.js';
import { QuestionRoundPhase } from '../phases/questionRoundPhase.js';
import { SuspicionPhase } from '../phases/suspicionPhase.js';
import { VerdictPhase } from '../phases/verdictPhase.js';
import { Transcript } from '../transcript.js';
import type { GameConfig, GameLogEntry, GameState, PersonaProfile, Question } from '../types.js';
import { dryRunSeed, errorMessage, isDryRun, mulberry32 } from '../utils.js';

export interface GameEngineOptions {
  config: GameConfig;
  service: CompletionService;
  humanInput: HumanInput;
  // Defaults to the bundled roster and question bank.
  characters?: readonly PersonaProfile[];
  questionBank?: readonly Question[];
  // Persona the human plays; asked through `humanInput` when omitted.
  humanName?: string;
  gameId?: string;
}

/**
 * One self-contained game: its own personas, judges, transcript and log
 * history. Nothing here is shared with other games.
 */
export class GameEngine {
  readonly id: string;
  readonly config: GameConfig;
  readonly personas: Persona[];
  readonly transcript: Transcript;
  readonly judges: Judge[];
  readonly deliberation: DeliberationEngine;
  readonly questions: Question[];
  readonly humanInput: HumanInput;
  // Drives question selection, interrogation order and random target fallbacks.
  readonly rng: () => number;

  state: GameState;
  players: Player[] = [];
  panelVerdict?: PanelVerdict;

  private readonly generator: OpinionGenerator;
  private readonly requestedHuman?: string;

  private introductionPhaseRunner = new IntroductionPhase();
  private questionRoundPhaseRunner = new QuestionRoundPhase();
  private interrogationRoundPhaseRunner = new InterrogationRoundPhase();
  private suspicionPhaseRunner = new SuspicionPhase();
  private verdictPhaseRunner = new VerdictPhase();

  constructor(opts: GameEngineOptions) {
    this.id = opts.gameId ?? 'local';
    this.config = opts.config;
    this.humanInput = opts.humanInput;
    this.requestedHuman = opts.humanName;
    this.generator = new OpinionGenerator(opts.service, { logPrompts: opts.config.log_prompts, gameId: this.id });

    // Fresh persona objects per game; histories never leak between games.
    this.personas = createPersonas(opts.characters ?? loadCharacters());
    this.transcript = new Transcript(this.personas);
    this.judges = createJudgePanel(this.generator, opts.config.judges, {
      utteranceMaxChars: opts.config.utterance_max_chars,
    });
    this.deliberation = new DeliberationEngine({
      maxDiscussionRounds: opts.config.max_discussion_rounds,
      record: entry => this.recordPublic(entry),
    });

    const seed = opts.config.question_seed ?? (isDryRun() ? dryRunSeed() : Date.now());
    this.rng = mulberry32(seed);
    this.questions =
      opts.config.mode === 'standard'
        ? selectGameQuestions(opts.questionBank ?? loadQuestionBank(), opts.config.rounds, this.rng)
        : [];

    logger.registerGame(this.id, { personas: this.personas.map(p => p.name), judges: this.judges });

    this.state = {
      phase: 'setup',
      round: 0,
      humanName: null,
      history: [],
    };
  }

  get humanPlayer(): Player | undefined {
    return this.players.find(p => p.kind === 'human');
  }

  requireHumanName(): string {
    if (!this.state.humanName) throw new Error('No persona has been assigned to the human yet.');
    return this.state.humanName;
  }

  recordPublic(entry: Omit<GameLogEntry, 'id' | 'timestamp'>) {
    const fullEntry = logger.log({
      ...entry,
      game: this.id,
      metadata: { ...(entry.metadata ?? {}), visibility: 'public' },
    });
    this.state.history.push(fullEntry);
  }

  async start() {
    this.recordPublic({ type: 'SYSTEM', content: 'Game Starting...', metadata: { mode: this.config.mode } });

    try {
      await this.assignHuman();
    } catch (error) {
      this.abort('setup failed', error);
    }

    const interrogation = this.config.mode === 'interrogation';
    if (!this.state.abortReason && (this.config.introductions || interrogation)) {
      await this.runPhase('introductions', () => this.introductionPhaseRunner.run(this));
    }

    if (interrogation) {
      for (let round = 1; round <= this.config.rounds && !this.state.abortReason; round++) {
        await this.runPhase('interrogation', () => this.interrogationRoundPhaseRunner.run(this));
        if (this.state.abortReason) break;
        await this.runPhase('suspicion', () => this.suspicionPhaseRunner.run(this));
      }
    } else {
      for (const question of this.questions) {
        if (this.state.abortReason) break;
        await this.runPhase('question', () => this.questionRoundPhaseRunner.run(this, question));
        if (this.state.abortReason) break;
        await this.runPhase('suspicion', () => this.suspicionPhaseRunner.run(this));
      }
    }

    if (!this.state.abortReason) {
      await this.runPhase('verdict', () => this.verdictPhaseRunner.run(this));
    }

    if (this.state.abortReason) {
      this.recordPublic({ type: 'SYSTEM', content: `Game aborted: ${this.state.abortReason}` });
      return;
    }
    this.state.phase = 'game_over';
  }

  /** Drop this game's logger state; the engine's own history stays readable. */
  dispose() {
    logger.releaseGame(this.id);
  }

  private async assignHuman() {
    const names = this.transcript.names;
    const humanName =
      this.requestedHuman ?? (await this.humanInput.choose('Which character will you play?', names));
    const human = this.personas.find(p => p.name === humanName);
    if (!human) throw new Error(`Unknown persona "${humanName}".`);

    this.state.humanName = human.name;
    this.players = this.personas.map(p =>
      p === human ? new HumanParticipant(p, this.humanInput) : new Participant(p, this.generator, this.rng)
    );

    logger.log({
      game: this.id,
      type: 'SYSTEM',
      content: `The human plays ${human.name}.`,
      metadata: { visibility: 'private', kind: 'human_assignment', human: human.name },
    });
    this.recordPublic({
      type: 'SYSTEM',
      content: `Players: ${names.join(', ')}. Judges: ${this.judges.map(j => j.name).join(', ')}.`,
    });
  }

  private async runPhase(phase: GameState['phase'], run: () => Promise<void>) {
    this.state.phase = phase;
    try {
      await run();
    } catch (error) {
      this.abort(`${phase} phase failed`, error);
    }
  }

  private abort(message: string, error: unknown) {
    const details = errorMessage(error);
    this.state.abortReason = `${message}: ${details}`;
    logger.log({
      game: this.id,
      type: 'SYSTEM',
      content: `Engine abort: ${message}: ${details}`,
      metadata: { visibility: 'private', error: details },
    });
  }
}
