import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType, Stance } from './types.js';
import { eventBus, type EventFilter, type Listener, type Unsubscribe } from './events/index.js';

const STANCE_COLORS: Record<Stance, (text: string) => string> = {
  trait: chalk.magenta,
  divergence: chalk.cyan,
  blended: chalk.yellow,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  INTRODUCTION: chalk.white,
  RESPONSE: chalk.white,
  INTERROGATION: chalk.cyanBright,
  SUSPICION: chalk.yellow,
  VOTE: chalk.blue,
  DISCUSSION: chalk.magentaBright,
  VERDICT: chalk.bgMagenta.white,
  WIN: chalk.green.bold,
  PROMPT: chalk.gray.italic,
};

const PERSONA_COLOR = chalk.hex('#FFA500');

function isTruthyEnv(name: string): boolean {
  const v = (process.env[name] ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

/** What the console needs to colour one game's speakers. */
export interface GameStyle {
  personas: readonly string[];
  judges: ReadonlyArray<{ name: string; stance: Stance }>;
}

interface RegisteredGame {
  personaPattern: RegExp | null;
  stances: Map<string, Stance>;
}

interface GameFiles {
  log: string;
  transcript: string;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class GameLogger {
  private logs: GameLogEntry[] = [];
  private games = new Map<string, RegisteredGame>();
  private files = new Map<string, GameFiles>();
  private consoleOutputEnabled = true;
  private persistenceEnabled = false;

  constructor() {
    // The logger listens on the global bus like every other consumer.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable or disable writing `logs/game-*.json` and `logs/transcript-*.txt`,
   * one pair per game.
   *
   * Off by default so tests and library callers leave no files behind; the CLI
   * turns it on. File names are fixed on a game's first write.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
    if (enabled) {
      for (const id of this.games.keys()) this.flush(id);
    }
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /** Start colouring a game's personas and judges; entries carry `game: id`. */
  registerGame(id: string, style: GameStyle) {
    const escaped = style.personas.map(escapeRegExp);
    this.games.set(id, {
      personaPattern: escaped.length ? new RegExp(`(${escaped.join('|')})`, 'g') : null,
      stances: new Map(style.judges.map(j => [j.name, j.stance] as const)),
    });
  }

  /**
   * Forget a finished game: its styling, its file names and its in-memory
   * entries. Files already written stay on disk.
   */
  releaseGame(id: string) {
    this.games.delete(id);
    this.files.delete(id);
    this.logs = this.logs.filter(e => e.game !== id);
  }

  get registeredGames(): number {
    return this.games.size;
  }

  subscribe(cb: Listener<GameLogEntry>, filter?: EventFilter<GameLogEntry>): Unsubscribe {
    return eventBus.subscribe(cb, filter);
  }

  /** Entries in emission order; with a game id, that game's entries only. */
  getLogs(gameId?: string): GameLogEntry[] {
    if (gameId === undefined) return this.logs.slice();
    return this.logs.filter(e => e.game === gameId);
  }

  /**
   * Materialize an entry (id, timestamp, judge stance) and publish it on the
   * event bus. Callers should not mutate the returned object.
   */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private stanceOf(entry: GameLogEntry): Stance | undefined {
    if (entry.metadata?.stance) return entry.metadata.stance;
    if (!entry.player || entry.game === undefined) return undefined;
    return this.games.get(entry.game)?.stances.get(entry.player);
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    if (entry.metadata && 'stance' in entry.metadata) return entry;
    const stance = this.stanceOf(entry);
    if (stance === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), stance },
    };
  }

  private handleEntry(entry: GameLogEntry) {
    this.logs.push(entry);
    if (entry.game !== undefined) {
      this.flush(entry.game);
    } else {
      for (const id of this.files.keys()) this.flush(id);
    }

    if (!this.consoleOutputEnabled) return;

    // Prompts are noisy; only print them on request.
    if (entry.type === 'PROMPT' && !isTruthyEnv('REVERSE_TURING_PRINT_PROMPTS')) return;

    console.log(this.formatConsoleLine(entry));
  }

  formatConsoleLine(entry: GameLogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let speaker = '';
    if (entry.player) {
      const stance = this.stanceOf(entry);
      speaker = stance
        ? ` <${STANCE_COLORS[stance](`Judge ${entry.player}`)}>`
        : ` <${PERSONA_COLOR(entry.player)}>`;
    }

    const pattern = entry.game === undefined ? null : this.games.get(entry.game)?.personaPattern;
    const content = pattern ? entry.content.replace(pattern, match => PERSONA_COLOR(match)) : entry.content;

    return `${prefix} ${typeStr}${speaker}: ${content}`;
  }

  // A game's files hold its own entries plus untagged session lines (config, dry-run notices).
  private flush(gameId: string) {
    if (!this.persistenceEnabled || !this.games.has(gameId)) return;
    let files = this.files.get(gameId);
    if (!files) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const suffix = gameId.slice(0, 8);
      const logDir = path.join(process.cwd(), 'logs');
      fs.mkdirSync(logDir, { recursive: true });
      files = {
        log: path.join(logDir, `game-${timestamp}-${suffix}.json`),
        transcript: path.join(logDir, `transcript-${timestamp}-${suffix}.txt`),
      };
      this.files.set(gameId, files);
    }
    const entries = this.logs.filter(e => e.game === undefined || e.game === gameId);
    fs.writeFileSync(files.log, JSON.stringify(entries, null, 2));
    fs.writeFileSync(files.transcript, buildTranscriptText(entries));
  }
}

/**
 * Plain-text transcript of the public part of a game. Private entries
 * (prompts, service failures) are left out.
 */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    if (entry.type === 'PROMPT') continue;
    if (entry.metadata?.visibility === 'private') continue;

    switch (entry.type) {
      case 'SYSTEM':
        lines.push(`[SYSTEM] ${entry.content}`);
        break;
      case 'DISCUSSION':
      case 'SUSPICION':
      case 'RESPONSE':
      case 'INTRODUCTION': {
        const who = entry.player ?? 'Unknown';
        const label = entry.metadata?.stance ? `Judge ${who}` : who;
        lines.push(`${label}: ${entry.content}`);
        break;
      }
      case 'INTERROGATION':
        lines.push(`${entry.player ?? 'Unknown'} ${entry.content}`);
        break;
      case 'VOTE':
        lines.push(`[VOTE] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd());
        break;
      default:
        lines.push(`[${entry.type}] ${entry.content}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export const logger = new GameLogger();
