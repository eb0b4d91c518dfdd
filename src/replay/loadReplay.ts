import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GameLogEntrySchema, type GameLogEntry } from '../types.js';

/**
 * Resolves a replay path. `latest` picks the newest game-*.json in `logDir`;
 * other names are also looked up in `logDir`, with or without `.json`.
 */
export function resolveReplayPath(arg: string, logDir = path.join(process.cwd(), 'logs')): string {
  if (arg === 'latest') {
    if (!fs.existsSync(logDir)) {
      throw new Error(`Log directory not found: ${logDir}`);
    }
    const [newest] = fs
      .readdirSync(logDir)
      .filter(f => f.startsWith('game-') && f.endsWith('.json'))
      .sort()
      .reverse();
    if (!newest) {
      throw new Error(`No game logs found in ${logDir}`);
    }
    return path.join(logDir, newest);
  }

  const candidates = [arg, path.join(logDir, arg)];
  if (!arg.endsWith('.json')) candidates.push(`${arg}.json`, path.join(logDir, `${arg}.json`));
  const found = candidates.find(c => fs.existsSync(c));
  return path.resolve(process.cwd(), found ?? arg);
}

const ReplayFileSchema = z.array(GameLogEntrySchema);

export function loadReplayEntries(filePath: string): GameLogEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Replay file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Failed to parse replay file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = ReplayFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new Error(`Replay file is not a list of log entries${where ? ` (at ${where})` : ''}`);
  }
  return parsed.data;
}

export interface ReplaySpeakers {
  personas: string[];
  judges: string[];
}

/** Speakers in order of first appearance; anyone with a stance is a judge. */
export function inferSpeakers(entries: readonly GameLogEntry[]): ReplaySpeakers {
  const personas: string[] = [];
  const judges: string[] = [];
  for (const entry of entries) {
    if (!entry.player || entry.type === 'PROMPT') continue;
    const bucket = entry.metadata?.stance ? judges : personas;
    if (!personas.includes(entry.player) && !judges.includes(entry.player)) bucket.push(entry.player);
  }
  return { personas, judges };
}
