import type { GameLogEntry } from './types.js';

export interface GameLedger {
  questions: Array<{ round: number; category: string; text: string }>;
  interrogations: Array<{ round: number; interrogator: string; target: string; question: string }>;
  playerVotes: Record<string, string>;
  // Round 0 holds the judges' first votes; later rounds their revotes.
  panelVotes: Array<{ round: number; votes: Record<string, string> }>;
  verdict?: { name: string; consensus: boolean };
  win?: string;
}

const QUESTION_PREFIX = /^Question \([^)]*\): /;

/** Summary of a finished (or aborted) game, rebuilt from its public log. */
export function buildGameLedger(entries: readonly GameLogEntry[]): GameLedger {
  const ledger: GameLedger = { questions: [], interrogations: [], playerVotes: {}, panelVotes: [] };

  const publicEntries = entries.filter(e => e.type !== 'PROMPT' && e.metadata?.visibility !== 'private');

  for (const entry of publicEntries) {
    const meta = entry.metadata;
    switch (entry.type) {
      case 'SYSTEM': {
        if (meta?.kind !== 'question' || meta.round === undefined) break;
        const category = typeof meta.category === 'string' ? meta.category : '';
        ledger.questions.push({ round: meta.round, category, text: entry.content.replace(QUESTION_PREFIX, '') });
        break;
      }
      case 'INTERROGATION': {
        if (!entry.player || meta?.round === undefined) break;
        const target = typeof meta.target === 'string' ? meta.target : '';
        const question = typeof meta.question === 'string' ? meta.question : entry.content;
        ledger.interrogations.push({ round: meta.round, interrogator: entry.player, target, question });
        break;
      }
      case 'VOTE': {
        if (!entry.player || !meta?.vote) break;
        if (meta.kind === 'player_vote') {
          ledger.playerVotes[entry.player] = meta.vote;
          break;
        }
        const round = meta.round ?? 0;
        let slot = ledger.panelVotes.find(r => r.round === round);
        if (!slot) {
          slot = { round, votes: {} };
          ledger.panelVotes.push(slot);
        }
        slot.votes[entry.player] = meta.vote;
        break;
      }
      case 'VERDICT':
        if (meta?.vote) ledger.verdict = { name: meta.vote, consensus: meta.consensus === true };
        break;
      case 'WIN':
        ledger.win = entry.content;
        break;
      default:
        break;
    }
  }

  return ledger;
}

function formatVotes(votes: Record<string, string>): string {
  return Object.entries(votes)
    .map(([voter, vote]) => `${voter} -> ${vote}`)
    .join(', ');
}

export function formatGameLedger(ledger: GameLedger): string {
  const lines: string[] = [];

  if (ledger.questions.length > 0) {
    lines.push('Questions:');
    for (const q of ledger.questions) {
      lines.push(`  Round ${q.round} (${q.category}): ${q.text}`);
    }
  }

  if (ledger.interrogations.length > 0) {
    lines.push(lines.length > 0 ? '\nInterrogations:' : 'Interrogations:');
    for (const i of ledger.interrogations) {
      lines.push(`  Round ${i.round}: ${i.interrogator} asked ${i.target}: ${i.question}`);
    }
  }

  if (Object.keys(ledger.playerVotes).length > 0) {
    lines.push('\nPlayer Votes:');
    lines.push(`  ${formatVotes(ledger.playerVotes)}`);
  }

  if (ledger.panelVotes.length > 0) {
    lines.push('\nJudge Votes:');
    for (const r of ledger.panelVotes) {
      const label = r.round === 0 ? 'Initial' : `After discussion round ${r.round}`;
      lines.push(`  ${label}: ${formatVotes(r.votes)}`);
    }
  }

  if (ledger.verdict) {
    lines.push(`\nVerdict: ${ledger.verdict.name} (${ledger.verdict.consensus ? 'unanimous' : 'majority'})`);
  }

  if (ledger.win) {
    lines.push(`\n${ledger.win}`);
  }

  return lines.join('\n');
}
