import type { TallyEntry } from '../types.js';

/** Persona name -> number of votes, in the order names were first voted for. */
export type VoteTally = Map<string, number>;

/** Always rebuilt from the full vote list; tallies are never updated in place. */
export function tallyVotes(votes: readonly string[]): VoteTally {
  const tally: VoteTally = new Map();
  for (const vote of votes) {
    tally.set(vote, (tally.get(vote) ?? 0) + 1);
  }
  return tally;
}

export function isUnanimous(tally: VoteTally): boolean {
  return tally.size === 1;
}

/**
 * Name with the most votes. Ties go to the name inserted first; a later name
 * only wins by strictly exceeding the current maximum.
 */
export function resolveMajority(tally: VoteTally): string {
  let best: string | null = null;
  let bestCount = 0;
  for (const [name, count] of tally) {
    if (count > bestCount) {
      best = name;
      bestCount = count;
    }
  }
  if (best === null) throw new Error('Cannot resolve a majority from an empty tally.');
  return best;
}

export function formatTally(tally: VoteTally): string {
  if (tally.size === 0) return '(no votes)';
  return Array.from(tally, ([name, count]) => `${name}: ${count}`).join(', ');
}

export function tallyEntries(tally: VoteTally): TallyEntry[] {
  return Array.from(tally);
}
