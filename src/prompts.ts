import type { Persona } from './persona.js';
import type { DiscussionRound, Question, Stance, Utterance } from './types.js';

// Stances differ only here; the voting and discussion algorithm is shared.
export const STANCE_EMPHASIS: Record<Stance, string> = {
  trait: `Look for human traits: emotional texture, personal anecdotes, hesitation, humour and uneven phrasing. Simulated characters tend to sound polished and evenly paced; a human slips out of character in small ways.`,
  divergence: `Look for divergence: work out the dominant pattern in how the group answers (length, structure, tone, reasoning style) and find the one player who breaks it.`,
  blended: `Weigh two signals explicitly: human traits (emotion, anecdotes, uneven phrasing) and divergence from the group's dominant pattern. Say which signal you trust more for each player you discuss.`,
};

const GAME_PREMISE = `One of the players is a human pretending to be one of these characters; the others are simulated. A panel of judges will try to work out which player is the human.`;

// Vote prompts end with this line; the dry-run service keys off it.
export const NAME_ONLY_INSTRUCTION = `Respond with ONLY the character's name, nothing else.`;

export function describePersona(persona: Persona): string {
  return [
    `Profile: ${persona.profile}`,
    `Personality: ${persona.personality}`,
    `Background: ${persona.background}`,
    `Speech style: ${persona.speechStyle}`,
  ].join('\n');
}

function playersLine(roster: readonly string[]): string {
  return `Players: ${roster.join(', ')}`;
}

function participantHeader(persona: Persona, task: string, roster: readonly string[]): string {
  return `
You are ${persona.name}, a character in a reverse Turing test.
Task: ${task}
${playersLine(roster)}
${GAME_PREMISE}

Your character:
${describePersona(persona)}
  `.trim();
}

// --- Participant prompts ---

export function participantIntroductionPrompt(persona: Persona, roster: readonly string[]): string {
  return `
${participantHeader(persona, 'INTRODUCTION', roster)}

Introduce yourself to the group in 2-3 sentences, in your own speech style. Never mention being simulated or an AI.
  `.trim();
}

export function participantResponsePrompt(
  persona: Persona,
  roster: readonly string[],
  question: Question,
  introductions = ''
): string {
  return `
${participantHeader(persona, 'ANSWER', roster)}
${introductions ? `\nIntroductions:\n${introductions}\n` : ''}
Question (${question.category}): ${question.text}

Answer in 2-3 sentences, in your own speech style. Never mention being simulated or an AI.
  `.trim();
}

export function participantSuspicionPrompt(persona: Persona, roster: readonly string[], roundText: string): string {
  return `
${participantHeader(persona, 'SUSPICION', roster)}

This round's answers:
${roundText}

In 1-2 sentences, say which other player seems most likely to be the human and why.
  `.trim();
}

export function participantVotePrompt(persona: Persona, roster: readonly string[], history: string): string {
  return `
${participantHeader(persona, 'FINAL VOTE', roster)}

Everything said so far:
${history}

Which other player is the human? You may not vote for yourself.
${NAME_ONLY_INSTRUCTION}
  `.trim();
}

// --- Interrogation prompts ---

export function participantTargetPrompt(
  persona: Persona,
  roster: readonly string[],
  candidates: readonly string[],
  history: string
): string {
  return `
${participantHeader(persona, 'INTERROGATION TARGET', roster)}

Everything said so far:
${history || '(nothing yet)'}

Choose one player to question this round: ${candidates.join(', ')}
Pick the one who breaks the pattern the rest of the group follows.
${NAME_ONLY_INSTRUCTION}
  `.trim();
}

export function participantInterrogationPrompt(
  persona: Persona,
  roster: readonly string[],
  target: Persona,
  earlier: string
): string {
  return `
${participantHeader(persona, 'INTERROGATION QUESTION', roster)}

You are questioning ${target.name}.
About ${target.name}:
${describePersona(target)}

Earlier questions to ${target.name}:
${earlier || '(none)'}

Ask ${target.name} ONE question, answerable in 1-2 sentences, that could show whether they are the human. Use your own speech style and reply with the question only.
  `.trim();
}

export function participantInterrogationAnswerPrompt(
  persona: Persona,
  roster: readonly string[],
  interrogator: string,
  question: string
): string {
  return `
${participantHeader(persona, 'INTERROGATION ANSWER', roster)}

${interrogator} asks you: "${question}"

Answer in 1-2 sentences, in your own speech style. Never mention being simulated or an AI.
  `.trim();
}

// --- Judge prompts ---

export interface JudgePromptBase {
  judge: string;
  stance: Stance;
  panel: readonly string[];
  roster: readonly string[];
}

function judgeHeader(base: JudgePromptBase, task: string): string {
  return `
You are Judge ${base.judge}, one of ${base.panel.length} judges (${base.panel.join(', ')}) in a reverse Turing test.
Task: ${task}
${playersLine(base.roster)}
${GAME_PREMISE}

Your analytical stance: ${STANCE_EMPHASIS[base.stance]}
  `.trim();
}

export function judgeSuspicionPrompt(base: JudgePromptBase, round: number, roundText: string): string {
  return `
${judgeHeader(base, 'SUSPICION')}

Round ${round} answers:
${roundText}

In 1-2 sentences, name the player who seems most likely to be the human this round and say why.
  `.trim();
}

export function judgeVotePrompt(base: JudgePromptBase, history: string): string {
  return `
${judgeHeader(base, 'FINAL VOTE')}

Full game history:
${history}

Which player is the human?
${NAME_ONLY_INSTRUCTION}
  `.trim();
}

export interface DiscussionPromptInput extends JudgePromptBase {
  history: string;
  tally: string;
  ownVote: string | null;
  earlierRounds: readonly DiscussionRound[];
  currentRound: readonly Utterance[];
  round: number;
  maxChars: number;
}

export function formatUtterances(utterances: readonly Utterance[]): string {
  return utterances.map(u => `Judge ${u.judge}: "${u.message}"`).join('\n');
}

export function formatDiscussion(records: readonly DiscussionRound[]): string {
  return records
    .map(r => [`--- Discussion round ${r.round} ---`, formatUtterances(r.utterances)].join('\n'))
    .join('\n\n');
}

export function judgeDiscussionPrompt(input: DiscussionPromptInput): string {
  const others = input.panel.filter(n => n !== input.judge);
  return `
${judgeHeader(input, 'PANEL DISCUSSION')}

Full game history:
${input.history}

Current vote tally: ${input.tally}
Your current vote: ${input.ownVote ?? '(none)'}

Earlier discussion:
${input.earlierRounds.length ? formatDiscussion(input.earlierRounds) : '(none)'}

Discussion round ${input.round} so far:
${input.currentRound.length ? formatUtterances(input.currentRound) : '(you speak first)'}

Speak only as Judge ${input.judge}. Never write lines for ${others.join(' or ')} and never claim to be them.
Do not repeat points already made: respond to a specific argument or add a new one.
Keep it under ${input.maxChars} characters.
  `.trim();
}

export function judgeRevotePrompt(
  base: JudgePromptBase,
  history: string,
  discussion: readonly DiscussionRound[],
  previousVote: string
): string {
  return `
${judgeHeader(base, 'REVISED VOTE')}

Full game history:
${history}

Panel discussion:
${discussion.length ? formatDiscussion(discussion) : '(none)'}

Your previous vote: ${previousVote}
Having heard the panel, which player is the human? You may keep your vote or change it.
${NAME_ONLY_INSTRUCTION}
  `.trim();
}
