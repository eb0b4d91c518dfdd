import test from 'node:test';
import assert from 'node:assert/strict';
import { CallbackCompletionService, type CompletionCallback } from './completion.js';
import { ScriptedHumanInput } from './humanInput.js';
import { logger } from './logger.js';
import { OpinionGenerator } from './opinionGenerator.js';
import { HumanParticipant, Participant } from './participant.js';
import { Persona } from './persona.js';
import { Transcript } from './transcript.js';

logger.setConsoleOutputEnabled(false);

function persona(name: string): Persona {
  return new Persona({ name, profile: `${name} the tester`, personality: 'q', background: 'r', speech_style: 'terse' });
}

function game() {
  const people = [persona('Ana'), persona('Ben'), persona('Cal')];
  const transcript = new Transcript(people);
  transcript.recordQuestion({ text: 'Favourite colour?', category: 'Opinion' });
  people.forEach(p => p.addResponse(1, `${p.name} likes blue.`));
  people.forEach(p => p.addSuspicion(1, `${p.name} suspects nobody.`));
  return { people, transcript };
}

function simulated(name: 'Ana' | 'Ben' | 'Cal', callback: CompletionCallback) {
  const { people, transcript } = game();
  const target = people.find(p => p.name === name);
  assert.ok(target);
  const service = new CallbackCompletionService(callback);
  return { participant: new Participant(target, new OpinionGenerator(service)), transcript, service };
}

test('Participant.answer: prompt carries the character, the question and introductions', async () => {
  const { participant, transcript, service } = simulated('Ben', () => '  Green, always green.  ');
  participant.persona.setIntroduction('I am Ben.');

  const text = await participant.answer({ text: 'Favourite colour?', category: 'Opinion' }, transcript);

  assert.equal(text, 'Green, always green.');
  const prompt = service.prompts[0] ?? '';
  assert.match(prompt, /^You are Ben, a character/);
  assert.match(prompt, /Speech style: terse/);
  assert.match(prompt, /Introductions:\nBen: "I am Ben\."/);
  assert.match(prompt, /Question \(Opinion\): Favourite colour\?/);
});

test('Participant.answer: failure falls back to an ellipsis', async () => {
  const { participant, transcript } = simulated('Ana', () => {
    throw new Error('offline');
  });
  assert.equal(await participant.answer({ text: 'Q?', category: 'Opinion' }, transcript), '...');
});

test('Participant.formSuspicion: returns text without recording it', async () => {
  const { participant, transcript } = simulated('Cal', () => 'Ana seems human.');
  assert.equal(await participant.formSuspicion(transcript, 1), 'Ana seems human.');
  assert.deepEqual(participant.persona.suspicions, ['Cal suspects nobody.']);
});

test('Participant.castVote: sees everyone\'s suspicions and never votes for itself', async () => {
  const { participant, transcript, service } = simulated('Ana', () => 'Ana');

  const vote = await participant.castVote(transcript);

  assert.equal(vote, 'Ben');
  assert.equal(participant.persona.vote, 'Ben');
  assert.match(service.prompts[0] ?? '', /Suspicions after this round:\nAna: "Ana suspects nobody\."/);
});

test('Participant.castVote: resolves a named player', async () => {
  const { participant, transcript } = simulated('Ana', () => 'Definitely Cal.');
  assert.equal(await participant.castVote(transcript), 'Cal');
});

test('HumanParticipant: answers come from the input', async () => {
  const { people, transcript } = game();
  const [ana] = people;
  assert.ok(ana);
  const input = new ScriptedHumanInput({ answers: ['Blue, like the sea.'], choices: ['cal'] });
  const human = new HumanParticipant(ana, input);

  assert.equal(human.kind, 'human');
  assert.equal(await human.answer({ text: 'Favourite colour?', category: 'Opinion' }, transcript), 'Blue, like the sea.');
  assert.equal(input.asked[0], 'Round 1 (Opinion): Favourite colour?\nAnswer as Ana.');
  assert.equal(await human.castVote(transcript), 'Cal');
  assert.equal(ana.vote, 'Cal');
});

test('HumanParticipant: a scripted vote for oneself falls back to the first other player', async () => {
  const { people, transcript } = game();
  const [ana] = people;
  assert.ok(ana);
  const human = new HumanParticipant(ana, new ScriptedHumanInput({ choices: ['Ana'] }));
  assert.equal(await human.castVote(transcript), 'Ben');
});

function interrogator(callback: CompletionCallback, rng: () => number) {
  const { people, transcript } = game();
  const [ana, ben] = people;
  assert.ok(ana && ben);
  const service = new CallbackCompletionService(callback);
  return { participant: new Participant(ana, new OpinionGenerator(service), rng), ben, transcript, service };
}

test('Participant.chooseTarget: the first round is random and asks nobody', async () => {
  const { participant, transcript, service } = interrogator(() => 'Ben', () => 0.99);
  assert.equal(await participant.chooseTarget(transcript, ['Ben', 'Cal'], 1), 'Cal');
  assert.equal(service.callCount, 0);
});

test('Participant.chooseTarget: later rounds resolve the model\'s pick, else pick at random', async () => {
  const named = interrogator(() => 'I would question BEN.', () => 0.99);
  assert.equal(await named.participant.chooseTarget(named.transcript, ['Ben', 'Cal'], 2), 'Ben');
  assert.match(named.service.prompts[0] ?? '', /^Task: INTERROGATION TARGET$/m);
  assert.match(named.service.prompts[0] ?? '', /Choose one player to question this round: Ben, Cal/);

  const vague = interrogator(() => 'Whoever seems odd.', () => 0);
  assert.equal(await vague.participant.chooseTarget(vague.transcript, ['Ben', 'Cal'], 2), 'Ben');
});

test('Participant.interrogate and answerInterrogation: prompts name both sides', async () => {
  const { participant, ben, transcript, service } = interrogator(
    (_prompt, i) => (i === 0 ? 'Ben, what did you eat today?' : 'Toast, mostly.'),
    () => 0
  );

  assert.equal(await participant.interrogate(ben, transcript, 2), 'Ben, what did you eat today?');
  assert.match(service.prompts[0] ?? '', /You are questioning Ben\.\nAbout Ben:\nProfile: Ben the tester/);
  assert.match(service.prompts[0] ?? '', /Earlier questions to Ben:\n\(none\)/);

  assert.equal(await participant.answerInterrogation('Cal', 'Why so terse?', transcript), 'Toast, mostly.');
  assert.match(service.prompts[1] ?? '', /Cal asks you: "Why so terse\?"/);
});

test('HumanParticipant: interrogation turns come from the input', async () => {
  const { people, transcript } = game();
  const [ana, ben] = people;
  assert.ok(ana && ben);
  const input = new ScriptedHumanInput({ answers: ['Ben, why blue?', 'Because of the sea.'], choices: ['ben'] });
  const human = new HumanParticipant(ana, input);

  assert.equal(await human.chooseTarget(transcript, ['Ben', 'Cal'], 1), 'Ben');
  assert.equal(await human.interrogate(ben), 'Ben, why blue?');
  assert.equal(await human.answerInterrogation('Cal', 'Why so calm?'), 'Because of the sea.');
  assert.deepEqual(input.asked, [
    'Round 1: who will you question?',
    'Ask Ben one question (answerable in 1-2 sentences).',
    'Cal asks you: "Why so calm?"\nAnswer as Ana.',
  ]);
});
