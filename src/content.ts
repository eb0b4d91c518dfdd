import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { PersonaProfileSchema, QuestionSchema, type PersonaProfile, type Question } from './types.js';
import { shuffleInPlace } from './utils.js';

// `data/` sits next to both `src/` and `dist/`.
const DEFAULT_CHARACTERS_FILE = fileURLToPath(new URL('../data/characters.json', import.meta.url));
const DEFAULT_QUESTIONS_FILE = fileURLToPath(new URL('../data/questions.json', import.meta.url));

function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return schema.parse(raw);
}

export function loadCharacters(filePath = DEFAULT_CHARACTERS_FILE): PersonaProfile[] {
  return readJsonFile(filePath, z.array(PersonaProfileSchema).min(1));
}

export function loadQuestionBank(filePath = DEFAULT_QUESTIONS_FILE): Question[] {
  return readJsonFile(filePath, z.array(QuestionSchema).min(1));
}

/**
 * Pick `count` questions, one per category first (categories in random order),
 * then at random from what is left. Returns copies; the bank is not touched.
 */
export function selectGameQuestions(bank: readonly Question[], count: number, rng: () => number): Question[] {
  const byCategory = new Map<string, Question[]>();
  for (const q of bank) {
    const list = byCategory.get(q.category) ?? [];
    list.push({ ...q });
    byCategory.set(q.category, list);
  }

  const selected: Question[] = [];
  const categories = Array.from(byCategory.keys());
  shuffleInPlace(categories, rng);

  for (const category of categories) {
    if (selected.length >= count) break;
    const pool = byCategory.get(category) ?? [];
    const [picked] = pool.splice(Math.floor(rng() * pool.length), 1);
    if (picked) selected.push(picked);
  }

  const remaining = Array.from(byCategory.values()).flat();
  shuffleInPlace(remaining, rng);
  while (selected.length < count) {
    const next = remaining.pop();
    if (!next) break;
    selected.push(next);
  }

  return selected;
}
