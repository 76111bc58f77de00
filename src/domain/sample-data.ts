/**
 * Seeded sample data: a default catalog and randomly generated guests.
 *
 * All randomness flows through an explicit Rng created from a seed, so the
 * same seed always produces the same guests.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Guest, MenuItem } from './types.js';
import { MAX_INTIMACY, MAX_PREFERENCE, MIN_INTIMACY, MIN_PREFERENCE } from './types.js';
import { createGuest, menuItemSchema } from './validation.js';
import { DomainError } from './errors.js';

export const MAX_GENERATED_GUESTS = 500;
const NAME_ATTEMPTS = 1000;
const INTIMACY_MEAN = 6;
const INTIMACY_STD = 2;

export type Diversity = 'low' | 'medium' | 'high' | 'realistic';
export type IntimacyDistribution = 'normal' | 'uniform' | 'bimodal';

export const DIVERSITY_LEVELS = ['low', 'medium', 'high', 'realistic'] as const;
export const INTIMACY_DISTRIBUTIONS = ['normal', 'uniform', 'bimodal'] as const;

const sampleDataSchema = z.object({
  firstNames: z.array(z.string().min(1)).min(1),
  lastNames: z.array(z.string().min(1)).min(1),
  dietaryOptions: z
    .array(z.object({ tags: z.array(z.string()), weight: z.number().nonnegative() }))
    .min(1),
  catalog: z.array(menuItemSchema),
});

type SampleData = z.infer<typeof sampleDataSchema>;

let cached: SampleData | undefined;

function loadSampleData(): SampleData {
  if (!cached) {
    const raw = readFileSync(new URL('../../data/sample-data.json', import.meta.url), 'utf-8');
    cached = sampleDataSchema.parse(JSON.parse(raw));
  }
  return cached;
}

export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  normal(mean: number, std: number): number;
  shuffle<T>(items: T[]): T[];
}

// mulberry32
export function createRng(seed: number): Rng {
  let t = seed >>> 0;
  const next = () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };

  const int = (min: number, max: number) => min + Math.floor(next() * (max - min + 1));

  return {
    next,
    int,
    pick: (items) => items[int(0, items.length - 1)],
    normal: (mean, std) => {
      // Box-Muller; 1 - next() keeps the log argument above zero
      const u = 1 - next();
      const v = next();
      return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    },
    shuffle: (items) => {
      for (let i = items.length - 1; i > 0; i--) {
        const j = int(0, i);
        [items[i], items[j]] = [items[j], items[i]];
      }
      return items;
    },
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function defaultCatalog(): MenuItem[] {
  return loadSampleData().catalog.map((item) => ({ ...item, tags: [...item.tags] }));
}

export interface GenerateGuestsOptions {
  diversity?: Diversity;
  intimacyDistribution?: IntimacyDistribution;
  /** Names already in use; generated names avoid them (case-insensitive). */
  takenNames?: Iterable<string>;
}

function generateName(rng: Rng, data: SampleData, used: Set<string>): string {
  for (let attempt = 0; attempt < NAME_ATTEMPTS; attempt++) {
    const name = `${rng.pick(data.firstNames)} ${rng.pick(data.lastNames)}`;
    if (!used.has(name.toLowerCase())) {
      used.add(name.toLowerCase());
      return name;
    }
  }

  let name = '';
  do {
    name = `${rng.pick(data.firstNames)} ${rng.pick(data.lastNames)} ${rng.int(1, 9999)}`;
  } while (used.has(name.toLowerCase()));
  used.add(name.toLowerCase());
  return name;
}

function generateIntimacies(rng: Rng, count: number, distribution: IntimacyDistribution): number[] {
  switch (distribution) {
    case 'uniform':
      return Array.from({ length: count }, () => rng.int(MIN_INTIMACY, MAX_INTIMACY));
    case 'bimodal': {
      const half = Math.floor(count / 2);
      const values = [
        ...Array.from({ length: half }, () => rng.int(7, MAX_INTIMACY)),
        ...Array.from({ length: count - half }, () => rng.int(MIN_INTIMACY, 4)),
      ];
      return rng.shuffle(values);
    }
    case 'normal':
      return Array.from({ length: count }, () =>
        clamp(Math.round(rng.normal(INTIMACY_MEAN, INTIMACY_STD)), MIN_INTIMACY, MAX_INTIMACY)
      );
  }
}

function generateDietaryTags(rng: Rng, data: SampleData): string[] {
  const totalWeight = data.dietaryOptions.reduce((sum, option) => sum + option.weight, 0);
  let roll = rng.next() * totalWeight;
  for (const option of data.dietaryOptions) {
    roll -= option.weight;
    if (roll < 0) return [...option.tags];
  }
  return [...data.dietaryOptions[data.dietaryOptions.length - 1].tags];
}

function generatePreferences(
  rng: Rng,
  itemNames: readonly string[],
  diversity: Diversity
): Record<string, number> {
  const preferences: Record<string, number> = {};

  switch (diversity) {
    case 'realistic': {
      const base = rng.next() < 0.6 ? 3 : 4;
      for (const item of itemNames) {
        preferences[item] = clamp(base + rng.int(-2, 2), MIN_PREFERENCE, MAX_PREFERENCE);
      }
      break;
    }
    case 'low': {
      const base = rng.int(2, 4);
      for (const item of itemNames) {
        preferences[item] = clamp(base + rng.int(-1, 1), MIN_PREFERENCE, MAX_PREFERENCE);
      }
      break;
    }
    case 'medium':
    case 'high':
      for (const item of itemNames) {
        preferences[item] = rng.int(MIN_PREFERENCE, MAX_PREFERENCE);
      }
      break;
  }

  return preferences;
}

export function generateGuests(
  rng: Rng,
  count: number,
  itemNames: readonly string[],
  options: GenerateGuestsOptions = {}
): Guest[] {
  if (!Number.isInteger(count) || count < 1 || count > MAX_GENERATED_GUESTS) {
    throw new DomainError(
      'invalid_input',
      `count: must be an integer between 1 and ${MAX_GENERATED_GUESTS}`
    );
  }

  const data = loadSampleData();
  const diversity = options.diversity ?? 'realistic';
  const used = new Set(Array.from(options.takenNames ?? [], (n) => n.toLowerCase()));

  const names = Array.from({ length: count }, () => generateName(rng, data, used));
  const intimacies = generateIntimacies(rng, count, options.intimacyDistribution ?? 'normal');

  return names.map((name, i) =>
    createGuest({
      name,
      intimacy: intimacies[i],
      dietaryTags: generateDietaryTags(rng, data),
      preferences: generatePreferences(rng, itemNames, diversity),
    })
  );
}
