import { z } from 'zod';
import {
  ITEM_CATEGORIES,
  MAX_INTIMACY,
  MAX_PREFERENCE,
  MIN_INTIMACY,
  MIN_PREFERENCE,
  type Guest,
  type MenuItem,
  type OptimizationConfig,
} from './types.js';
import { DomainError } from './errors.js';

export const MAX_BUDGET = 10000;
export const DEFAULT_MAX_GUESTS = 8;
export const WEIGHT_TOLERANCE = 0.01;

export const DEFAULT_WEIGHTS = { satisfaction: 0.4, savings: 0.2, intimacy: 0.4 };

/**
 * Menu composition policy: between 1 and 3 shareable food items and between
 * 1 and 2 drinks. Applied here when a config omits `menuBounds`; the search
 * itself always receives explicit bounds.
 */
export const DEFAULT_MENU_BOUNDS = {
  food: { min: 1, max: 3 },
  drink: { min: 1, max: 2 },
};

export const guestSchema = z.object({
  name: z.string().trim().min(1),
  preferences: z
    .record(z.string().min(1), z.number().int().min(MIN_PREFERENCE).max(MAX_PREFERENCE))
    .default({}),
  intimacy: z.number().int().min(MIN_INTIMACY).max(MAX_INTIMACY),
  dietaryTags: z.array(z.string().trim().min(1)).default([]),
});

export const menuItemSchema = z.object({
  name: z.string().trim().min(1),
  unitCost: z.number().finite().nonnegative(),
  category: z.enum(ITEM_CATEGORIES),
  tags: z.array(z.string().trim().min(1)).default([]),
});

const countRangeSchema = z
  .object({
    min: z.number().int().min(1),
    max: z.number().int().min(1),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const weightsSchema = z
  .object({
    satisfaction: z.number().nonnegative(),
    savings: z.number().nonnegative(),
    intimacy: z.number().nonnegative(),
  })
  .refine(
    (w) => Math.abs(w.satisfaction + w.savings + w.intimacy - 1) <= WEIGHT_TOLERANCE,
    { message: 'weights must sum to 1.0' }
  );

export const optimizationConfigSchema = z
  .object({
    budget: z.number().positive().max(MAX_BUDGET),
    minGuests: z.number().int().min(1).default(1),
    maxGuests: z.number().int().min(1).default(DEFAULT_MAX_GUESTS),
    weights: weightsSchema.default(DEFAULT_WEIGHTS),
    menuBounds: z
      .object({ food: countRangeSchema, drink: countRangeSchema })
      .default(DEFAULT_MENU_BOUNDS),
  })
  .refine((c) => c.minGuests <= c.maxGuests, {
    message: 'minGuests must not exceed maxGuests',
    path: ['minGuests'],
  });

export function formatZodError(err: z.ZodError): string {
  return err.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new DomainError('invalid_input', formatZodError(result.error));
  }
  return result.data;
}

export function createGuest(input: unknown): Guest {
  return parseOrThrow(guestSchema, input);
}

export function createMenuItem(input: unknown): MenuItem {
  return parseOrThrow(menuItemSchema, input);
}

export function createOptimizationConfig(input: unknown): OptimizationConfig {
  return parseOrThrow(optimizationConfigSchema, input);
}
