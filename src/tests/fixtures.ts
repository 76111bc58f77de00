import type { Guest, MenuItem, OptimizationConfig, Recommendation } from '../domain/types.js';
import { createGuest, createMenuItem, createOptimizationConfig } from '../domain/validation.js';

export function scenarioCatalog(): MenuItem[] {
  return [
    createMenuItem({ name: 'Chicken', unitCost: 5.7, category: 'main' }),
    createMenuItem({ name: 'Chips', unitCost: 2.99, category: 'snack' }),
    createMenuItem({ name: 'Soda', unitCost: 2.49, category: 'drink' }),
    createMenuItem({ name: 'Tea', unitCost: 1.89, category: 'drink' }),
  ];
}

export function scenarioGuests(): Guest[] {
  return [
    createGuest({
      name: 'Tom',
      intimacy: 7,
      preferences: { Chicken: 5, Chips: 3, Soda: 5, Tea: 1 },
    }),
    createGuest({
      name: 'Ariel',
      intimacy: 6,
      preferences: { Chicken: 3, Chips: 2, Soda: 2, Tea: 4 },
    }),
  ];
}

export function scenarioConfig(overrides: Record<string, unknown> = {}): OptimizationConfig {
  return createOptimizationConfig({
    budget: 30,
    minGuests: 1,
    maxGuests: 2,
    weights: { satisfaction: 0.5, savings: 0.3, intimacy: 0.2 },
    menuBounds: { food: { min: 1, max: 1 }, drink: { min: 1, max: 1 } },
    ...overrides,
  });
}

export function makeRecommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    guestNames: ['Guest'],
    guestCount: 1,
    selectedItems: ['Chips', 'Tea'],
    unitCosts: { Chips: 2.99, Tea: 1.89 },
    itemCategories: { Chips: 'snack', Tea: 'drink' },
    totalCost: 4.88,
    satisfaction: 4,
    totalIntimacy: 5,
    savings: 5.12,
    efficiency: 4 / 4.88,
    happiness: 0.5,
    ...overrides,
  };
}
