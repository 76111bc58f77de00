import type { FeasibleOutcome, Guest, MenuCountBounds, MenuItem } from './types.js';
import { combinations } from './combinations.js';

export interface SearchOptions {
  /** Called once per food combination; throw from it to stop the search. */
  checkpoint?: () => void;
}

// Tolerance for float noise in cost sums (5.7 + 2.49).
const COST_EPSILON = 1e-9;

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function preferenceOf(guest: Guest, itemName: string): number {
  return Object.hasOwn(guest.preferences, itemName) ? guest.preferences[itemName] : 0;
}

/**
 * Sum of every guest's rating for every item on the menu. Unrated items
 * count as 0.
 */
export function menuSatisfaction(menu: readonly MenuItem[], guests: readonly Guest[]): number {
  let total = 0;
  for (const item of menu) {
    for (const guest of guests) {
      total += preferenceOf(guest, item.name);
    }
  }
  return total;
}

/**
 * Exhaustive search for the highest-satisfaction menu the guest subset can
 * afford.
 *
 * Enumeration order: food count k ascending, each k-combination of food in
 * catalog order, then drink count m ascending and each m-combination of
 * drinks. The first feasible menu is kept until a later one has strictly
 * greater satisfaction, so ties go to the earliest menu regardless of cost.
 *
 * Cost is `guests × Σ unitCost`. The unrounded cost is checked against the
 * budget; only the reported `totalCost` is rounded to cents.
 * Returns null when nothing is feasible.
 */
export function searchBestMenu(
  guests: readonly Guest[],
  budget: number,
  foodItems: readonly MenuItem[],
  drinkItems: readonly MenuItem[],
  bounds: MenuCountBounds,
  options: SearchOptions = {}
): FeasibleOutcome | null {
  if (guests.length === 0 || budget <= 0) {
    return null;
  }
  if (foodItems.length < bounds.food.min || drinkItems.length < bounds.drink.min) {
    return null;
  }

  const guestCount = guests.length;
  const maxFood = Math.min(bounds.food.max, foodItems.length);
  const maxDrink = Math.min(bounds.drink.max, drinkItems.length);

  let best: FeasibleOutcome | null = null;

  for (let k = bounds.food.min; k <= maxFood; k++) {
    for (const foodCombo of combinations(foodItems, k)) {
      options.checkpoint?.();
      const foodUnitCost = foodCombo.reduce((sum, item) => sum + item.unitCost, 0);

      for (let m = bounds.drink.min; m <= maxDrink; m++) {
        for (const drinkCombo of combinations(drinkItems, m)) {
          const unitCost = drinkCombo.reduce((sum, item) => sum + item.unitCost, foodUnitCost);
          const rawCost = unitCost * guestCount;
          if (rawCost > budget + COST_EPSILON) continue;

          const menu = [...foodCombo, ...drinkCombo];
          const satisfaction = menuSatisfaction(menu, guests);
          if (best === null || satisfaction > best.satisfaction) {
            best = { satisfaction, items: menu, totalCost: roundCents(rawCost) };
          }
        }
      }
    }
  }

  return best;
}
