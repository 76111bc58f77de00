import type {
  FeasibleOutcome,
  Guest,
  ItemCategory,
  OptimizationConfig,
  Recommendation,
  ScoreScales,
} from './types.js';
import { MAX_INTIMACY, MAX_PREFERENCE } from './types.js';
import { roundCents } from './menu-search.js';

/**
 * Normalization constants for one optimization run.
 *
 * - satisfaction: best possible rating sum, MAX_PREFERENCE × maxGuests × largest menu
 * - savings: the whole budget
 * - intimacy: MAX_INTIMACY × maxGuests
 *
 * Each normalized term lands in [0, 1]. The same scales must be used for every
 * recommendation of a run, otherwise happiness values are not comparable.
 */
export function deriveScoreScales(config: OptimizationConfig, maxGuests: number): ScoreScales {
  const guests = Math.max(1, maxGuests);
  const largestMenu = config.menuBounds.food.max + config.menuBounds.drink.max;
  return {
    satisfaction: MAX_PREFERENCE * guests * largestMenu,
    savings: config.budget,
    intimacy: MAX_INTIMACY * guests,
  };
}

export function efficiencyOf(satisfaction: number, totalCost: number): number {
  return totalCost > 0 ? satisfaction / totalCost : 0;
}

export function happinessOf(
  satisfaction: number,
  savings: number,
  intimacy: number,
  config: OptimizationConfig,
  scales: ScoreScales
): number {
  const { weights } = config;
  return (
    weights.satisfaction * (satisfaction / scales.satisfaction) +
    weights.savings * (savings / scales.savings) +
    weights.intimacy * (intimacy / scales.intimacy)
  );
}

export function scoreOutcome(
  guests: readonly Guest[],
  outcome: FeasibleOutcome,
  config: OptimizationConfig,
  scales: ScoreScales
): Recommendation {
  const totalIntimacy = guests.reduce((sum, guest) => sum + guest.intimacy, 0);
  const savings = roundCents(config.budget - outcome.totalCost);

  const unitCosts: Record<string, number> = {};
  const itemCategories: Record<string, ItemCategory> = {};
  for (const item of outcome.items) {
    unitCosts[item.name] = item.unitCost;
    itemCategories[item.name] = item.category;
  }

  return Object.freeze({
    guestNames: guests.map((g) => g.name),
    guestCount: guests.length,
    selectedItems: outcome.items.map((item) => item.name),
    unitCosts,
    itemCategories,
    totalCost: outcome.totalCost,
    satisfaction: outcome.satisfaction,
    totalIntimacy,
    savings,
    efficiency: efficiencyOf(outcome.satisfaction, outcome.totalCost),
    happiness: happinessOf(outcome.satisfaction, savings, totalIntimacy, config, scales),
  });
}
