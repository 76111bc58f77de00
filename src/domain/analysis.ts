import type { Guest, ItemCategory, MenuItem } from './types.js';
import { preferenceOf } from './menu-search.js';

export interface ItemAnalysis {
  name: string;
  unitCost: number;
  category: ItemCategory;
  avgRating: number;
  weightedAvg: number; // ratings weighted by guest intimacy
  numRatings: number;
  popularity: number; // numRatings × avgRating
  value: number; // weightedAvg per unit of cost, 0 for free items
}

export interface GuestSummary {
  name: string;
  intimacy: number;
  itemsRated: number;
  avgPreference: number;
  dietaryTags: string[];
}

/**
 * Per-item rating analysis over the guests who rated it. Items nobody rated
 * are left out. Sorted by popularity, most popular first.
 */
export function analyzeItems(guests: readonly Guest[], catalog: readonly MenuItem[]): ItemAnalysis[] {
  const rows: ItemAnalysis[] = [];

  for (const item of catalog) {
    const raters = guests.filter((g) => preferenceOf(g, item.name) > 0);
    if (raters.length === 0) continue;

    const ratingSum = raters.reduce((sum, g) => sum + preferenceOf(g, item.name), 0);
    const weightedSum = raters.reduce((sum, g) => sum + preferenceOf(g, item.name) * g.intimacy, 0);
    const intimacySum = raters.reduce((sum, g) => sum + g.intimacy, 0);

    const avgRating = ratingSum / raters.length;
    const weightedAvg = intimacySum > 0 ? weightedSum / intimacySum : 0;

    rows.push({
      name: item.name,
      unitCost: item.unitCost,
      category: item.category,
      avgRating,
      weightedAvg,
      numRatings: raters.length,
      popularity: raters.length * avgRating,
      value: item.unitCost > 0 ? weightedAvg / item.unitCost : 0,
    });
  }

  return rows.sort((a, b) => b.popularity - a.popularity);
}

export function summarizeGuests(guests: readonly Guest[]): GuestSummary[] {
  return guests
    .map((g) => {
      const ratings = Object.values(g.preferences);
      return {
        name: g.name,
        intimacy: g.intimacy,
        itemsRated: ratings.length,
        avgPreference: ratings.length > 0 ? ratings.reduce((a, b) => a + b, 0) / ratings.length : 0,
        dietaryTags: [...g.dietaryTags],
      };
    })
    .sort((a, b) => b.intimacy - a.intimacy);
}
