import type { NumericSummary, Recommendation, RecommendationStats } from './types.js';

/**
 * Ranking strategy:
 * 1. Higher happiness first
 * 2. For equal happiness, higher satisfaction first
 * Full ties keep their input order (Array.prototype.sort is stable).
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.happiness !== b.happiness) {
    return b.happiness - a.happiness;
  }
  return b.satisfaction - a.satisfaction;
}

export function rank(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort(compareRecommendations);
}

export function topN(recommendations: readonly Recommendation[], n: number): Recommendation[] {
  if (n <= 0) return [];
  return rank(recommendations).slice(0, n);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Population standard deviation
function summarize(values: readonly number[]): NumericSummary {
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
  return {
    mean: avg,
    std: Math.sqrt(variance),
    min: values.reduce((lo, v) => Math.min(lo, v), Infinity),
    max: values.reduce((hi, v) => Math.max(hi, v), -Infinity),
  };
}

// Most frequent value; ties go to the smallest
function mode(values: readonly number[]): number {
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }

  let best = values[0];
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function statistics(recommendations: readonly Recommendation[]): RecommendationStats | null {
  if (recommendations.length === 0) {
    return null;
  }

  const guestCounts = recommendations.map((r) => r.guestCount);
  const guests = summarize(guestCounts);

  return {
    total: recommendations.length,
    cost: summarize(recommendations.map((r) => r.totalCost)),
    satisfaction: summarize(recommendations.map((r) => r.satisfaction)),
    intimacy: { mean: mean(recommendations.map((r) => r.totalIntimacy)) },
    guests: {
      mean: guests.mean,
      min: guests.min,
      max: guests.max,
      mode: mode(guestCounts),
    },
  };
}
