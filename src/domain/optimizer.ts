import type {
  Guest,
  GuestRange,
  MenuItem,
  OptimizationConfig,
  OptimizationRun,
  Recommendation,
} from './types.js';
import { partition } from './catalog.js';
import { binomial, combinations } from './combinations.js';
import { searchBestMenu } from './menu-search.js';
import { deriveScoreScales, scoreOutcome } from './scoring.js';
import { DomainError } from './errors.js';
import { logger as rootLogger } from '../logger.js';

const logger = rootLogger.child({ module: 'optimizer' });

export interface OptimizeOptions {
  signal?: AbortSignal;
  /** Epoch milliseconds after which the run stops with `optimization_timeout`. */
  deadlineAt?: number;
}

function createCheckpoint(options: OptimizeOptions): () => void {
  const { signal, deadlineAt } = options;
  return () => {
    if (signal?.aborted) {
      throw new DomainError('optimization_aborted', 'Optimization was cancelled');
    }
    if (deadlineAt !== undefined && Date.now() > deadlineAt) {
      throw new DomainError('optimization_timeout', 'Optimization exceeded its deadline');
    }
  };
}

/**
 * Resolves the guest-count range against the pool. maxGuests above the pool
 * size is clamped (and reported); a range that starts past the pool is empty.
 */
export function resolveGuestRange(config: OptimizationConfig, poolSize: number): GuestRange {
  const max = Math.min(config.maxGuests, poolSize);
  return { min: config.minGuests, max, clamped: max < config.maxGuests };
}

/**
 * Evaluates every guest subset whose size lies in the configured range:
 * 1. Partition the catalog into food and drinks once
 * 2. For each subset size, enumerate subsets in pool order
 * 3. Search the best affordable menu; subsets with none are skipped
 * 4. Score feasible outcomes with scales fixed for the whole run
 *
 * The number of subsets is Σ C(pool, s), so pool size is the practical limit.
 */
export function runOptimization(
  guestPool: readonly Guest[],
  catalog: readonly MenuItem[],
  config: OptimizationConfig,
  options: OptimizeOptions = {}
): OptimizationRun {
  const guestRange = resolveGuestRange(config, guestPool.length);
  const scales = deriveScoreScales(config, guestRange.max);
  const recommendations: Recommendation[] = [];
  let subsetsEvaluated = 0;

  if (guestRange.clamped) {
    logger.warn(
      { requested: config.maxGuests, effective: guestRange.max },
      'maxGuests clamped to guest pool size'
    );
  }

  if (guestPool.length === 0 || guestRange.min > guestRange.max) {
    logger.info(
      { poolSize: guestPool.length, minGuests: guestRange.min },
      'no guest subsets in range'
    );
    return { recommendations, guestRange, subsetsEvaluated, scales };
  }

  const { foodItems, drinkItems } = partition(catalog);
  const checkpoint = createCheckpoint(options);

  let plannedSubsets = 0;
  for (let size = guestRange.min; size <= guestRange.max; size++) {
    plannedSubsets += binomial(guestPool.length, size);
  }
  logger.debug(
    { plannedSubsets, foodItems: foodItems.length, drinkItems: drinkItems.length },
    'optimization started'
  );

  for (let size = guestRange.min; size <= guestRange.max; size++) {
    for (const guests of combinations(guestPool, size)) {
      checkpoint();
      subsetsEvaluated++;

      const outcome = searchBestMenu(
        guests,
        config.budget,
        foodItems,
        drinkItems,
        config.menuBounds,
        { checkpoint }
      );
      if (!outcome) continue;

      recommendations.push(scoreOutcome(guests, outcome, config, scales));
    }
  }

  logger.debug(
    { subsetsEvaluated, recommendations: recommendations.length },
    'optimization finished'
  );

  return { recommendations, guestRange, subsetsEvaluated, scales };
}

/**
 * Unranked recommendations, one per guest subset with an affordable menu.
 * An empty list means the run succeeded and found nothing feasible.
 */
export function optimize(
  guestPool: readonly Guest[],
  catalog: readonly MenuItem[],
  config: OptimizationConfig,
  options: OptimizeOptions = {}
): Recommendation[] {
  return runOptimization(guestPool, catalog, config, options).recommendations;
}
