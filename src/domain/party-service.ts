import type {
  Guest,
  GuestRange,
  MenuItem,
  Recommendation,
  RecommendationStats,
} from './types.js';
import { db } from '../store/db.js';
import { metricsStore } from '../store/metrics.js';
import { DomainError, isDomainError } from './errors.js';
import { createGuest, createMenuItem, createOptimizationConfig } from './validation.js';
import { runOptimization } from './optimizer.js';
import { statistics, topN } from './ranking.js';
import {
  createRng,
  defaultCatalog,
  generateGuests,
  type Diversity,
  type IntimacyDistribution,
} from './sample-data.js';
import { config } from '../config.js';

// Guests

export function addGuest(input: unknown): Guest {
  const guest = createGuest(input);
  if (db.getGuest(guest.name)) {
    throw new DomainError('duplicate_name', `A guest named '${guest.name}' already exists`);
  }
  db.createGuest(guest);
  return guest;
}

/**
 * Replaces a guest's record. The stored name keeps the original spelling
 * unless the body supplies a case variant of it.
 */
export function updateGuest(name: string, input: unknown): Guest {
  const existing = db.getGuest(name);
  if (!existing) {
    throw new DomainError('not_found', `Guest '${name}' not found`);
  }

  const body = typeof input === 'object' && input !== null ? input : {};
  const guest = createGuest({ name: existing.name, ...body });
  if (guest.name.toLowerCase() !== existing.name.toLowerCase()) {
    throw new DomainError('invalid_input', 'name: cannot be changed');
  }

  db.updateGuest(existing.name, guest);
  return guest;
}

export function removeGuest(name: string): void {
  if (!db.deleteGuest(name)) {
    throw new DomainError('not_found', `Guest '${name}' not found`);
  }
}

// Menu items

export function addMenuItem(input: unknown): MenuItem {
  const item = createMenuItem(input);
  if (db.getMenuItem(item.name)) {
    throw new DomainError('duplicate_name', `A menu item named '${item.name}' already exists`);
  }
  db.createMenuItem(item);
  return item;
}

export function removeMenuItem(name: string): void {
  if (!db.deleteMenuItem(name)) {
    throw new DomainError('not_found', `Menu item '${name}' not found`);
  }
}

// Planning

export interface PlanPartyInput {
  config: unknown;
  top?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface PartyPlan {
  guestRange: GuestRange;
  subsetsEvaluated: number;
  candidates: number;
  recommendations: Recommendation[];
  statistics: RecommendationStats | null;
}

/**
 * Plans a party against the current guest list and catalog.
 *
 * 1. Validates the optimization config (defaults applied here)
 * 2. Runs the optimizer under a deadline
 * 3. Ranks every candidate and keeps the top N
 * 4. Computes statistics over the full candidate pool
 *
 * @throws {DomainError} 'invalid_input' for a bad config
 * @throws {DomainError} 'optimization_timeout' / 'optimization_aborted'
 */
export function planParty(input: PlanPartyInput): PartyPlan {
  const optimizationConfig = createOptimizationConfig(input.config);
  const top = input.top ?? config.TOP_N_DEFAULT;
  const timeoutMs = input.timeoutMs ?? config.OPTIMIZER_TIMEOUT_MS;

  const startTime = Date.now();
  try {
    const run = runOptimization(db.listGuests(), db.listMenuItems(), optimizationConfig, {
      signal: input.signal,
      deadlineAt: startTime + timeoutMs,
    });

    metricsStore.recordRun(run.subsetsEvaluated, run.recommendations.length, Date.now() - startTime);

    return {
      guestRange: run.guestRange,
      subsetsEvaluated: run.subsetsEvaluated,
      candidates: run.recommendations.length,
      recommendations: topN(run.recommendations, top),
      statistics: statistics(run.recommendations),
    };
  } catch (err) {
    if (isDomainError(err, 'optimization_timeout') || isDomainError(err, 'optimization_aborted')) {
      metricsStore.recordFailedRun();
    }
    throw err;
  }
}

// Sample data

export interface LoadSampleDataInput {
  seed: number;
  guestCount: number;
  diversity?: Diversity;
  intimacyDistribution?: IntimacyDistribution;
  replace?: boolean;
}

/**
 * Loads the default catalog when the catalog is empty, then adds generated
 * guests rated against every catalog item. `replace` drops existing guests
 * first.
 */
export function loadSampleData(input: LoadSampleDataInput): { guests: Guest[]; menuItems: MenuItem[] } {
  if (db.countMenuItems() === 0) {
    db.seed({ menuItems: defaultCatalog() });
  }
  if (input.replace) {
    db.clearGuests();
  }

  const menuItems = db.listMenuItems();
  const guests = generateGuests(
    createRng(input.seed),
    input.guestCount,
    menuItems.map((item) => item.name),
    {
      diversity: input.diversity,
      intimacyDistribution: input.intimacyDistribution,
      takenNames: db.listGuests().map((g) => g.name),
    }
  );
  db.seed({ guests });

  return { guests, menuItems };
}
