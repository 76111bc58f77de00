import { describe, it, expect } from 'vitest';
import { partition } from '../domain/catalog.js';
import { combinations } from '../domain/combinations.js';
import { searchBestMenu } from '../domain/menu-search.js';
import { optimize, runOptimization } from '../domain/optimizer.js';
import { deriveScoreScales } from '../domain/scoring.js';
import { rank } from '../domain/ranking.js';
import { DomainError } from '../domain/errors.js';
import { createGuest, createMenuItem } from '../domain/validation.js';
import { createRng, defaultCatalog, generateGuests } from '../domain/sample-data.js';
import { scenarioCatalog, scenarioConfig, scenarioGuests } from './fixtures.js';

const ONE_AND_ONE = { food: { min: 1, max: 1 }, drink: { min: 1, max: 1 } };

describe('Optimizer', () => {
  describe('Catalog partition', () => {
    it('splits food and drinks keeping catalog order', () => {
      const catalog = [
        createMenuItem({ name: 'Tea', unitCost: 1.89, category: 'drink' }),
        createMenuItem({ name: 'Cookies', unitCost: 1.99, category: 'dessert' }),
        createMenuItem({ name: 'Chicken', unitCost: 5.7, category: 'main' }),
        createMenuItem({ name: 'Soda', unitCost: 2.49, category: 'drink' }),
      ];

      const { foodItems, drinkItems } = partition(catalog);

      expect(foodItems.map((i) => i.name)).toEqual(['Cookies', 'Chicken']);
      expect(drinkItems.map((i) => i.name)).toEqual(['Tea', 'Soda']);
    });

    it('returns empty groups for an empty catalog', () => {
      expect(partition([])).toEqual({ foodItems: [], drinkItems: [] });
    });
  });

  describe('Combinations', () => {
    it('yields k-combinations in index order', () => {
      expect([...combinations(['a', 'b', 'c'], 2)]).toEqual([
        ['a', 'b'],
        ['a', 'c'],
        ['b', 'c'],
      ]);
    });

    it('yields nothing when size exceeds the input', () => {
      expect([...combinations(['a'], 2)]).toEqual([]);
    });
  });

  describe('Menu search', () => {
    it('finds Chicken and Soda for both guests', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());

      const outcome = searchBestMenu(scenarioGuests(), 30, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome).not.toBeNull();
      expect(outcome?.items.map((i) => i.name)).toEqual(['Chicken', 'Soda']);
      expect(outcome?.satisfaction).toBe(15);
      expect(outcome?.totalCost).toBe(16.38);
    });

    it('accepts a menu costing exactly the budget', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());
      const [tom] = scenarioGuests();

      const outcome = searchBestMenu([tom], 8.19, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome?.items.map((i) => i.name)).toEqual(['Chicken', 'Soda']);
      expect(outcome?.totalCost).toBe(8.19);
    });

    it('uses larger menus when the bounds allow them', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());
      const [tom] = scenarioGuests();

      const outcome = searchBestMenu([tom], 100, foodItems, drinkItems, {
        food: { min: 1, max: 2 },
        drink: { min: 1, max: 1 },
      });

      expect(outcome?.items.map((i) => i.name)).toEqual(['Chicken', 'Chips', 'Soda']);
      expect(outcome?.satisfaction).toBe(13);
      expect(outcome?.totalCost).toBe(11.18);
    });

    it('keeps the first menu on a satisfaction tie even when a later one is cheaper', () => {
      const catalog = [
        createMenuItem({ name: 'Lasagna', unitCost: 2, category: 'main' }),
        createMenuItem({ name: 'Pizza', unitCost: 1, category: 'main' }),
        createMenuItem({ name: 'Water', unitCost: 1, category: 'drink' }),
      ];
      const guest = createGuest({
        name: 'Kim',
        intimacy: 5,
        preferences: { Lasagna: 3, Pizza: 3, Water: 1 },
      });
      const { foodItems, drinkItems } = partition(catalog);

      const outcome = searchBestMenu([guest], 100, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome?.items.map((i) => i.name)).toEqual(['Lasagna', 'Water']);
      expect(outcome?.totalCost).toBe(3);
    });

    it('treats unrated items as zero instead of rejecting the menu', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());
      const guest = createGuest({ name: 'New', intimacy: 3 });

      const outcome = searchBestMenu([guest], 100, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome?.satisfaction).toBe(0);
      expect(outcome?.items.map((i) => i.name)).toEqual(['Chicken', 'Soda']);
    });

    it('rejects a menu whose sub-cent costs push it past the budget', () => {
      const foodItems = [createMenuItem({ name: 'Cake', unitCost: 14.998, category: 'dessert' })];
      const drinkItems = [createMenuItem({ name: 'Water', unitCost: 0.004, category: 'drink' })];

      const outcome = searchBestMenu(scenarioGuests(), 30, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome).toBeNull();
    });

    it('rounds only the reported cost of a sub-cent menu', () => {
      const foodItems = [createMenuItem({ name: 'Cake', unitCost: 14.996, category: 'dessert' })];
      const drinkItems = [createMenuItem({ name: 'Water', unitCost: 0.001, category: 'drink' })];

      const outcome = searchBestMenu(scenarioGuests(), 30, foodItems, drinkItems, ONE_AND_ONE);

      expect(outcome?.totalCost).toBe(29.99);
    });

    it('ignores ratings inherited from Object.prototype', () => {
      const foodItems = [createMenuItem({ name: 'toString', unitCost: 2, category: 'snack' })];
      const drinkItems = [createMenuItem({ name: 'Water', unitCost: 1, category: 'drink' })];
      const guest = createGuest({ name: 'Lee', intimacy: 4, preferences: { Water: 3 } });

      const outcome = searchBestMenu([guest], 10, foodItems, drinkItems, ONE_AND_ONE);
      const [recommendation] = optimize(
        [guest],
        [...foodItems, ...drinkItems],
        scenarioConfig({ budget: 10, maxGuests: 1 })
      );

      expect(outcome?.satisfaction).toBe(3);
      expect(recommendation.satisfaction).toBe(3);
      expect(Number.isFinite(recommendation.happiness)).toBe(true);
    });

    it('returns null when the minimum counts cannot be met', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());

      const outcome = searchBestMenu(scenarioGuests(), 100, foodItems, drinkItems, {
        food: { min: 3, max: 3 },
        drink: { min: 1, max: 1 },
      });

      expect(outcome).toBeNull();
    });

    it('returns null for no guests or a non-positive budget', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());

      expect(searchBestMenu([], 100, foodItems, drinkItems, ONE_AND_ONE)).toBeNull();
      expect(searchBestMenu(scenarioGuests(), 0, foodItems, drinkItems, ONE_AND_ONE)).toBeNull();
    });

    it('calls the checkpoint once per food combination', () => {
      const { foodItems, drinkItems } = partition(scenarioCatalog());
      let calls = 0;

      searchBestMenu(
        scenarioGuests(),
        100,
        foodItems,
        drinkItems,
        { food: { min: 1, max: 3 }, drink: { min: 1, max: 2 } },
        { checkpoint: () => calls++ }
      );

      // {Chicken}, {Chips}, {Chicken, Chips}
      expect(calls).toBe(3);
    });
  });

  describe('Optimization run', () => {
    it('recommends both guests with Chicken and Soda at 16.38', () => {
      const recommendations = optimize(scenarioGuests(), scenarioCatalog(), scenarioConfig());

      expect(recommendations).toHaveLength(3);
      const both = recommendations.find((r) => r.guestCount === 2);
      expect(both?.guestNames).toEqual(['Tom', 'Ariel']);
      expect(both?.selectedItems).toEqual(['Chicken', 'Soda']);
      expect(both?.unitCosts).toEqual({ Chicken: 5.7, Soda: 2.49 });
      expect(both?.itemCategories).toEqual({ Chicken: 'main', Soda: 'drink' });
      expect(both?.totalCost).toBe(16.38);
      expect(both?.savings).toBe(13.62);
      expect(both?.satisfaction).toBe(15);
      expect(both?.totalIntimacy).toBe(13);
      expect(both?.efficiency).toBe(15 / 16.38);
    });

    it('returns subsets in enumeration order with their own best menus', () => {
      const recommendations = optimize(scenarioGuests(), scenarioCatalog(), scenarioConfig());

      expect(recommendations.map((r) => r.guestNames)).toEqual([['Tom'], ['Ariel'], ['Tom', 'Ariel']]);
      expect(recommendations[1].selectedItems).toEqual(['Chicken', 'Tea']);
      expect(recommendations[1].totalCost).toBe(7.59);
    });

    it('scores happiness with run-wide scales', () => {
      const run = runOptimization(scenarioGuests(), scenarioCatalog(), scenarioConfig());

      expect(run.scales).toEqual({ satisfaction: 20, savings: 30, intimacy: 20 });
      const [tom, ariel, both] = run.recommendations;
      // 0.5·15/20 + 0.3·13.62/30 + 0.2·13/20
      expect(both.happiness).toBeCloseTo(0.6412, 10);
      expect(tom.happiness).toBeCloseTo(0.5381, 10);
      expect(ariel.happiness).toBeCloseTo(0.4591, 10);
      expect(rank(run.recommendations).map((r) => r.guestCount)).toEqual([2, 1, 1]);
    });

    it('returns an empty list when no menu fits the budget', () => {
      const recommendations = optimize(
        scenarioGuests(),
        scenarioCatalog(),
        scenarioConfig({ budget: 4 })
      );

      expect(recommendations).toEqual([]);
    });

    it('returns an empty list for an empty guest pool', () => {
      expect(optimize([], scenarioCatalog(), scenarioConfig())).toEqual([]);
    });

    it('returns an empty list when the catalog has no drinks', () => {
      const foodOnly = scenarioCatalog().filter((i) => i.category !== 'drink');

      expect(optimize(scenarioGuests(), foodOnly, scenarioConfig())).toEqual([]);
    });

    it('clamps maxGuests to the pool size and reports it', () => {
      const run = runOptimization(
        scenarioGuests(),
        scenarioCatalog(),
        scenarioConfig({ maxGuests: 8 })
      );

      expect(run.guestRange).toEqual({ min: 1, max: 2, clamped: true });
      expect(run.subsetsEvaluated).toBe(3);
    });

    it('evaluates nothing when minGuests exceeds the pool', () => {
      const run = runOptimization(
        scenarioGuests(),
        scenarioCatalog(),
        scenarioConfig({ minGuests: 3, maxGuests: 5 })
      );

      expect(run.recommendations).toEqual([]);
      expect(run.subsetsEvaluated).toBe(0);
      expect(run.guestRange).toEqual({ min: 3, max: 2, clamped: true });
    });

    it('stops with optimization_aborted when the signal is aborted', () => {
      const controller = new AbortController();
      controller.abort();

      expect(() =>
        optimize(scenarioGuests(), scenarioCatalog(), scenarioConfig(), { signal: controller.signal })
      ).toThrow(DomainError);
      expect(() =>
        optimize(scenarioGuests(), scenarioCatalog(), scenarioConfig(), { signal: controller.signal })
      ).toThrow('optimization_aborted');
    });

    it('stops with optimization_timeout past the deadline', () => {
      expect(() =>
        optimize(scenarioGuests(), scenarioCatalog(), scenarioConfig(), { deadlineAt: 0 })
      ).toThrow('optimization_timeout');
    });
  });

  describe('Properties over generated data', () => {
    const catalog = defaultCatalog();
    const guests = generateGuests(
      createRng(11),
      6,
      catalog.map((i) => i.name)
    );
    const config = scenarioConfig({
      budget: 60,
      maxGuests: 4,
      weights: { satisfaction: 0.4, savings: 0.2, intimacy: 0.4 },
      menuBounds: { food: { min: 1, max: 3 }, drink: { min: 1, max: 2 } },
    });

    it('never exceeds the budget and keeps savings and efficiency consistent', () => {
      const recommendations = optimize(guests, catalog, config);

      expect(recommendations.length).toBeGreaterThan(0);
      for (const r of recommendations) {
        expect(r.totalCost).toBeLessThanOrEqual(config.budget);
        expect(r.savings).toBeCloseTo(config.budget - r.totalCost, 10);
        expect(r.efficiency).toBe(r.totalCost > 0 ? r.satisfaction / r.totalCost : 0);
        expect(r.guestCount).toBe(r.guestNames.length);
      }
    });

    it('ranks by happiness then satisfaction', () => {
      const ranked = rank(optimize(guests, catalog, config));

      for (let i = 1; i < ranked.length; i++) {
        const a = ranked[i - 1];
        const b = ranked[i];
        expect(
          a.happiness > b.happiness || (a.happiness === b.happiness && a.satisfaction >= b.satisfaction)
        ).toBe(true);
      }
    });

    it('produces identical output for identical inputs', () => {
      expect(optimize(guests, catalog, config)).toEqual(optimize(guests, catalog, config));
    });

    it('keeps every normalized term within [0, 1]', () => {
      const scales = deriveScoreScales(config, 4);

      for (const r of optimize(guests, catalog, config)) {
        expect(r.satisfaction / scales.satisfaction).toBeLessThanOrEqual(1);
        expect(r.savings / scales.savings).toBeLessThanOrEqual(1);
        expect(r.totalIntimacy / scales.intimacy).toBeLessThanOrEqual(1);
        expect(r.happiness).toBeGreaterThanOrEqual(0);
        expect(r.happiness).toBeLessThanOrEqual(1);
      }
    });
  });
});
