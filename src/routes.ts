import express from 'express';
import { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { db } from './store/db.js';
import { metricsStore } from './store/metrics.js';
import { partition } from './domain/catalog.js';
import { analyzeItems, summarizeGuests } from './domain/analysis.js';
import { DomainError } from './domain/errors.js';
import { ITEM_CATEGORIES } from './domain/types.js';
import {
  addGuest,
  addMenuItem,
  loadSampleData,
  planParty,
  removeGuest,
  removeMenuItem,
  updateGuest,
} from './domain/party-service.js';
import {
  DIVERSITY_LEVELS,
  INTIMACY_DISTRIBUTIONS,
  MAX_GENERATED_GUESTS,
} from './domain/sample-data.js';
import { logger } from './logger.js';

const router = express.Router();

function requestIdOf(res: Response): string | undefined {
  return typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
}

// Request ID middleware
router.use((req: Request, res: Response, next: NextFunction) => {
  res.locals.requestId = `req_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
  next();
});

// Validation schemas
const listMenuItemsSchema = z.object({
  category: z.enum(ITEM_CATEGORIES).optional(),
});

const planPartySchema = z
  .object({
    top: z.number().int().positive().max(100).optional(),
    timeoutMs: z.number().int().positive().max(600000).optional(),
  })
  .passthrough();

const sampleDataSchema = z.object({
  seed: z.number().int(),
  guestCount: z.number().int().min(1).max(MAX_GENERATED_GUESTS),
  diversity: z.enum(DIVERSITY_LEVELS).optional(),
  intimacyDistribution: z.enum(INTIMACY_DISTRIBUTIONS).optional(),
  replace: z.boolean().optional(),
});

/**
 * GET /guests
 * List guests in insertion order
 */
router.get('/guests', (req: Request, res: Response) => {
  res.status(200).json({ items: db.listGuests() });
});

/**
 * POST /guests
 * Add a guest
 */
router.post('/guests', (req: Request, res: Response, next: NextFunction) => {
  try {
    const guest = addGuest(req.body);

    logger.info({ requestId: requestIdOf(res), guest: guest.name, op: 'add_guest', outcome: 'success' });
    res.status(201).json(guest);
  } catch (err) {
    next(err);
  }
});

router.get('/guests/:name', (req: Request, res: Response, next: NextFunction) => {
  try {
    const guest = db.getGuest(req.params.name);
    if (!guest) {
      throw new DomainError('not_found', `Guest '${req.params.name}' not found`);
    }
    res.status(200).json(guest);
  } catch (err) {
    next(err);
  }
});

/**
 * PUT /guests/:name
 * Replace a guest's preferences, intimacy and dietary tags
 */
router.put('/guests/:name', (req: Request, res: Response, next: NextFunction) => {
  try {
    const guest = updateGuest(req.params.name, req.body);

    logger.info({ requestId: requestIdOf(res), guest: guest.name, op: 'update_guest', outcome: 'success' });
    res.status(200).json(guest);
  } catch (err) {
    next(err);
  }
});

router.delete('/guests/:name', (req: Request, res: Response, next: NextFunction) => {
  try {
    removeGuest(req.params.name);

    logger.info({ requestId: requestIdOf(res), guest: req.params.name, op: 'remove_guest', outcome: 'success' });
    res.status(204).send();
  } catch (err) {
    next(err);
  }
});

/**
 * GET /menu-items
 * List catalog items, optionally for one category
 */
router.get('/menu-items', (req: Request, res: Response, next: NextFunction) => {
  try {
    const params = listMenuItemsSchema.parse(req.query);
    const items = params.category
      ? db.listMenuItemsByCategory(params.category)
      : db.listMenuItems();
    res.status(200).json({ items });
  } catch (err) {
    next(err);
  }
});

router.post('/menu-items', (req: Request, res: Response, next: NextFunction) => {
  try {
    const item = addMenuItem(req.body);

    logger.info({ requestId: requestIdOf(res), item: item.name, op: 'add_menu_item', outcome: 'success' });
    res.status(201).json(item);
  } catch (err) {
    next(err);
  }
});

/**
 * GET /menu-items/partition
 * Catalog split into shareable food and drinks
 */
router.get('/menu-items/partition', (req: Request, res: Response) => {
  res.status(200).json(partition(db.listMenuItems()));
});

router.get('/menu-items/:name', (req: Request, res: Response, next: NextFunction) => {
  try {
    const item = db.getMenuItem(req.params.name);
    if (!item) {
      throw new DomainError('not_found', `Menu item '${req.params.name}' not found`);
    }
    res.status(200).json(item);
  } catch (err) {
    next(err);
  }
});

router.delete('/menu-items/:name', (req: Request, res: Response, next: NextFunction) => {
  try {
    removeMenuItem(req.params.name);

    logger.info({ requestId: requestIdOf(res), item: req.params.name, op: 'remove_menu_item', outcome: 'success' });
    res.status(204).send();
  } catch (err) {
    next(err);
  }
});

/**
 * POST /party/plan
 * Rank guest subsets and menus for a budget. An empty `recommendations`
 * list means the run finished and nothing was affordable.
 */
router.post('/party/plan', (req: Request, res: Response, next: NextFunction) => {
  const requestId = requestIdOf(res);
  const startTime = Date.now();

  try {
    const { top, timeoutMs, ...optimizationConfig } = planPartySchema.parse(req.body);
    const plan = planParty({ config: optimizationConfig, top, timeoutMs });

    logger.info({
      requestId,
      op: 'plan_party',
      subsetsEvaluated: plan.subsetsEvaluated,
      candidates: plan.candidates,
      clamped: plan.guestRange.clamped,
      durationMs: Date.now() - startTime,
      outcome: 'success',
    });

    res.status(200).json(plan);
  } catch (err) {
    next(err);
  }
});

/**
 * POST /sample-data
 * Generate seeded guests (and the default catalog when it is empty)
 */
router.post('/sample-data', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = sampleDataSchema.parse(req.body);
    const result = loadSampleData(body);

    logger.info({
      requestId: requestIdOf(res),
      op: 'load_sample_data',
      seed: body.seed,
      generated: result.guests.length,
      outcome: 'success',
    });

    res.status(201).json({ guests: result.guests, menuItems: result.menuItems });
  } catch (err) {
    next(err);
  }
});

/**
 * GET /analysis/items
 * Rating statistics per catalog item, most popular first
 */
router.get('/analysis/items', (req: Request, res: Response) => {
  res.status(200).json({ items: analyzeItems(db.listGuests(), db.listMenuItems()) });
});

router.get('/analysis/guests', (req: Request, res: Response) => {
  res.status(200).json({ items: summarizeGuests(db.listGuests()) });
});

/**
 * GET /metrics
 * Optimization run counters and timings
 */
router.get('/metrics', (req: Request, res: Response) => {
  res.status(200).json(metricsStore.getMetrics());
});

export default router;
