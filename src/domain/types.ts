export type FoodCategory = 'main' | 'snack' | 'dessert';
export type DrinkCategory = 'drink';
export type ItemCategory = FoodCategory | DrinkCategory;

export const DRINK_CATEGORY: DrinkCategory = 'drink';
export const ITEM_CATEGORIES = ['main', 'snack', 'dessert', 'drink'] as const;

export const MIN_PREFERENCE = 1;
export const MAX_PREFERENCE = 5;
export const MIN_INTIMACY = 1;
export const MAX_INTIMACY = 10;

export interface Guest {
  name: string;
  preferences: Record<string, number>; // item name -> rating 1..5, absent = 0
  intimacy: number;
  dietaryTags: string[];
}

export interface MenuItem {
  name: string;
  unitCost: number;
  category: ItemCategory;
  tags: string[];
}

export interface CountRange {
  min: number;
  max: number;
}

export interface MenuCountBounds {
  food: CountRange;
  drink: CountRange;
}

export interface ObjectiveWeights {
  satisfaction: number;
  savings: number;
  intimacy: number;
}

export interface OptimizationConfig {
  budget: number;
  minGuests: number;
  maxGuests: number;
  weights: ObjectiveWeights;
  menuBounds: MenuCountBounds;
}

export interface CatalogPartition {
  foodItems: MenuItem[];
  drinkItems: MenuItem[];
}

export interface FeasibleOutcome {
  satisfaction: number;
  items: MenuItem[]; // food combination first, then drinks
  totalCost: number;
}

export interface Recommendation {
  readonly guestNames: readonly string[];
  readonly guestCount: number;
  readonly selectedItems: readonly string[];
  readonly unitCosts: Readonly<Record<string, number>>;
  readonly itemCategories: Readonly<Record<string, ItemCategory>>;
  readonly totalCost: number;
  readonly satisfaction: number;
  readonly totalIntimacy: number;
  readonly savings: number;
  readonly efficiency: number;
  readonly happiness: number;
}

export interface ScoreScales {
  satisfaction: number;
  savings: number;
  intimacy: number;
}

export interface NumericSummary {
  mean: number;
  std: number;
  min: number;
  max: number;
}

export interface RecommendationStats {
  total: number;
  cost: NumericSummary;
  satisfaction: NumericSummary;
  intimacy: { mean: number };
  guests: { mean: number; min: number; max: number; mode: number };
}

export interface GuestRange {
  min: number;
  max: number;
  clamped: boolean; // maxGuests was lowered to the pool size
}

export interface OptimizationRun {
  recommendations: Recommendation[]; // enumeration order, unranked
  guestRange: GuestRange;
  subsetsEvaluated: number;
  scales: ScoreScales;
}
