import type { CatalogPartition, FoodCategory, ItemCategory, MenuItem } from './types.js';
import { DRINK_CATEGORY } from './types.js';

export function isFoodCategory(category: ItemCategory): category is FoodCategory {
  return category !== DRINK_CATEGORY;
}

/**
 * Splits the catalog into shareable food and drinks, keeping catalog order.
 */
export function partition(catalog: readonly MenuItem[]): CatalogPartition {
  const foodItems: MenuItem[] = [];
  const drinkItems: MenuItem[] = [];

  for (const item of catalog) {
    if (isFoodCategory(item.category)) {
      foodItems.push(item);
    } else {
      drinkItems.push(item);
    }
  }

  return { foodItems, drinkItems };
}
