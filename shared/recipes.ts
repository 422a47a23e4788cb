// ============================================
// Recipes & Orders
// What a stove turns ingredients into, and what customers ask for
// ============================================

import { Palette, type Color } from './color';
import type { DishKind, IngredientColor } from './types';

export type IngredientCounts = Record<IngredientColor, number>;

export interface Recipe {
  dish: DishKind;
  counts: IngredientCounts;
}

// Exact-count recipes; anything else burns
export const RECIPES: readonly Recipe[] = [
  { dish: 'salad', counts: { red: 1, green: 1, blue: 0, purple: 0 } },
  { dish: 'soup', counts: { red: 0, green: 0, blue: 2, purple: 0 } },
  { dish: 'curry', counts: { red: 2, green: 0, blue: 0, purple: 1 } },
  { dish: 'pie', counts: { red: 0, green: 1, blue: 1, purple: 1 } },
];

export const FAILED_DISH: DishKind = 'burnt';

// Weighted order distribution (weights need not sum to anything in particular)
export const ORDER_WEIGHTS: ReadonlyArray<{ dish: DishKind; weight: number }> = [
  { dish: 'salad', weight: 4 },
  { dish: 'soup', weight: 3 },
  { dish: 'curry', weight: 2 },
  { dish: 'pie', weight: 1 },
];

export const INGREDIENT_COLOR_VALUES: Record<IngredientColor, Color> = {
  red: Palette.red,
  green: Palette.green,
  blue: Palette.blue,
  purple: Palette.purple,
};

export const DISH_COLORS: Record<DishKind, Color> = {
  salad: Palette.green,
  soup: Palette.blue,
  curry: Palette.orange,
  pie: Palette.yellow,
  burnt: Palette.darkGrey,
};

/**
 * Count each ingredient color in a list
 */
export function countIngredients(ingredients: readonly IngredientColor[]): IngredientCounts {
  const counts: IngredientCounts = { red: 0, green: 0, blue: 0, purple: 0 };
  for (const color of ingredients) {
    counts[color]++;
  }
  return counts;
}

/**
 * Match an ingredient multiset against the recipe table.
 * Order of the input never matters; only exact counts do.
 */
export function resolveRecipe(ingredients: readonly IngredientColor[]): DishKind {
  const counts = countIngredients(ingredients);

  for (const recipe of RECIPES) {
    if (
      recipe.counts.red === counts.red &&
      recipe.counts.green === counts.green &&
      recipe.counts.blue === counts.blue &&
      recipe.counts.purple === counts.purple
    ) {
      return recipe.dish;
    }
  }

  return FAILED_DISH;
}
