/**
 * Category diversity — coarse typing and two-pass selection of skill categories
 */

import type { CategoryType } from "@/types";
import { CATEGORY_TYPE_RULES, DIVERSITY_GUARANTEED_PICKS } from "@/constants";

/**
 * Classifies a category name by substring sniffing; first matching rule wins.
 *
 * @example
 * classifyCategory("Programming Languages") // "programming"
 * classifyCategory("Soft Skills") // "other"
 */
export function classifyCategory(category: string): CategoryType {
  const name = category.toLowerCase();
  const rule = CATEGORY_TYPE_RULES.find((r) => r.terms.some((term) => name.includes(term)));
  return rule ? rule.type : "other";
}

/**
 * Picks up to `count` categories, preferring distinct types.
 *
 * Pass 1 walks categories by score and accepts one if its type is new or
 * fewer than DIVERSITY_GUARANTEED_PICKS are selected. Pass 2 fills the
 * remaining slots by score. Ties keep insertion order of `scores`.
 *
 * @returns Category names in selection order
 */
export function selectTopCategories(
  scores: Map<string, number>,
  count: number,
): string[] {
  const sorted = [...scores.entries()].sort((a, b) => b[1] - a[1]);
  const selected: string[] = [];
  const seenTypes = new Set<CategoryType>();

  for (const [category] of sorted) {
    if (selected.length >= count) {
      break;
    }
    const type = classifyCategory(category);
    if (!seenTypes.has(type) || selected.length < DIVERSITY_GUARANTEED_PICKS) {
      selected.push(category);
      seenTypes.add(type);
    }
  }

  for (const [category] of sorted) {
    if (selected.length >= count) {
      break;
    }
    if (!selected.includes(category)) {
      selected.push(category);
    }
  }

  return selected;
}
