import type { IngredientLine, PantryItem } from '../agents/types.js';

/**
 * Canonical form used to compare ingredient names: lower case, single spaces,
 * and a trailing plural `s`/`es` dropped ("Tomatoes" and "tomato" match).
 */
export function normalizeIngredientName(name: string): string {
  const base = name.trim().toLowerCase().replace(/\s+/g, ' ');
  if (base.endsWith('oes')) {
    return base.slice(0, -2);
  }
  if (base.endsWith('s') && !base.endsWith('ss') && base.length > 3) {
    return base.slice(0, -1);
  }
  return base;
}

export function findMissing(needed: IngredientLine[], pantry: PantryItem[]): IngredientLine[] {
  const stocked = new Set(pantry.map((item) => normalizeIngredientName(item.name)));
  return needed.filter((line) => !stocked.has(normalizeIngredientName(line.name)));
}

/** Merge ingredient lists, keeping the first occurrence of each name. */
export function mergeIngredients(...lists: IngredientLine[][]): IngredientLine[] {
  const seen = new Set<string>();
  const merged: IngredientLine[] = [];
  for (const list of lists) {
    for (const line of list) {
      const key = normalizeIngredientName(line.name);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(line);
      }
    }
  }
  return merged;
}

/** Parse a comma/"and"-separated ingredient entity into lines with no amount. */
export function parseIngredientList(value: string | undefined): IngredientLine[] {
  if (!value) {
    return [];
  }
  return value
    .split(/,|\band\b/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((name) => ({ name, amount: '' }));
}
