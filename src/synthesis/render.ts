/**
 * Section Rendering
 *
 * Plain-text renderings of each agent payload. Only fields the agent actually
 * produced are shown.
 */
import type {
  AgentError,
  HealthResult,
  IngredientLine,
  InventoryResult,
  RecipeResult,
  ShoppingResult,
} from '../agents/types.js';
import type { FinalResponse } from './types.js';

export function formatIngredient(line: IngredientLine): string {
  return `${line.amount} ${line.name}`.trim();
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatMoney(amount: number, currency: string): string {
  return currency === 'INR' ? `₹${formatNumber(amount)}` : `${currency} ${formatNumber(amount)}`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function renderRecipe({ recipe, missingIngredients }: RecipeResult): string {
  const lines = [recipe.name, '', 'Ingredients:'];
  lines.push(...recipe.ingredients.map((i) => `- ${formatIngredient(i)}`));
  lines.push('', 'Instructions:');
  lines.push(...recipe.instructions.map((step, i) => `${i + 1}. ${step}`));
  lines.push('', `Cooking time: ${recipe.cookingTime}`, `Servings: ${recipe.servings}`);

  if (missingIngredients.length > 0) {
    lines.push(`Missing from your pantry: ${missingIngredients.map((i) => i.name).join(', ')}`);
  }
  return lines.join('\n');
}

export function renderInventory(result: InventoryResult): string {
  const lines: string[] = [];
  if (result.dish) {
    lines.push(`Checked your pantry for ${result.dish}.`, '');
  }

  lines.push('Available ingredients:');
  if (result.available.length === 0) {
    lines.push('- none');
  }
  lines.push(
    ...result.available.map((item) => `- ${item.name}: ${item.quantity} ${item.unit}`.trim())
  );

  if (result.dish) {
    lines.push('', 'Missing ingredients:');
    if (result.missing.length === 0) {
      lines.push('- none');
    }
    lines.push(...result.missing.map((i) => `- ${formatIngredient(i)}`));
  }
  return lines.join('\n');
}

export function renderShopping(result: ShoppingResult): string {
  if (result.items.length === 0) {
    return 'Nothing to buy: you already have everything you need.';
  }

  const lines = [
    `Items: ${result.items.map((i) => i.name).join(', ')}`,
    `Best place to buy: ${capitalize(result.bestOption)}`,
    `Total cost: ${formatMoney(result.totalCost, result.currency)}`,
    '',
    'Platform comparison:',
  ];

  for (const quote of result.quotes) {
    const delivery = quote.deliveryTime ? `, delivery ${quote.deliveryTime}` : '';
    const budget = quote.withinBudget ? '' : ' (over budget)';
    lines.push(
      `- ${capitalize(quote.platform)}: ${formatMoney(quote.total, result.currency)}${delivery}${budget}`
    );
  }
  return lines.join('\n');
}

export function renderHealth(result: HealthResult): string {
  const lines = [
    `Nutrition per serving of ${result.subject}:`,
    `Calories: ${result.caloriesPerServing}`,
    'Macros:',
    `- protein: ${formatNumber(result.macros.protein)}g`,
    `- carbs: ${formatNumber(result.macros.carbs)}g`,
    `- fat: ${formatNumber(result.macros.fat)}g`,
  ];

  if (result.fiber !== undefined) lines.push(`Fiber: ${formatNumber(result.fiber)}g`);
  if (result.sugar !== undefined) lines.push(`Sugar: ${formatNumber(result.sugar)}g`);
  if (result.sodium !== undefined) lines.push(`Sodium: ${formatNumber(result.sodium)}mg`);
  if (result.dietaryNotes) {
    lines.push('', `Dietary notes: ${result.dietaryNotes}`);
  }
  return lines.join('\n');
}

export function renderError(error: AgentError): string {
  const tries = error.attempts === 1 ? '1 attempt' : `${error.attempts} attempts`;
  return `Unavailable after ${tries}: ${error.reason}`;
}

/** Whole response as text, one block per section. */
export function renderResponse(response: FinalResponse): string {
  const blocks = response.sections.map((section) => {
    const heading =
      section.status === 'ok' ? section.title : `${section.title} [${section.status}]`;
    return `## ${heading}\n${section.content}`;
  });

  if (response.message) {
    blocks.push(response.message);
  }
  return blocks.join('\n\n');
}
