/**
 * Recipe Agent
 *
 * Generates a structured recipe for the requested dish. When the pantry has
 * already been checked in this workflow, the model is told what is on hand and
 * the ingredients not in the pantry are reported as missing.
 */
import { z } from 'zod';
import { BaseAdapter } from './base-adapter.js';
import { priorOutput, type AgentRequest, type RecipeResult } from './types.js';
import { findMissing } from '../inventory/ingredients.js';

export const DEFAULT_RECIPE_INSTRUCTION = `You are a professional chef assistant.
Generate a detailed home-cooking recipe for the user's request.

Respond with a JSON object only:
{
  "name": string,
  "ingredients": [{"name": string, "amount": string}],
  "instructions": [string],
  "cooking_time": string,
  "servings": number
}

- Keep ingredient names short and generic; quantities go in "amount".
- Respect every dietary restriction you are given.
- If a list of available ingredients is provided, prefer them.`;

const RecipeSchema = z.object({
  name: z.string().min(1),
  ingredients: z
    .array(
      z.object({
        name: z.string().min(1),
        amount: z.coerce.string().default(''),
      })
    )
    .min(1),
  instructions: z.array(z.string().min(1)).min(1),
  cooking_time: z.coerce.string().default('unknown'),
  servings: z.coerce.number().int().positive().default(1),
});

export class RecipeAdapter extends BaseAdapter<'recipe'> {
  readonly id = 'recipe' as const;

  protected async run(request: AgentRequest): Promise<RecipeResult> {
    const inventory = priorOutput(request.visiblePriorOutputs, 'inventory');
    const prompt = buildRecipePrompt(
      request,
      inventory?.available.map((i) => i.name)
    );
    const recipe = await this.ask(prompt, RecipeSchema, request.signal);

    const ingredients = recipe.ingredients.map((i) => ({ name: i.name, amount: i.amount }));

    return {
      kind: 'recipe',
      recipe: {
        name: recipe.name,
        ingredients,
        instructions: recipe.instructions,
        cookingTime: recipe.cooking_time,
        servings: recipe.servings,
      },
      missingIngredients: inventory ? findMissing(ingredients, inventory.available) : [],
    };
  }
}

export function buildRecipePrompt(request: AgentRequest, availableNames?: string[]): string {
  const lines = [`Request: ${request.query}`];
  const { dish, dietary_restrictions: dietary, quantity } = request.entities;

  if (dish) lines.push(`Dish: ${dish}`);
  if (quantity) lines.push(`Servings or quantity: ${quantity}`);
  if (dietary) lines.push(`Dietary restrictions: ${dietary}`);
  if (availableNames && availableNames.length > 0) {
    lines.push(`Available ingredients: ${availableNames.join(', ')}`);
  }

  return lines.join('\n');
}
