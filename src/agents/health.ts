/**
 * Health Agent
 *
 * Nutrition analysis per serving. Targets the recipe generated earlier in the
 * workflow when there is one, otherwise the dish or ingredients named in the
 * query.
 */
import { z } from 'zod';
import { BaseAdapter } from './base-adapter.js';
import { priorOutput, type AgentRequest, type HealthResult } from './types.js';
import { PermanentAgentError } from '../errors.js';

export const DEFAULT_HEALTH_INSTRUCTION = `You are a nutritionist assistant.
Estimate the nutrition per serving of the food you are given.

Respond with a JSON object only:
{
  "calories_per_serving": number,
  "macros": {"protein": number, "carbs": number, "fat": number},
  "fiber": number, "sugar": number, "sodium": number,
  "dietary_notes": string
}

- Macros, fiber and sugar are grams; sodium is milligrams.
- Mention in dietary_notes anything that conflicts with the user's dietary restrictions.`;

const NutritionSchema = z.object({
  calories_per_serving: z.coerce.number().nonnegative(),
  macros: z.object({
    protein: z.coerce.number().nonnegative().default(0),
    carbs: z.coerce.number().nonnegative().default(0),
    fat: z.coerce.number().nonnegative().default(0),
  }),
  fiber: z.coerce.number().nonnegative().optional(),
  sugar: z.coerce.number().nonnegative().optional(),
  sodium: z.coerce.number().nonnegative().optional(),
  dietary_notes: z.coerce.string().default(''),
});

export class HealthAdapter extends BaseAdapter<'health'> {
  readonly id = 'health' as const;

  protected async run(request: AgentRequest): Promise<HealthResult> {
    const { subject, prompt } = describeSubject(request);
    const dietary = request.entities['dietary_restrictions'];
    const nutrition = await this.ask(
      dietary ? `${prompt}\nDietary restrictions: ${dietary}` : prompt,
      NutritionSchema,
      request.signal
    );

    return {
      kind: 'health',
      subject,
      caloriesPerServing: Math.round(nutrition.calories_per_serving),
      macros: nutrition.macros,
      fiber: nutrition.fiber,
      sugar: nutrition.sugar,
      sodium: nutrition.sodium,
      dietaryNotes: nutrition.dietary_notes,
    };
  }
}

function describeSubject(request: AgentRequest): { subject: string; prompt: string } {
  const recipe = priorOutput(request.visiblePriorOutputs, 'recipe');
  if (recipe) {
    const { name, ingredients, servings } = recipe.recipe;
    const list = ingredients.map((i) => `${i.amount} ${i.name}`.trim()).join(', ');
    return {
      subject: name,
      prompt: `Calculate nutritional information for ${name} (${servings} servings) with these ingredients: ${list}`,
    };
  }

  const { dish, ingredients } = request.entities;
  if (dish) {
    return { subject: dish, prompt: `Calculate nutritional information for one serving of ${dish}` };
  }
  if (ingredients) {
    return {
      subject: ingredients,
      prompt: `Calculate nutritional information for: ${ingredients}`,
    };
  }

  throw new PermanentAgentError('Nothing to analyse: no recipe, dish or ingredients given');
}
