/**
 * Inventory Agent
 *
 * Compares what a dish needs against the pantry. The ingredient list comes
 * from a recipe already produced in this workflow when one is visible,
 * otherwise the model is asked what the dish requires. Without a dish the
 * agent reports the pantry contents only.
 */
import { z } from 'zod';
import { BaseAdapter, type AdapterConfig } from './base-adapter.js';
import {
  priorOutput,
  type AgentRequest,
  type IngredientLine,
  type InventoryResult,
  type PantryItem,
} from './types.js';
import type { PantryStore } from '../inventory/pantry-store.js';
import { findMissing } from '../inventory/ingredients.js';
import { PermanentAgentError, errorMessage } from '../errors.js';

export const DEFAULT_INVENTORY_INSTRUCTION = `You are a kitchen inventory assistant.
Given a dish, list every ingredient needed to cook it at home.

Respond with a JSON object only:
{"ingredients": [{"name": string, "amount": string}]}

- Use short, generic ingredient names ("onion", not "2 large red onions").
- Put the quantity in "amount" (e.g. "2 cups", "500 g", "a pinch").`;

const DishIngredientsSchema = z.object({
  ingredients: z
    .array(
      z.object({
        name: z.string().min(1),
        amount: z.coerce.string().default(''),
      })
    )
    .min(1),
});

export class InventoryAdapter extends BaseAdapter<'inventory'> {
  readonly id = 'inventory' as const;
  private readonly pantry: PantryStore;

  constructor(config: AdapterConfig, pantry: PantryStore) {
    super(config);
    this.pantry = pantry;
  }

  protected async run(request: AgentRequest): Promise<InventoryResult> {
    const available = await this.loadPantry();
    const recipe = priorOutput(request.visiblePriorOutputs, 'recipe');
    const dish = recipe?.recipe.name ?? request.entities['dish'];

    if (!dish) {
      return { kind: 'inventory', available, missing: [] };
    }

    const needed: IngredientLine[] = recipe
      ? recipe.recipe.ingredients
      : (
          await this.ask(
            `What ingredients are needed to make ${dish}?`,
            DishIngredientsSchema,
            request.signal
          )
        ).ingredients;

    return {
      kind: 'inventory',
      dish,
      available,
      missing: findMissing(needed, available),
    };
  }

  private async loadPantry(): Promise<PantryItem[]> {
    try {
      return await this.pantry.list();
    } catch (error) {
      throw new PermanentAgentError(`Pantry unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }
}
