/**
 * Agent Factory
 *
 * Builds the immutable adapter registry once at startup. Each adapter gets its
 * model (per-role override or the default) and its system prompt (settings
 * override or the built-in instruction). The registry is then passed by
 * reference into the orchestration loop.
 */
import type { AgentRegistry } from './types.js';
import type { AppSettings } from '../config/schema.js';
import { getAgentPrompt, getModelConfig } from '../config/settings.js';
import type { LLMProvider } from '../llm/types.js';
import { JsonFilePantryStore, type PantryStore } from '../inventory/pantry-store.js';
import { RecipeAdapter, DEFAULT_RECIPE_INSTRUCTION } from './recipe.js';
import { InventoryAdapter, DEFAULT_INVENTORY_INSTRUCTION } from './inventory.js';
import { ShoppingAdapter, DEFAULT_SHOPPING_INSTRUCTION } from './shopping.js';
import { HealthAdapter, DEFAULT_HEALTH_INSTRUCTION } from './health.js';

export interface RegistryOptions {
  settings: AppSettings;
  llm: LLMProvider;
  pantry?: PantryStore;
}

export function createAgentRegistry({ settings, llm, pantry }: RegistryOptions): AgentRegistry {
  const pantryStore = pantry ?? new JsonFilePantryStore(settings.inventory.path);

  return Object.freeze({
    recipe: new RecipeAdapter({
      llm,
      model: getModelConfig('recipe', settings),
      instruction: getAgentPrompt('recipe', settings) ?? DEFAULT_RECIPE_INSTRUCTION,
    }),
    inventory: new InventoryAdapter(
      {
        llm,
        model: getModelConfig('inventory', settings),
        instruction: getAgentPrompt('inventory', settings) ?? DEFAULT_INVENTORY_INSTRUCTION,
      },
      pantryStore
    ),
    shopping: new ShoppingAdapter(
      {
        llm,
        model: getModelConfig('shopping', settings),
        instruction: getAgentPrompt('shopping', settings) ?? DEFAULT_SHOPPING_INSTRUCTION,
      },
      settings.shopping
    ),
    health: new HealthAdapter({
      llm,
      model: getModelConfig('health', settings),
      instruction: getAgentPrompt('health', settings) ?? DEFAULT_HEALTH_INSTRUCTION,
    }),
  });
}
