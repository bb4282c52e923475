/**
 * Agents Module
 *
 * Exports the adapter contract, the four kitchen adapters and the registry
 * factory.
 *
 * Adapters:
 * - recipe: structured recipe generation
 * - inventory: pantry lookup and missing-ingredient detection
 * - shopping: price comparison across grocery delivery platforms
 * - health: nutrition per serving
 */

// Types
export * from './types.js';

// Adapters
export { BaseAdapter, type AdapterConfig } from './base-adapter.js';
export { RecipeAdapter, DEFAULT_RECIPE_INSTRUCTION } from './recipe.js';
export { InventoryAdapter, DEFAULT_INVENTORY_INSTRUCTION } from './inventory.js';
export { ShoppingAdapter, DEFAULT_SHOPPING_INSTRUCTION } from './shopping.js';
export { HealthAdapter, DEFAULT_HEALTH_INSTRUCTION } from './health.js';

// Factory
export { createAgentRegistry, type RegistryOptions } from './factory.js';
