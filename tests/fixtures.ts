import type {
  AgentId,
  HealthResult,
  InventoryResult,
  RecipeResult,
  ShoppingResult,
} from '../src/agents/types.js';
import type { Intent, Query } from '../src/intent/types.js';
import type { LoopOptions } from '../src/workflow/loop.js';

export function recipeResult(): RecipeResult {
  return {
    kind: 'recipe',
    recipe: {
      name: 'Chicken Biryani',
      ingredients: [
        { name: 'basmati rice', amount: '2 cups' },
        { name: 'chicken', amount: '500 g' },
        { name: 'saffron', amount: '1 pinch' },
      ],
      instructions: ['Soak the rice', 'Marinate the chicken', 'Layer and steam'],
      cookingTime: '60 minutes',
      servings: 4,
    },
    missingIngredients: [],
  };
}

export function inventoryResult(): InventoryResult {
  return {
    kind: 'inventory',
    dish: 'biryani',
    available: [{ name: 'basmati rice', quantity: 1, unit: 'kg' }],
    missing: [
      { name: 'chicken', amount: '500 g' },
      { name: 'saffron', amount: '1 pinch' },
    ],
  };
}

export function shoppingResult(): ShoppingResult {
  return {
    kind: 'shopping',
    items: [
      { name: 'chicken', amount: '500 g' },
      { name: 'saffron', amount: '1 pinch' },
    ],
    quotes: [
      { platform: 'blinkit', total: 320, deliveryTime: '10 mins', withinBudget: true },
      { platform: 'zepto', total: 345.5, deliveryTime: '12 mins', withinBudget: true },
    ],
    bestOption: 'blinkit',
    totalCost: 320,
    currency: 'INR',
  };
}

export function healthResult(): HealthResult {
  return {
    kind: 'health',
    subject: 'Chicken Biryani',
    caloriesPerServing: 520,
    macros: { protein: 28, carbs: 62, fat: 16 },
    dietaryNotes: 'High in protein.',
  };
}

export function makeIntent(agents: AgentId[], overrides: Partial<Intent> = {}): Intent {
  return {
    requiredAgents: agents,
    entities: {},
    confidence: 0.9,
    signals: {
      missingIngredients: agents.includes('shopping'),
      nutritionOfRecipe: agents.includes('health') && agents.includes('recipe'),
    },
    rejectedAgents: [],
    ...overrides,
  };
}

export function makeQuery(text: string, sessionId = 'session-1'): Query {
  return { text, sessionId, timestamp: new Date('2024-01-01T00:00:00Z'), attachments: [] };
}

export const FAST_LOOP: LoopOptions = {
  timeoutMs: 1000,
  maxRetries: 2,
  baseDelayMs: 0,
  maxDelayMs: 0,
  workflowDeadlineMs: 10_000,
  parallelDispatch: false,
};
