import { describe, it, expect, beforeEach } from 'vitest';
import { RecipeAdapter, DEFAULT_RECIPE_INSTRUCTION, buildRecipePrompt } from '../../src/agents/recipe.js';
import { InventoryAdapter, DEFAULT_INVENTORY_INSTRUCTION } from '../../src/agents/inventory.js';
import {
  ShoppingAdapter,
  DEFAULT_SHOPPING_INSTRUCTION,
  cheapest,
  parseBudget,
} from '../../src/agents/shopping.js';
import { HealthAdapter, DEFAULT_HEALTH_INSTRUCTION } from '../../src/agents/health.js';
import { createAgentRegistry } from '../../src/agents/factory.js';
import type { AgentId, AgentOutput, AgentRequest, InventoryResult } from '../../src/agents/types.js';
import { InMemoryPantryStore, type PantryStore } from '../../src/inventory/pantry-store.js';
import { defaultSettings, parseSettings } from '../../src/config/settings.js';
import { MockLLMProvider } from '../../src/testing/mock-llm.js';
import { inventoryResult, recipeResult } from '../fixtures.js';

const model = { name: 'test-model', temperature: 0 };
const shoppingConfig = { platforms: ['blinkit', 'zepto', 'instamart'], currency: 'INR' };

function request(
  entities: Record<string, string> = {},
  prior: [AgentId, AgentOutput][] = [],
  query = 'test query'
): AgentRequest {
  return {
    query,
    entities,
    visiblePriorOutputs: new Map(prior),
    signal: new AbortController().signal,
  };
}

function lastPrompt(llm: MockLLMProvider): string | undefined {
  const calls = llm.getCalls();
  return calls[calls.length - 1]?.messages[0]?.content;
}

describe('RecipeAdapter', () => {
  let llm: MockLLMProvider;
  let adapter: RecipeAdapter;

  beforeEach(() => {
    llm = new MockLLMProvider();
    adapter = new RecipeAdapter({ llm, model, instruction: DEFAULT_RECIPE_INSTRUCTION });
    llm.setDefaultResponse({
      json: {
        name: 'Dal Tadka',
        ingredients: [
          { name: 'lentils', amount: '1 cup' },
          { name: 'Tomatoes', amount: 2 },
        ],
        instructions: ['Boil the lentils', 'Temper with spices'],
        cooking_time: 30,
        servings: '2',
      },
    });
  });

  it('should turn the model answer into a recipe', async () => {
    const result = await adapter.execute(request({ dish: 'dal' }));

    expect(result).toEqual({
      status: 'success',
      payload: {
        kind: 'recipe',
        recipe: {
          name: 'Dal Tadka',
          ingredients: [
            { name: 'lentils', amount: '1 cup' },
            { name: 'Tomatoes', amount: '2' },
          ],
          instructions: ['Boil the lentils', 'Temper with spices'],
          cookingTime: '30',
          servings: 2,
        },
        missingIngredients: [],
      },
    });
    expect(llm.getCalls()[0]?.systemPrompt).toBe(DEFAULT_RECIPE_INSTRUCTION);
    expect(llm.getCalls()[0]?.format).toBe('json');
  });

  it('should use the pantry when it was checked first', async () => {
    const pantry: InventoryResult = {
      kind: 'inventory',
      available: [{ name: 'tomato', quantity: 4, unit: 'pcs' }],
      missing: [],
    };

    const result = await adapter.execute(request({}, [['inventory', pantry]]));

    expect(lastPrompt(llm)).toBe('Request: test query\nAvailable ingredients: tomato');
    expect(result.status === 'success' && result.payload.missingIngredients).toEqual([
      { name: 'lentils', amount: '1 cup' },
    ]);
  });

  it('should report invalid model output as transient', async () => {
    llm.setDefaultResponse({ json: { name: 'Dal', ingredients: [{ name: 'lentils' }] } });

    const result = await adapter.execute(request());

    expect(result).toEqual({
      status: 'transient_error',
      reason: 'Model output failed validation: instructions: Required',
    });
  });

  it('should report rejected requests as permanent', async () => {
    llm.setDefaultResponse({ error: Object.assign(new Error('model not found'), { status_code: 404 }) });

    const result = await adapter.execute(request());

    expect(result).toEqual({
      status: 'permanent_error',
      reason: 'LLM rejected the request (404): model not found',
    });
  });

  it('should report overloaded servers as transient', async () => {
    llm.setDefaultResponse({ error: Object.assign(new Error('overloaded'), { status: 503 }) });

    const result = await adapter.execute(request());

    expect(result).toEqual({
      status: 'transient_error',
      reason: 'LLM request failed with status 503: overloaded',
    });
  });

  it('should hand the request signal to the model call', async () => {
    const req = request({ dish: 'dal' });

    await adapter.execute(req);

    expect(llm.getCalls()[0]?.signal).toBe(req.signal);
  });

  it('should report an aborted model call as a failure', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await adapter.execute({ ...request({ dish: 'dal' }), signal: controller.signal });

    expect(result.status).toBe('transient_error');
  });

  it('should build the prompt from the entities', () => {
    const prompt = buildRecipePrompt(
      request({ dish: 'dal', quantity: '4', dietary_restrictions: 'vegan' }, [], 'make dal')
    );

    expect(prompt).toBe('Request: make dal\nDish: dal\nServings or quantity: 4\nDietary restrictions: vegan');
  });
});

describe('InventoryAdapter', () => {
  let llm: MockLLMProvider;
  const pantry = new InMemoryPantryStore([
    { name: 'Tomatoes', quantity: 3, unit: 'pcs' },
    { name: 'rice', quantity: 1, unit: 'kg' },
  ]);

  beforeEach(() => {
    llm = new MockLLMProvider();
  });

  function create(store: PantryStore = pantry) {
    return new InventoryAdapter({ llm, model, instruction: DEFAULT_INVENTORY_INSTRUCTION }, store);
  }

  it('should ask which ingredients the dish needs and compare with the pantry', async () => {
    llm.setDefaultResponse({
      json: {
        ingredients: [
          { name: 'rice', amount: '1 cup' },
          { name: 'tomato', amount: '2' },
          { name: 'peas', amount: '1 cup' },
        ],
      },
    });

    const result = await create().execute(request({ dish: 'pulao' }));

    expect(lastPrompt(llm)).toBe('What ingredients are needed to make pulao?');
    expect(result).toEqual({
      status: 'success',
      payload: {
        kind: 'inventory',
        dish: 'pulao',
        available: [
          { name: 'Tomatoes', quantity: 3, unit: 'pcs' },
          { name: 'rice', quantity: 1, unit: 'kg' },
        ],
        missing: [{ name: 'peas', amount: '1 cup' }],
      },
    });
  });

  it('should use a recipe from earlier in the workflow without asking the model', async () => {
    const result = await create().execute(request({}, [['recipe', recipeResult()]]));

    expect(llm.getCalls()).toHaveLength(0);
    expect(result.status === 'success' && result.payload.dish).toBe('Chicken Biryani');
    expect(result.status === 'success' && result.payload.missing.map((i) => i.name)).toEqual([
      'basmati rice',
      'chicken',
      'saffron',
    ]);
  });

  it('should list the pantry when no dish is known', async () => {
    const result = await create().execute(request());

    expect(llm.getCalls()).toHaveLength(0);
    expect(result.status === 'success' && result.payload.missing).toEqual([]);
    expect(result.status === 'success' && result.payload.dish).toBeUndefined();
  });

  it('should fail permanently when the pantry cannot be read', async () => {
    const broken = { list: () => Promise.reject(new Error('disk error')) };

    const result = await create(broken).execute(request({ dish: 'pulao' }));

    expect(result).toEqual({ status: 'permanent_error', reason: 'Pantry unavailable: disk error' });
  });
});

describe('ShoppingAdapter', () => {
  let llm: MockLLMProvider;
  let adapter: ShoppingAdapter;

  beforeEach(() => {
    llm = new MockLLMProvider();
    adapter = new ShoppingAdapter(
      { llm, model, instruction: DEFAULT_SHOPPING_INSTRUCTION },
      shoppingConfig
    );
    llm.setDefaultResponse({
      json: {
        platforms: [
          { platform: 'Blinkit', total: 210, delivery_time: '10 mins' },
          { platform: 'zepto', total: 195, delivery_time: '8 mins' },
          { platform: 'bigbasket', total: 150 },
        ],
      },
    });
  });

  it('should price the named ingredients and pick the cheapest platform', async () => {
    const result = await adapter.execute(
      request({ ingredients: 'milk, eggs and bread', max_price: '₹200' })
    );

    expect(lastPrompt(llm)).toBe(
      'Compare prices in INR for these ingredients across blinkit, zepto, instamart: milk, eggs, bread'
    );
    expect(result).toEqual({
      status: 'success',
      payload: {
        kind: 'shopping',
        items: [
          { name: 'milk', amount: '' },
          { name: 'eggs', amount: '' },
          { name: 'bread', amount: '' },
        ],
        quotes: [
          { platform: 'blinkit', total: 210, deliveryTime: '10 mins', withinBudget: false },
          { platform: 'zepto', total: 195, deliveryTime: '8 mins', withinBudget: true },
        ],
        bestOption: 'zepto',
        totalCost: 195,
        currency: 'INR',
      },
    });
  });

  it('should buy what the pantry check and the recipe found missing', async () => {
    const recipe = {
      ...recipeResult(),
      missingIngredients: [{ name: 'Saffron', amount: '1 pinch' }],
    };

    await adapter.execute(
      request({}, [
        ['inventory', inventoryResult()],
        ['recipe', recipe],
      ])
    );

    expect(lastPrompt(llm)).toBe(
      'Compare prices in INR for these ingredients across blinkit, zepto, instamart: 500 g chicken, 1 pinch saffron'
    );
  });

  it('should succeed with nothing to buy', async () => {
    const stocked = { ...inventoryResult(), missing: [] };

    const result = await adapter.execute(request({}, [['inventory', stocked]]));

    expect(llm.getCalls()).toHaveLength(0);
    expect(result).toEqual({
      status: 'success',
      payload: {
        kind: 'shopping',
        items: [],
        quotes: [],
        bestOption: '',
        totalCost: 0,
        currency: 'INR',
      },
    });
  });

  it('should narrow to the requested platform', async () => {
    const result = await adapter.execute(request({ ingredients: 'milk', platform: 'Zepto' }));

    expect(lastPrompt(llm)).toBe('Compare prices in INR for these ingredients across zepto: milk');
    expect(result.status === 'success' && result.payload.quotes.map((q) => q.platform)).toEqual([
      'zepto',
    ]);
  });

  it('should reject platforms it does not support', async () => {
    const result = await adapter.execute(request({ ingredients: 'milk', platform: 'amazon' }));

    expect(result).toEqual({ status: 'permanent_error', reason: 'Unsupported platform: amazon' });
  });

  it('should fail when no quote matches a requested platform', async () => {
    llm.setDefaultResponse({ json: { platforms: [{ platform: 'bigbasket', total: 100 }] } });

    const result = await adapter.execute(request({ ingredients: 'milk', platform: 'instamart' }));

    expect(result).toEqual({ status: 'permanent_error', reason: 'No price quotes for instamart' });
  });

  it('should break price ties by quote order', () => {
    expect(
      cheapest([
        { platform: 'zepto', total: 100, withinBudget: true },
        { platform: 'blinkit', total: 100, withinBudget: true },
      ]).platform
    ).toBe('zepto');
  });

  it('should read budgets from free text', () => {
    expect(parseBudget('under 300 rupees')).toBe(300);
    expect(parseBudget('cheap')).toBeUndefined();
    expect(parseBudget(undefined)).toBeUndefined();
  });
});

describe('HealthAdapter', () => {
  let llm: MockLLMProvider;
  let adapter: HealthAdapter;

  beforeEach(() => {
    llm = new MockLLMProvider();
    adapter = new HealthAdapter({ llm, model, instruction: DEFAULT_HEALTH_INSTRUCTION });
    llm.setDefaultResponse({
      json: {
        calories_per_serving: 519.6,
        macros: { protein: 28, carbs: '62', fat: 16 },
        dietary_notes: 'High in protein.',
      },
    });
  });

  it('should analyse the recipe from earlier in the workflow', async () => {
    const result = await adapter.execute(request({}, [['recipe', recipeResult()]]));

    expect(lastPrompt(llm)).toBe(
      'Calculate nutritional information for Chicken Biryani (4 servings) with these ingredients: 2 cups basmati rice, 500 g chicken, 1 pinch saffron'
    );
    expect(result).toEqual({
      status: 'success',
      payload: {
        kind: 'health',
        subject: 'Chicken Biryani',
        caloriesPerServing: 520,
        macros: { protein: 28, carbs: 62, fat: 16 },
        dietaryNotes: 'High in protein.',
      },
    });
  });

  it('should analyse a named dish with dietary restrictions', async () => {
    await adapter.execute(request({ dish: 'pizza', dietary_restrictions: 'vegan' }));

    expect(lastPrompt(llm)).toBe(
      'Calculate nutritional information for one serving of pizza\nDietary restrictions: vegan'
    );
  });

  it('should fail permanently with nothing to analyse', async () => {
    const result = await adapter.execute(request());

    expect(result).toEqual({
      status: 'permanent_error',
      reason: 'Nothing to analyse: no recipe, dish or ingredients given',
    });
    expect(llm.getCalls()).toHaveLength(0);
  });
});

describe('createAgentRegistry', () => {
  it('should build one adapter per agent', () => {
    const registry = createAgentRegistry({
      settings: defaultSettings(),
      llm: new MockLLMProvider(),
      pantry: new InMemoryPantryStore(),
    });

    expect(Object.keys(registry).sort()).toEqual(['health', 'inventory', 'recipe', 'shopping']);
    expect(registry.recipe.id).toBe('recipe');
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it('should apply per-role models and prompt overrides', async () => {
    const llm = new MockLLMProvider();
    const settings = parseSettings({
      models: { default: { name: 'base-model' }, roles: { health: { name: 'nutrition-model' } } },
      agent_prompts: { health: 'Count calories.' },
    });
    const registry = createAgentRegistry({ settings, llm, pantry: new InMemoryPantryStore() });

    await registry.health.execute(request({ dish: 'idli' }));
    await registry.recipe.execute(request({ dish: 'idli' }));

    const [healthCall, recipeCall] = llm.getCalls();
    expect(healthCall?.model).toBe('nutrition-model');
    expect(healthCall?.systemPrompt).toBe('Count calories.');
    expect(recipeCall?.model).toBe('base-model');
    expect(recipeCall?.systemPrompt).toBe(DEFAULT_RECIPE_INSTRUCTION);
  });
});
