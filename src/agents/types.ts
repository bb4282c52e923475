/**
 * Agent Type Definitions
 *
 * The closed set of agents, the tagged outputs they produce and the adapter
 * contract the orchestration loop dispatches through. Adding an agent means
 * extending `AGENT_IDS` and `AgentPayloadMap`; the planner and synthesizer
 * match exhaustively and stop compiling until the new id is handled.
 */

export const AGENT_IDS = ['recipe', 'inventory', 'shopping', 'health'] as const;

export type AgentId = (typeof AGENT_IDS)[number];

/** Tie-break rank for agents with no dependency between them (lower runs first). */
export const AGENT_PRIORITY: Readonly<Record<AgentId, number>> = {
  inventory: 0,
  recipe: 1,
  health: 2,
  shopping: 3,
};

export function isAgentId(value: string): value is AgentId {
  return (AGENT_IDS as readonly string[]).includes(value);
}

export interface IngredientLine {
  name: string;
  amount: string;
}

export interface PantryItem {
  name: string;
  quantity: number;
  unit: string;
}

export interface Recipe {
  name: string;
  ingredients: IngredientLine[];
  instructions: string[];
  cookingTime: string;
  servings: number;
}

export interface RecipeResult {
  kind: 'recipe';
  recipe: Recipe;
  /** Ingredients not found in the pantry; empty when no pantry output was visible. */
  missingIngredients: IngredientLine[];
}

export interface InventoryResult {
  kind: 'inventory';
  dish?: string;
  available: PantryItem[];
  missing: IngredientLine[];
}

export interface PlatformQuote {
  platform: string;
  total: number;
  deliveryTime?: string;
  withinBudget: boolean;
}

export interface ShoppingResult {
  kind: 'shopping';
  items: IngredientLine[];
  quotes: PlatformQuote[];
  /** Empty when there is nothing to buy. */
  bestOption: string;
  totalCost: number;
  currency: string;
}

export interface Macros {
  protein: number;
  carbs: number;
  fat: number;
}

export interface HealthResult {
  kind: 'health';
  subject: string;
  caloriesPerServing: number;
  macros: Macros;
  fiber?: number;
  sugar?: number;
  sodium?: number;
  dietaryNotes: string;
}

export interface AgentError {
  kind: 'error';
  agentId: AgentId;
  reason: string;
  attempts: number;
}

export interface AgentPayloadMap {
  recipe: RecipeResult;
  inventory: InventoryResult;
  shopping: ShoppingResult;
  health: HealthResult;
}

export type AgentOutput = AgentPayloadMap[AgentId] | AgentError;

export type Entities = Readonly<Record<string, string>>;

export interface AgentRequest {
  query: string;
  entities: Entities;
  /** Outputs of agents already completed in this workflow. Frozen. */
  visiblePriorOutputs: ReadonlyMap<AgentId, AgentOutput>;
  signal: AbortSignal;
}

export type AgentResult<P> =
  | { status: 'success'; payload: P }
  | { status: 'transient_error'; reason: string }
  | { status: 'permanent_error'; reason: string };

export interface AgentAdapter<K extends AgentId = AgentId> {
  readonly id: K;
  execute(request: AgentRequest): Promise<AgentResult<AgentPayloadMap[K]>>;
}

/** Immutable adapter table handed to the orchestration loop. */
export type AgentRegistry = Readonly<{ [K in AgentId]: AgentAdapter<K> }>;

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

/** Typed lookup of a prior output; `undefined` when absent or when the agent failed. */
export function priorOutput<K extends AgentId>(
  outputs: ReadonlyMap<AgentId, AgentOutput>,
  id: K
): AgentPayloadMap[K] | undefined {
  const output = outputs.get(id);
  return output && isOutputOf(output, id) ? output : undefined;
}

export function isOutputOf<K extends AgentId>(
  output: AgentOutput,
  id: K
): output is AgentPayloadMap[K] {
  return output.kind === id;
}
