/**
 * Intent Resolver
 *
 * Turns free-form text into a structured Intent by asking the reasoning
 * collaborator (an LLM in JSON mode) which agents are needed and which
 * entities the query mentions. The collaborator's answer is untrusted: agent
 * identifiers are checked against the closed AgentId set, entities are
 * coerced to strings and planner signals fall back to what the agent set
 * implies.
 *
 * Failure modes:
 * - blank query, unreachable collaborator or unusable output → IntentResolutionError
 * - no valid agent (or confidence below the threshold) → clarification-only Intent
 */
import { z } from 'zod';
import { isAgentId, type AgentId } from '../agents/types.js';
import type { LLMProvider, Message } from '../llm/types.js';
import type { ModelConfig } from '../config/schema.js';
import { requestJson } from '../llm/structured.js';
import { IntentResolutionError, errorMessage } from '../errors.js';
import { workflowLogger } from '../utils/logger.js';
import type { ConversationContext } from './context.js';
import type { Intent, PlannerSignals } from './types.js';

export const DEFAULT_INTENT_INSTRUCTION = `You are the request router of a kitchen assistant with four specialist agents:
- recipe: generates recipes for a dish
- inventory: checks which ingredients are already in the user's pantry and which are missing
- shopping: compares grocery prices across delivery platforms (blinkit, zepto, instamart)
- health: nutrition information and dietary advice

Decide which agents are needed to answer the user's latest message, using the
earlier conversation for context, and extract the entities it mentions.

Respond with a JSON object only:
{
  "agents": [string],
  "entities": {"dish": string, "ingredients": string, "quantity": string,
               "dietary_restrictions": string, "max_price": string, "platform": string},
  "confidence": number between 0 and 1,
  "signals": {"missing_ingredients": boolean, "nutrition_target": "recipe" | "ingredients"},
  "clarification": string
}

- Only use the agent names listed above. Omit entities that are not mentioned.
- "missing_ingredients" is true when the user wants to buy what they lack for a dish.
- "nutrition_target" is "recipe" when nutrition is asked about the recipe being generated.
- If the request is unclear or unrelated to cooking, return no agents and put a
  short follow-up question in "clarification".

Examples:
- "Give me a recipe for chicken curry" → agents ["recipe"]
- "What do I need to buy for pasta?" → agents ["inventory", "shopping"]
- "Where can I buy tomatoes cheapest?" → agents ["shopping"], entities {"ingredients": "tomatoes"}
- "How many calories in a pizza?" → agents ["health"], entities {"dish": "pizza"}`;

export const DEFAULT_CLARIFICATION =
  'I can help with recipes, checking your pantry, comparing grocery prices and nutrition. What would you like to do?';

const EMPTY_QUERY_CLARIFICATION = 'Ask me about a dish, your pantry, grocery prices or nutrition.';
const UNAVAILABLE_CLARIFICATION =
  "Sorry, I couldn't understand that request right now. Could you rephrase it?";

const DEFAULT_CONFIDENCE = 0.5;

const CollaboratorResponseSchema = z
  .object({
    agents: z.unknown().optional(),
    agent_flow: z.unknown().optional(),
    required_agents: z.unknown().optional(),
    entities: z.unknown().optional(),
    confidence: z.unknown().optional(),
    signals: z.unknown().optional(),
    clarification: z.unknown().optional(),
  })
  .passthrough();

type CollaboratorResponse = z.infer<typeof CollaboratorResponseSchema>;

const SignalsSchema = z.object({
  missing_ingredients: z.boolean().optional(),
  nutrition_target: z.enum(['recipe', 'ingredients']).optional(),
});

export interface IntentResolverOptions {
  model: ModelConfig;
  instruction?: string;
  historyTurns?: number;
  minConfidence?: number;
}

export class IntentResolver {
  private readonly llm: LLMProvider;
  private readonly model: ModelConfig;
  private readonly instruction: string;
  private readonly historyTurns: number;
  private readonly minConfidence: number;

  constructor(llm: LLMProvider, options: IntentResolverOptions) {
    this.llm = llm;
    this.model = options.model;
    this.instruction = options.instruction ?? DEFAULT_INTENT_INSTRUCTION;
    this.historyTurns = options.historyTurns ?? 6;
    this.minConfidence = options.minConfidence ?? 0;
  }

  async resolve(queryText: string, context: ConversationContext): Promise<Intent> {
    const text = queryText.trim();
    if (!text) {
      throw new IntentResolutionError('Query is empty', EMPTY_QUERY_CLARIFICATION);
    }

    const messages: Message[] = [
      ...context.history(this.historyTurns),
      { role: 'user', content: text },
    ];

    let response: CollaboratorResponse;
    try {
      response = await requestJson(
        this.llm,
        {
          model: this.model.name,
          temperature: this.model.temperature,
          systemPrompt: this.instruction,
          messages,
        },
        CollaboratorResponseSchema
      );
    } catch (error) {
      workflowLogger.error(
        { sessionId: context.sessionId, error: errorMessage(error) },
        'Intent resolution failed'
      );
      throw new IntentResolutionError(
        `Reasoning service could not resolve the query: ${errorMessage(error)}`,
        UNAVAILABLE_CLARIFICATION,
        { cause: error }
      );
    }

    return this.toIntent(response, context.sessionId);
  }

  private toIntent(response: CollaboratorResponse, sessionId: string): Intent {
    const proposed = response.agents ?? response.agent_flow ?? response.required_agents;
    const { agents, rejected } = normalizeAgents(proposed);

    if (rejected.length > 0) {
      workflowLogger.warn({ sessionId, rejected }, 'Dropped unknown agent identifiers');
    }

    const entities = normalizeEntities(response.entities);
    const confidence = normalizeConfidence(response.confidence);

    if (agents.length === 0 || confidence < this.minConfidence) {
      const clarification =
        typeof response.clarification === 'string' && response.clarification.trim()
          ? response.clarification.trim()
          : DEFAULT_CLARIFICATION;
      workflowLogger.info(
        { sessionId, confidence, agents },
        'No actionable agents, asking for clarification'
      );
      return {
        requiredAgents: [],
        entities,
        confidence,
        signals: { missingIngredients: false, nutritionOfRecipe: false },
        rejectedAgents: rejected,
        clarification,
      };
    }

    return {
      requiredAgents: agents,
      entities,
      confidence,
      signals: deriveSignals(agents, response.signals),
      rejectedAgents: rejected,
    };
  }
}

export function normalizeAgentId(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/_agent$/, '');
}

export function normalizeAgents(proposed: unknown): { agents: AgentId[]; rejected: string[] } {
  const entries: unknown[] = Array.isArray(proposed)
    ? proposed
    : typeof proposed === 'string'
      ? [proposed]
      : [];

  const agents: AgentId[] = [];
  const rejected: string[] = [];

  for (const entry of entries) {
    if (typeof entry !== 'string') {
      rejected.push(JSON.stringify(entry) ?? String(entry));
      continue;
    }
    const id = normalizeAgentId(entry);
    if (!isAgentId(id)) {
      rejected.push(entry);
      continue;
    }
    if (!agents.includes(id)) {
      agents.push(id);
    }
  }

  return { agents, rejected };
}

export function normalizeEntities(raw: unknown): Record<string, string> {
  const entities: Record<string, string> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return entities;
  }

  for (const [key, value] of Object.entries(raw)) {
    const name = key
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '_')
      .replace(/^_+|_+$/g, '');
    const text = entityText(value);
    if (name && text) {
      entities[name] = text;
    }
  }

  return entities;
}

function entityText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .filter((v) => ['string', 'number', 'boolean'].includes(typeof v))
      .map((v) => String(v).trim())
      .filter((v) => v.length > 0);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return undefined;
}

export function normalizeConfidence(raw: unknown): number {
  const value =
    typeof raw === 'number' ? raw : typeof raw === 'string' ? Number.parseFloat(raw) : NaN;
  if (!Number.isFinite(value)) {
    return DEFAULT_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Planner signals from the collaborator, falling back to what the agent set
 * implies: shopping next to a recipe or pantry check is for missing
 * ingredients, and nutrition next to a recipe is about that recipe.
 */
export function deriveSignals(agents: readonly AgentId[], raw: unknown): PlannerSignals {
  const parsed = SignalsSchema.safeParse(raw ?? {});
  const signals = parsed.success ? parsed.data : {};
  const has = (id: AgentId) => agents.includes(id);

  const missingIngredients =
    has('shopping') &&
    (has('recipe') || has('inventory')) &&
    (signals.missing_ingredients ?? true);

  const nutritionOfRecipe =
    has('health') && has('recipe') && (signals.nutrition_target ?? 'recipe') === 'recipe';

  return { missingIngredients, nutritionOfRecipe };
}
