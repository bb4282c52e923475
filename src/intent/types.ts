import type { AgentId, Entities } from '../agents/types.js';

export interface Attachment {
  name: string;
  mediaType: string;
  /** Base64 payload, when the caller sent the content inline. */
  data?: string;
}

export interface Query {
  text: string;
  sessionId: string;
  timestamp: Date;
  attachments: Attachment[];
}

export interface PlannerSignals {
  /** Shopping is for ingredients the recipe/pantry check finds missing. */
  missingIngredients: boolean;
  /** Nutrition analysis targets the recipe generated in this workflow. */
  nutritionOfRecipe: boolean;
}

export interface Intent {
  requiredAgents: AgentId[];
  entities: Entities;
  confidence: number;
  signals: PlannerSignals;
  /** Identifiers the reasoning collaborator proposed that are not agents. */
  rejectedAgents: string[];
  /** Set when the query needs a follow-up question instead of agent work. */
  clarification?: string;
}
