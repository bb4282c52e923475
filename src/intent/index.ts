export * from './types.js';
export { ConversationContext, SessionContextStore, type ConversationTurn } from './context.js';
export {
  IntentResolver,
  DEFAULT_INTENT_INSTRUCTION,
  DEFAULT_CLARIFICATION,
  normalizeAgentId,
  normalizeAgents,
  normalizeEntities,
  normalizeConfidence,
  deriveSignals,
  type IntentResolverOptions,
} from './resolver.js';
