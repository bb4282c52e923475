/**
 * Configuration Schema
 *
 * Zod validation schemas for app_settings.yaml. Every field carries a default
 * so an empty document (or no document at all) yields a runnable setup against
 * a local Ollama instance.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';
import { AGENT_IDS } from '../agents/types.js';

export const LlmConfigSchema = z.object({
  host: z.string().url().default('http://localhost:11434'),
});

export const ModelConfigSchema = z.object({
  name: z.string().default('llama3.1:8b'),
  temperature: z.number().min(0).max(2).default(0),
});

export const MODEL_ROLES = ['intent_resolver', ...AGENT_IDS] as const;

export type ModelRole = (typeof MODEL_ROLES)[number];

export const ModelsConfigSchema = z.object({
  default: ModelConfigSchema.default({}),
  roles: z.record(z.enum(MODEL_ROLES), ModelConfigSchema.partial()).default({}),
});

export const DependencyRuleSchema = z.object({
  agent: z.enum(AGENT_IDS),
  after: z.array(z.enum(AGENT_IDS)).min(1),
  when: z.enum(['always', 'missing_ingredients', 'nutrition_of_recipe']).default('always'),
});

export const OrchestrationConfigSchema = z.object({
  agent_timeout_ms: z.number().int().positive().default(20000),
  max_retries: z.number().int().min(0).max(10).default(2),
  retry_base_delay_ms: z.number().int().min(0).default(250),
  retry_max_delay_ms: z.number().int().min(0).default(2000),
  workflow_deadline_ms: z.number().int().positive().default(60000),
  parallel_dispatch: z.boolean().default(false),
  dependencies: z.array(DependencyRuleSchema).default([]),
});

export const IntentConfigSchema = z.object({
  history_turns: z.number().int().min(0).default(6),
  min_confidence: z.number().min(0).max(1).default(0),
});

export const InventoryConfigSchema = z.object({
  path: z.string().default('inventory.json'),
});

export const ShoppingConfigSchema = z.object({
  platforms: z.array(z.string().min(1)).min(1).default(['blinkit', 'zepto', 'instamart']),
  currency: z.string().default('INR'),
});

export const SessionsConfigSchema = z.object({
  max_sessions: z.number().int().positive().default(500),
  max_turns: z.number().int().positive().default(20),
});

export const AgentPromptsSchema = z.record(z.enum(MODEL_ROLES), z.string());

export const AppSettingsSchema = z.object({
  llm: LlmConfigSchema.default({}),
  models: ModelsConfigSchema.default({}),
  orchestration: OrchestrationConfigSchema.default({}),
  intent: IntentConfigSchema.default({}),
  inventory: InventoryConfigSchema.default({}),
  shopping: ShoppingConfigSchema.default({}),
  sessions: SessionsConfigSchema.default({}),
  agent_prompts: AgentPromptsSchema.default({}),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type DependencyRule = z.infer<typeof DependencyRuleSchema>;
export type OrchestrationConfig = z.infer<typeof OrchestrationConfigSchema>;
export type IntentConfig = z.infer<typeof IntentConfigSchema>;
export type InventoryConfig = z.infer<typeof InventoryConfigSchema>;
export type ShoppingConfig = z.infer<typeof ShoppingConfigSchema>;
export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;
export type AgentPrompts = z.infer<typeof AgentPromptsSchema>;
export type AppSettings = z.infer<typeof AppSettingsSchema>;
