/**
 * Error Taxonomy
 *
 * Every failure the workflow engine reasons about is a KitchenError with a
 * stable `code`. Agent-level errors (transient / permanent) are demoted into
 * recorded outputs; intent-resolution and planner errors abort the request.
 */
import type { AgentId } from './agents/types.js';

export type KitchenErrorCode =
  | 'intent_resolution'
  | 'planner_configuration'
  | 'agent_transient'
  | 'agent_permanent'
  | 'structured_output'
  | 'settings';

export class KitchenError extends Error {
  readonly code: KitchenErrorCode;

  constructor(code: KitchenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * No usable intent could be formed from the query. The workflow moves to
 * `failed` and the caller receives `clarification` as the prompt to show.
 */
export class IntentResolutionError extends KitchenError {
  readonly clarification: string;

  constructor(message: string, clarification: string, options?: { cause?: unknown }) {
    super('intent_resolution', message, options);
    this.clarification = clarification;
  }
}

/** A dependency rule set that cannot be ordered. Deployment defect, never user input. */
export class PlannerConfigurationError extends KitchenError {
  readonly cycle: AgentId[];

  constructor(message: string, cycle: AgentId[] = []) {
    super('planner_configuration', message);
    this.cycle = cycle;
  }
}

export class TransientAgentError extends KitchenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('agent_transient', message, options);
  }
}

export class PermanentAgentError extends KitchenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('agent_permanent', message, options);
  }
}

/** The LLM answered, but not with JSON matching the expected schema. */
export class StructuredOutputError extends KitchenError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super('structured_output', message, options);
    this.raw = raw;
  }
}

export class SettingsError extends KitchenError {
  constructor(message: string) {
    super('settings', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
