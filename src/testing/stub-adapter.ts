/**
 * Stub Adapter
 *
 * AgentAdapter with scripted results, for driving the orchestration loop
 * without an LLM. Steps are played in order and the last one repeats.
 */
import type {
  AgentAdapter,
  AgentId,
  AgentPayloadMap,
  AgentRegistry,
  AgentRequest,
  AgentResult,
} from '../agents/types.js';

export type StubHandler<K extends AgentId> = (
  request: AgentRequest
) => AgentResult<AgentPayloadMap[K]> | Promise<AgentResult<AgentPayloadMap[K]>>;

export interface StubStep<K extends AgentId> {
  result?: AgentResult<AgentPayloadMap[K]>;
  /** Thrown instead of returning a result. */
  error?: Error;
  handler?: StubHandler<K>;
  delayMs?: number;
}

export class StubAdapter<K extends AgentId> implements AgentAdapter<K> {
  readonly id: K;
  readonly requests: AgentRequest[] = [];
  private readonly steps: StubStep<K>[];

  constructor(id: K, steps: StubStep<K> | StubStep<K>[]) {
    this.id = id;
    this.steps = Array.isArray(steps) ? [...steps] : [steps];
  }

  get calls(): number {
    return this.requests.length;
  }

  async execute(request: AgentRequest): Promise<AgentResult<AgentPayloadMap[K]>> {
    this.requests.push(request);
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];

    if (step?.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, step.delayMs));
    }
    if (step?.error) {
      throw step.error;
    }
    if (step?.handler) {
      return step.handler(request);
    }
    return step?.result ?? { status: 'permanent_error', reason: `No stub result for ${this.id}` };
  }
}

export function succeed<P>(payload: P): AgentResult<P> {
  return { status: 'success', payload };
}

export function transient<P = never>(reason: string): AgentResult<P> {
  return { status: 'transient_error', reason };
}

export function permanent<P = never>(reason: string): AgentResult<P> {
  return { status: 'permanent_error', reason };
}

/** Registry of stubs; agents not given fail permanently if dispatched. */
export function stubRegistry(
  adapters: Partial<{ [K in AgentId]: AgentAdapter<K> }> = {}
): AgentRegistry {
  return Object.freeze({
    recipe: adapters.recipe ?? new StubAdapter('recipe', {}),
    inventory: adapters.inventory ?? new StubAdapter('inventory', {}),
    shopping: adapters.shopping ?? new StubAdapter('shopping', {}),
    health: adapters.health ?? new StubAdapter('health', {}),
  });
}
