/**
 * Orchestration Loop
 *
 * The state machine that drives one request from routing to a FinalResponse:
 *
 *   routing → dispatching(ids) → routing → … → synthesizing → done
 *
 * Every dispatch cycle adds at least one agent to `completed`, so the loop
 * ends after at most |requiredAgents| cycles. Dispatch order comes from the
 * plan alone. Cancellation and the workflow deadline are checked on every
 * pass through routing; agents that never ran are reported as skipped.
 */
import type { AgentAdapter, AgentId, AgentOutput, AgentRegistry } from '../agents/types.js';
import type { OrchestrationConfig } from '../config/schema.js';
import type { Intent, Query } from '../intent/types.js';
import type { Plan } from '../planner/planner.js';
import type { ResponseSynthesizer } from '../synthesis/synthesizer.js';
import type { FinalResponse, Interruption } from '../synthesis/types.js';
import { workflowLogger } from '../utils/logger.js';
import { dispatchAgent, type RetryPolicy } from './dispatcher.js';
import { WorkflowState, type TransitionListener } from './state.js';

export interface LoopOptions extends RetryPolicy {
  workflowDeadlineMs: number;
  /** Run all ready agents of a batch at once instead of one at a time. */
  parallelDispatch: boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  onTransition?: TransitionListener;
}

export function loopOptionsFromConfig(config: OrchestrationConfig): LoopOptions {
  return {
    timeoutMs: config.agent_timeout_ms,
    maxRetries: config.max_retries,
    baseDelayMs: config.retry_base_delay_ms,
    maxDelayMs: config.retry_max_delay_ms,
    workflowDeadlineMs: config.workflow_deadline_ms,
    parallelDispatch: config.parallel_dispatch,
  };
}

export class OrchestrationLoop {
  private readonly registry: AgentRegistry;
  private readonly synthesizer: ResponseSynthesizer;
  private readonly options: LoopOptions;

  constructor(registry: AgentRegistry, synthesizer: ResponseSynthesizer, options: LoopOptions) {
    this.registry = registry;
    this.synthesizer = synthesizer;
    this.options = options;
  }

  async run(
    query: Query,
    intent: Intent,
    plan: Plan,
    runOptions: RunOptions = {}
  ): Promise<FinalResponse> {
    const now = this.options.now ?? Date.now;
    const signal = runOptions.signal ?? new AbortController().signal;
    const deadline = now() + this.options.workflowDeadlineMs;
    const state = new WorkflowState(query, intent, plan, runOptions.onTransition);
    const log = workflowLogger.child({ sessionId: query.sessionId });

    log.info({ order: plan.order, parallel: this.options.parallelDispatch }, 'Workflow started');

    let interruption: Interruption | undefined;

    for (;;) {
      const next = this.nextAgents(state);
      if (next.length === 0) {
        break;
      }
      if (signal.aborted) {
        interruption = 'cancelled';
        break;
      }
      if (now() >= deadline) {
        interruption = 'deadline';
        break;
      }

      state.transition('dispatching', { agentIds: next });
      const snapshot = state.snapshot();

      // Batch barrier: every member settles before anything is recorded
      const results = await Promise.all(
        next.map(async (id) => ({
          id,
          output: await this.dispatch(this.registry[id], query, intent, snapshot, {
            deadline,
            signal,
          }),
        }))
      );

      for (const { id, output } of results) {
        state.record(id, output);
      }
      state.transition('routing', {
        note: `completed ${state.completed.size}/${plan.order.length}`,
      });
    }

    const pending = state.pending();
    state.transition('synthesizing', {
      note: interruption ? `${interruption}; skipping ${pending.join(', ')}` : undefined,
    });

    if (interruption) {
      log.warn({ interruption, skipped: pending }, 'Workflow stopped early');
    }

    const response = this.synthesizer.synthesize({
      sessionId: query.sessionId,
      intent,
      plan,
      outputs: state.outputs,
      completed: state.completed,
      interruption,
    });
    state.transition('done');

    log.info(
      { completed: [...state.completed], warnings: response.warnings },
      'Workflow finished'
    );
    return { ...response, trace: [...state.history] };
  }

  /**
   * Sequential mode takes the first pending agent. Parallel mode takes the
   * pending members of the first batch that still has any.
   */
  private nextAgents(state: WorkflowState): AgentId[] {
    const pending = state.pending();
    if (pending.length === 0) {
      return [];
    }
    if (!this.options.parallelDispatch) {
      return pending.slice(0, 1);
    }

    for (const batch of state.plan.batches) {
      const open = batch.filter((id) => pending.includes(id));
      if (open.length > 0) {
        return open;
      }
    }
    return [];
  }

  private dispatch(
    adapter: AgentAdapter,
    query: Query,
    intent: Intent,
    snapshot: ReadonlyMap<AgentId, AgentOutput>,
    context: { deadline: number; signal: AbortSignal }
  ): Promise<AgentOutput> {
    return dispatchAgent(
      adapter,
      { query: query.text, entities: intent.entities, visiblePriorOutputs: snapshot },
      this.options,
      { ...context, now: this.options.now, sleep: this.options.sleep }
    );
  }
}
