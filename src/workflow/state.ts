/**
 * Workflow State
 *
 * Per-request record the orchestration loop drives: where the state machine
 * is, which agents have completed and what each produced. Created at the start
 * of one request and dropped at its end.
 *
 * Invariants enforced here:
 * - completed ⊆ intent.requiredAgents, and outputs.keys() == completed
 * - outputs are append-only and deep-frozen once recorded
 * - only the transitions in TRANSITIONS are accepted
 */
import type { AgentId, AgentOutput } from '../agents/types.js';
import type { Intent, Query } from '../intent/types.js';
import type { Plan } from '../planner/planner.js';
import { deepFreeze } from '../utils/freeze.js';

export type WorkflowPhase = 'routing' | 'dispatching' | 'synthesizing' | 'done' | 'failed';

export interface Transition {
  from: WorkflowPhase;
  to: WorkflowPhase;
  /** Agents being dispatched, on transitions into `dispatching`. */
  agentIds?: AgentId[];
  at: Date;
  note?: string;
}

export type TransitionListener = (transition: Transition) => void;

const TRANSITIONS: Readonly<Record<WorkflowPhase, readonly WorkflowPhase[]>> = {
  routing: ['dispatching', 'synthesizing', 'failed'],
  dispatching: ['routing'],
  synthesizing: ['done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminal(phase: WorkflowPhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

export class WorkflowState {
  readonly query: Query;
  readonly intent: Intent;
  readonly plan: Plan;

  private current: WorkflowPhase = 'routing';
  private readonly done = new Set<AgentId>();
  private readonly results = new Map<AgentId, AgentOutput>();
  private readonly log: Transition[] = [];
  private readonly listener?: TransitionListener;

  constructor(query: Query, intent: Intent, plan: Plan, listener?: TransitionListener) {
    this.query = query;
    this.intent = intent;
    this.plan = plan;
    this.listener = listener;
  }

  get phase(): WorkflowPhase {
    return this.current;
  }

  get completed(): ReadonlySet<AgentId> {
    return this.done;
  }

  get outputs(): ReadonlyMap<AgentId, AgentOutput> {
    return this.results;
  }

  get history(): readonly Transition[] {
    return this.log;
  }

  /** Planned agents not yet completed, in planner order. */
  pending(): AgentId[] {
    return this.plan.order.filter((id) => !this.done.has(id));
  }

  transition(to: WorkflowPhase, details: { agentIds?: AgentId[]; note?: string } = {}): Transition {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal workflow transition ${from} → ${to}`);
    }

    const transition: Transition = deepFreeze({
      from,
      to,
      at: new Date(),
      ...(details.agentIds ? { agentIds: [...details.agentIds] } : {}),
      ...(details.note ? { note: details.note } : {}),
    });

    this.current = to;
    this.log.push(transition);
    this.listener?.(transition);
    return transition;
  }

  record(agentId: AgentId, output: AgentOutput): void {
    if (!this.intent.requiredAgents.includes(agentId)) {
      throw new Error(`Agent ${agentId} is not required by this workflow`);
    }
    if (this.done.has(agentId)) {
      throw new Error(`Output for ${agentId} has already been recorded`);
    }

    this.results.set(agentId, deepFreeze(output));
    this.done.add(agentId);
  }

  /** Copy of the outputs recorded so far, handed to adapters. */
  snapshot(): ReadonlyMap<AgentId, AgentOutput> {
    return new Map(this.results);
  }
}
