/**
 * Response Synthesizer
 *
 * Merges the outputs of a finished workflow into one per-section answer. Each
 * required agent gets exactly one section in planner order: its rendered
 * payload, a degraded notice when it failed, or a skipped notice when the
 * workflow stopped before reaching it. Agents that were not required get no
 * section at all.
 */
import { assertNever, type AgentId, type AgentOutput } from '../agents/types.js';
import type { Intent } from '../intent/types.js';
import type { Plan } from '../planner/planner.js';
import type { Transition } from '../workflow/state.js';
import {
  renderError,
  renderHealth,
  renderInventory,
  renderRecipe,
  renderShopping,
} from './render.js';
import type { FinalResponse, Interruption, ResponseSection } from './types.js';

export const SECTION_TITLES: Readonly<Record<AgentId, string>> = {
  recipe: 'Recipe',
  inventory: 'Pantry',
  shopping: 'Shopping',
  health: 'Nutrition',
};

const INTERRUPTION_MESSAGES: Readonly<Record<Interruption, string>> = {
  cancelled: 'The request was cancelled before every step finished.',
  deadline: 'The request ran out of time before every step finished.',
};

export interface SynthesisInput {
  sessionId: string;
  intent: Intent;
  plan: Plan;
  outputs: ReadonlyMap<AgentId, AgentOutput>;
  completed: ReadonlySet<AgentId>;
  interruption?: Interruption;
  trace?: readonly Transition[];
}

export function renderOutput(output: AgentOutput): string {
  switch (output.kind) {
    case 'recipe':
      return renderRecipe(output);
    case 'inventory':
      return renderInventory(output);
    case 'shopping':
      return renderShopping(output);
    case 'health':
      return renderHealth(output);
    case 'error':
      return renderError(output);
    default:
      return assertNever(output);
  }
}

export class ResponseSynthesizer {
  synthesize(input: SynthesisInput): FinalResponse {
    const { intent, plan, outputs, completed, interruption } = input;
    const sections = plan.order
      .filter((id) => intent.requiredAgents.includes(id))
      .map((id) => {
        const output = completed.has(id) ? outputs.get(id) : undefined;
        return this.section(id, output, interruption);
      });

    const warnings = sections.filter((s) => s.status !== 'ok').map((s) => s.agentId);
    const skipped = sections.some((s) => s.status === 'skipped');

    return {
      sessionId: input.sessionId,
      status: 'done',
      sections,
      warnings,
      ...(interruption && skipped ? { message: INTERRUPTION_MESSAGES[interruption] } : {}),
      trace: [...(input.trace ?? [])],
    };
  }

  /** Response carrying only a prompt for the user, e.g. a clarification question. */
  prompt(
    sessionId: string,
    status: FinalResponse['status'],
    message: string,
    trace: readonly Transition[] = []
  ): FinalResponse {
    return { sessionId, status, sections: [], warnings: [], message, trace: [...trace] };
  }

  private section(
    agentId: AgentId,
    output: AgentOutput | undefined,
    interruption: Interruption | undefined
  ): ResponseSection {
    const title = SECTION_TITLES[agentId];

    if (!output) {
      const why =
        interruption === 'cancelled'
          ? 'the request was cancelled'
          : interruption === 'deadline'
            ? 'the time limit was reached'
            : 'it did not run';
      return { agentId, status: 'skipped', title, content: `Skipped because ${why}.` };
    }

    return {
      agentId,
      status: output.kind === 'error' ? 'degraded' : 'ok',
      title,
      content: renderOutput(output),
    };
  }
}
