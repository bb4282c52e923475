import type { AgentId } from '../agents/types.js';
import type { Transition } from '../workflow/state.js';

export type SectionStatus = 'ok' | 'degraded' | 'skipped';

export interface ResponseSection {
  agentId: AgentId;
  status: SectionStatus;
  title: string;
  content: string;
}

export type ResponseStatus = 'done' | 'failed';

export interface FinalResponse {
  sessionId: string;
  status: ResponseStatus;
  /** One per required agent, in planner order. */
  sections: ResponseSection[];
  /** Agents whose section is degraded or skipped. */
  warnings: AgentId[];
  /** Clarification or failure prompt for the user. */
  message?: string;
  trace: Transition[];
}

/** Why the loop stopped before every planned agent ran. */
export type Interruption = 'cancelled' | 'deadline';
