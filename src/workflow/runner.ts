/**
 * Kitchen Assistant
 *
 * Entry point for one conversational turn: resolves the intent against the
 * session's conversation context, plans the agents, runs the orchestration
 * loop and records the exchange back into the context.
 *
 * Intent resolution failures and planner misconfiguration end the turn in the
 * `failed` state with a prompt for the user; every other agent-level problem
 * is already folded into the response by the loop.
 */
import type { AppSettings } from '../config/schema.js';
import { getAgentPrompt, getModelConfig } from '../config/settings.js';
import { createAgentRegistry } from '../agents/factory.js';
import type { PantryStore } from '../inventory/pantry-store.js';
import type { LLMProvider } from '../llm/types.js';
import { getOllamaProvider } from '../llm/ollama.js';
import { IntentResolver } from '../intent/resolver.js';
import { SessionContextStore } from '../intent/context.js';
import type { Attachment, Query } from '../intent/types.js';
import { DEFAULT_DEPENDENCY_RULES, DependencyPlanner } from '../planner/planner.js';
import { ResponseSynthesizer } from '../synthesis/synthesizer.js';
import type { FinalResponse } from '../synthesis/types.js';
import { IntentResolutionError, PlannerConfigurationError } from '../errors.js';
import { workflowLogger } from '../utils/logger.js';
import { OrchestrationLoop, loopOptionsFromConfig, type RunOptions } from './loop.js';
import type { Transition } from './state.js';

const PLANNING_FAILED_MESSAGE =
  'Sorry, something went wrong while planning this request. Please try again later.';

export interface AssistantComponents {
  resolver: IntentResolver;
  planner: DependencyPlanner;
  loop: OrchestrationLoop;
  synthesizer: ResponseSynthesizer;
  sessions: SessionContextStore;
}

export type SubmitOptions = RunOptions;

export class KitchenAssistant {
  private readonly resolver: IntentResolver;
  private readonly planner: DependencyPlanner;
  private readonly loop: OrchestrationLoop;
  private readonly synthesizer: ResponseSynthesizer;
  readonly sessions: SessionContextStore;

  constructor(components: AssistantComponents) {
    this.resolver = components.resolver;
    this.planner = components.planner;
    this.loop = components.loop;
    this.synthesizer = components.synthesizer;
    this.sessions = components.sessions;
  }

  async submitQuery(
    text: string,
    sessionId: string,
    attachments: Attachment[] = [],
    options: SubmitOptions = {}
  ): Promise<FinalResponse> {
    const query: Query = { text, sessionId, timestamp: new Date(), attachments };
    const context = this.sessions.get(sessionId);

    workflowLogger.info(
      { sessionId, length: text.length, attachments: attachments.length },
      'Query received'
    );

    let response: FinalResponse;
    try {
      const intent = await this.resolver.resolve(text, context);
      const plan = this.planner.plan(intent);
      response = await this.loop.run(query, intent, plan, options);

      if (intent.clarification) {
        response = { ...response, message: intent.clarification };
      }
    } catch (error) {
      if (error instanceof IntentResolutionError) {
        response = this.fail(sessionId, error.clarification, error.message, options);
      } else if (error instanceof PlannerConfigurationError) {
        workflowLogger.fatal({ sessionId, cycle: error.cycle }, error.message);
        response = this.fail(sessionId, PLANNING_FAILED_MESSAGE, error.message, options);
      } else {
        throw error;
      }
    }

    context.record('user', text, query.timestamp);
    context.record('assistant', summarize(response));
    return response;
  }

  private fail(
    sessionId: string,
    message: string,
    note: string,
    options: SubmitOptions
  ): FinalResponse {
    const transition: Transition = { from: 'routing', to: 'failed', at: new Date(), note };
    options.onTransition?.(transition);
    return this.synthesizer.prompt(sessionId, 'failed', message, [transition]);
  }
}

/** One-line description of a response, kept as the assistant's turn in the context. */
export function summarize(response: FinalResponse): string {
  if (response.sections.length === 0) {
    return response.message ?? '';
  }
  const parts = response.sections.map((s) =>
    s.status === 'ok' ? s.title : `${s.title} (${s.status})`
  );
  return `Answered with: ${parts.join(', ')}`;
}

export interface CreateAssistantOptions {
  llm?: LLMProvider;
  pantry?: PantryStore;
}

/**
 * Wire the assistant from settings. Throws PlannerConfigurationError when the
 * configured dependency rules contain a cycle.
 */
export function createAssistant(
  settings: AppSettings,
  options: CreateAssistantOptions = {}
): KitchenAssistant {
  const llm = options.llm ?? getOllamaProvider(settings.llm.host);
  const registry = createAgentRegistry({ settings, llm, pantry: options.pantry });

  const resolver = new IntentResolver(llm, {
    model: getModelConfig('intent_resolver', settings),
    instruction: getAgentPrompt('intent_resolver', settings),
    historyTurns: settings.intent.history_turns,
    minConfidence: settings.intent.min_confidence,
  });

  const planner = new DependencyPlanner([
    ...DEFAULT_DEPENDENCY_RULES,
    ...settings.orchestration.dependencies,
  ]);

  const synthesizer = new ResponseSynthesizer();
  const loop = new OrchestrationLoop(
    registry,
    synthesizer,
    loopOptionsFromConfig(settings.orchestration)
  );

  const sessions = new SessionContextStore({
    maxSessions: settings.sessions.max_sessions,
    maxTurns: settings.sessions.max_turns,
  });

  return new KitchenAssistant({ resolver, planner, loop, synthesizer, sessions });
}
