export {
  WorkflowState,
  isTerminal,
  type Transition,
  type TransitionListener,
  type WorkflowPhase,
} from './state.js';
export {
  dispatchAgent,
  backoffDelay,
  type DispatchContext,
  type RetryPolicy,
} from './dispatcher.js';
export {
  OrchestrationLoop,
  loopOptionsFromConfig,
  type LoopOptions,
  type RunOptions,
} from './loop.js';
export {
  KitchenAssistant,
  createAssistant,
  summarize,
  type AssistantComponents,
  type CreateAssistantOptions,
  type SubmitOptions,
} from './runner.js';
