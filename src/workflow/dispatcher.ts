/**
 * Agent Dispatcher
 *
 * Invokes one adapter under a per-call timeout and retries transient failures
 * with capped exponential backoff. Whatever happens, the caller gets back an
 * AgentOutput: the payload on success, an AgentError otherwise.
 */
import type {
  AgentAdapter,
  AgentId,
  AgentOutput,
  AgentPayloadMap,
  AgentRequest,
  AgentResult,
} from '../agents/types.js';
import { PermanentAgentError, TransientAgentError, errorMessage } from '../errors.js';
import { workflowLogger } from '../utils/logger.js';

export interface RetryPolicy {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface DispatchContext {
  /** Absolute time (ms since epoch) after which no new attempt starts. */
  deadline: number;
  signal: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type Result = AgentResult<AgentPayloadMap[AgentId]>;

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function dispatchAgent(
  adapter: AgentAdapter,
  request: Omit<AgentRequest, 'signal'>,
  policy: RetryPolicy,
  context: DispatchContext
): Promise<AgentOutput> {
  const now = context.now ?? Date.now;
  const sleep = context.sleep ?? delay;
  const maxAttempts = policy.maxRetries + 1;

  let attempts = 0;
  let reason = 'not attempted';

  while (attempts < maxAttempts) {
    const remaining = context.deadline - now();
    if (attempts > 0 && (remaining <= 0 || context.signal.aborted)) {
      break;
    }

    attempts++;
    const timeoutMs = Math.max(1, Math.min(policy.timeoutMs, remaining));
    const result = await attempt(adapter, request, timeoutMs);

    if (result.status === 'success') {
      workflowLogger.debug({ agent: adapter.id, attempts }, 'Agent succeeded');
      return result.payload;
    }

    reason = result.reason;
    if (result.status === 'permanent_error') {
      workflowLogger.warn({ agent: adapter.id, attempts, reason }, 'Agent failed permanently');
      break;
    }

    workflowLogger.warn({ agent: adapter.id, attempts, reason }, 'Agent failed transiently');
    if (attempts < maxAttempts) {
      const wait = backoffDelay(attempts, policy.baseDelayMs, policy.maxDelayMs);
      if (now() + wait >= context.deadline) {
        break;
      }
      await sleep(wait);
    }
  }

  return { kind: 'error', agentId: adapter.id, reason, attempts };
}

/**
 * One call, raced against a timer. Only the timer aborts the call's signal;
 * workflow cancellation is checked between attempts and lets a running call
 * finish.
 */
async function attempt(
  adapter: AgentAdapter,
  request: Omit<AgentRequest, 'signal'>,
  timeoutMs: number
): Promise<Result> {
  const controller = new AbortController();

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Result>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: 'transient_error', reason: `Timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  try {
    const call = invoke(adapter, { ...request, signal: controller.signal });
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function invoke(adapter: AgentAdapter, request: AgentRequest): Promise<Result> {
  try {
    return await adapter.execute(request);
  } catch (error) {
    if (error instanceof PermanentAgentError) {
      return { status: 'permanent_error', reason: error.message };
    }
    if (error instanceof TransientAgentError) {
      return { status: 'transient_error', reason: error.message };
    }
    // Anything unclassified gets another try
    return { status: 'transient_error', reason: errorMessage(error) };
  }
}
