/**
 * Structured Output
 *
 * JSON-mode chat requests whose answers are parsed and validated against a
 * zod schema. The model's output is untrusted: anything that does not parse or
 * does not match the schema raises StructuredOutputError with the raw text.
 */
import type { ZodType, ZodTypeDef } from 'zod';
import { StructuredOutputError, TransientAgentError, PermanentAgentError } from '../errors.js';
import type { ChatOptions, LLMProvider } from './types.js';

export async function requestJson<T>(
  llm: LLMProvider,
  options: Omit<ChatOptions, 'format'>,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  const response = await llm.chat({ ...options, format: 'json' });
  const raw = response.message.content;

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    throw new StructuredOutputError('Model returned invalid JSON', raw, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new StructuredOutputError(`Model output failed validation: ${issues}`, raw);
  }

  return result.data;
}

// Some models wrap JSON in a markdown fence even in JSON mode
function stripCodeFence(text: string): string {
  const match = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/.exec(text);
  return match?.[1] ?? text;
}

/**
 * Map an error raised while talking to the LLM onto the agent error taxonomy.
 * Rate limits, server errors, connection failures and malformed output are
 * worth retrying; other client errors are not.
 */
export function classifyLlmError(error: unknown): TransientAgentError | PermanentAgentError {
  if (error instanceof TransientAgentError || error instanceof PermanentAgentError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof StructuredOutputError) {
    return new TransientAgentError(message, { cause: error });
  }

  const status = httpStatusOf(error);
  if (status !== undefined) {
    if (status === 429 || status === 408 || status >= 500) {
      return new TransientAgentError(`LLM request failed with status ${status}: ${message}`, {
        cause: error,
      });
    }
    return new PermanentAgentError(`LLM rejected the request (${status}): ${message}`, {
      cause: error,
    });
  }

  return new TransientAgentError(message, { cause: error });
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status_code' in error && typeof error.status_code === 'number') {
    return error.status_code;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
