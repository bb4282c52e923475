import type {
  AgentAdapter,
  AgentId,
  AgentPayloadMap,
  AgentRequest,
  AgentResult,
} from './types.js';
import type { LLMProvider, Message } from '../llm/types.js';
import type { ModelConfig } from '../config/schema.js';
import { classifyLlmError, requestJson } from '../llm/structured.js';
import { PermanentAgentError } from '../errors.js';
import { agentLogger } from '../utils/logger.js';
import type { ZodType, ZodTypeDef } from 'zod';

export interface AdapterConfig {
  llm: LLMProvider;
  model: ModelConfig;
  instruction: string;
}

/**
 * Shared plumbing for the LLM-backed adapters: subclasses implement `run` and
 * throw on failure; `execute` turns the outcome into an AgentResult.
 */
export abstract class BaseAdapter<K extends AgentId> implements AgentAdapter<K> {
  abstract readonly id: K;
  protected readonly config: AdapterConfig;

  constructor(config: AdapterConfig) {
    this.config = config;
  }

  async execute(request: AgentRequest): Promise<AgentResult<AgentPayloadMap[K]>> {
    try {
      const payload = await this.run(request);
      return { status: 'success', payload };
    } catch (error) {
      const classified = classifyLlmError(error);
      agentLogger.warn(
        { agent: this.id, error: classified.message, code: classified.code },
        'Adapter call failed'
      );
      if (classified instanceof PermanentAgentError) {
        return { status: 'permanent_error', reason: classified.message };
      }
      return { status: 'transient_error', reason: classified.message };
    }
  }

  protected abstract run(request: AgentRequest): Promise<AgentPayloadMap[K]>;

  protected ask<T>(
    prompt: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    signal: AbortSignal
  ): Promise<T> {
    const messages: Message[] = [{ role: 'user', content: prompt }];
    return requestJson(
      this.config.llm,
      {
        model: this.config.model.name,
        temperature: this.config.model.temperature,
        systemPrompt: this.config.instruction,
        messages,
        signal,
      },
      schema
    );
  }
}
