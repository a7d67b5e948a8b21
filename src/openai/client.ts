import OpenAI from 'openai';
import { CFG } from '../config';
import { buildMessages } from '../engine/buildMessages';
import type { ChatMessage, ModelErrorCode } from '../types';

export class ModelInvocationError extends Error {
  constructor(
    readonly code: Extract<ModelErrorCode, 'LLM_NOT_INITIALIZED' | 'LLM_CHAIN_ERROR'>,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ModelInvocationError';
  }
}

/** Sends one composed prompt plus chat history, returns the raw reply text. */
export interface ModelInvoker {
  invoke(prompt: string, history: readonly ChatMessage[]): Promise<string>;
}

interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

/** The slice of the OpenAI SDK the invoker calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionResult>;
    };
  };
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  requests: number;
}

export interface InvokerOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  /** Pre-built client; skips SDK construction. */
  client?: ChatClient;
}

function createClient(apiKey: string, timeoutMs: number): ChatClient | null {
  if (!apiKey) {
    console.error('[OpenAI] OPENAI_API_KEY is not set; model calls will fail');
    return null;
  }
  try {
    return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  } catch (error) {
    console.error('[OpenAI] Failed to initialize client:', error instanceof Error ? error.message : error);
    return null;
  }
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof OpenAI.APIError) {
    return `${error.name} (${error.status ?? 'no status'}) - ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name} - ${error.message}`;
  }
  return String(error);
}

export class OpenAIInvoker implements ModelInvoker {
  private readonly client: ChatClient | null;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private tokens: TokenUsage = { inputTokens: 0, outputTokens: 0, requests: 0 };

  constructor(options: InvokerOptions = {}) {
    this.model = options.model ?? CFG.CHAT_MODEL;
    this.temperature = options.temperature ?? CFG.TEMPERATURE;
    this.timeoutMs = options.timeoutMs ?? CFG.TIMEOUT_MS;
    this.client = options.client ?? createClient(options.apiKey ?? CFG.OPENAI_API_KEY, this.timeoutMs);
  }

  get initialized(): boolean {
    return this.client !== null;
  }

  usage(): TokenUsage {
    return { ...this.tokens };
  }

  async invoke(prompt: string, history: readonly ChatMessage[]): Promise<string> {
    if (!this.client) {
      throw new ModelInvocationError('LLM_NOT_INITIALIZED', 'LLM client could not be set up.');
    }

    let result: ChatCompletionResult;
    try {
      result = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: buildMessages(prompt, history)
      });
    } catch (error) {
      const detail = describeFailure(error, this.timeoutMs);
      console.error(`[OpenAI] chat completion (${this.model}) failed: ${detail}`);
      throw new ModelInvocationError('LLM_CHAIN_ERROR', detail, error);
    }

    this.tokens.requests += 1;
    if (result.usage) {
      this.tokens.inputTokens += result.usage.prompt_tokens;
      this.tokens.outputTokens += result.usage.completion_tokens;
      console.log(`[OpenAI] Tokens - Input: ${result.usage.prompt_tokens}, Output: ${result.usage.completion_tokens}, Total: ${result.usage.total_tokens}`);
    }

    return result.choices[0]?.message.content ?? '';
  }
}
