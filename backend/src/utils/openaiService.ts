import OpenAI from 'openai';
import { GatewayReply, PromptMessage, PromptPayload } from '../types';
import { GatewayFailure, errorMessage } from './errors';

/** The one call the gateway needs from a chat model. */
export interface CompletionProvider {
  complete(messages: PromptMessage[]): Promise<string | null>;
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

function toChatMessage(message: PromptMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAIProvider implements CompletionProvider {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIProviderOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new Error('OPENAI_API_KEY is not set in environment variables');
      }
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        timeout: this.options.timeoutMs,
        maxRetries: 0 // one attempt per query
      });
    }
    return this.client;
  }

  async complete(messages: PromptMessage[]): Promise<string | null> {
    const response = await this.getClient().chat.completions.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      messages: messages.map(toChatMessage)
    });
    return response.choices[0]?.message?.content ?? null;
  }
}

export function classifyFailure(error: unknown): GatewayFailure {
  if (error instanceof GatewayFailure) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new GatewayFailure('Timeout', 'The language model did not respond in time');
  }
  if (error instanceof OpenAI.APIError && error.status === 429) {
    return new GatewayFailure('RateLimited', 'The language model rate limit was reached');
  }
  return new GatewayFailure('ApiError', errorMessage(error) || 'Language model request failed');
}

/**
 * Sends an assembled payload to the language model. A single attempt is made;
 * failures come back as GatewayFailure so the caller can report them.
 */
export class LlmGateway {
  constructor(private readonly provider: CompletionProvider) {}

  async ask(payload: PromptPayload): Promise<GatewayReply> {
    const startTime = Date.now();
    try {
      console.log(`[llm] Sending ${payload.messages.length} message(s), ${payload.documents.length} document(s)`);
      const text = await this.provider.complete(payload.messages);
      const latency = Date.now() - startTime;
      if (!text || text.trim().length === 0) {
        throw new GatewayFailure('ApiError', 'The language model returned an empty reply');
      }
      console.log(`[llm] Reply received in ${latency}ms`);
      return { text, latency };
    } catch (error) {
      const failure = classifyFailure(error);
      console.error(`[llm] ${failure.kind} after ${Date.now() - startTime}ms: ${failure.message}`);
      throw failure;
    }
  }
}
