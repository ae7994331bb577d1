/**
 * OpenAI Model Gateway
 * Chat completions with function calling; works against any OpenAI-compatible endpoint.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { env } from '../env.js';
import { ModelGatewayError, errorMessage } from '../utils/errors.js';
import { toOpenAIFunction } from '../services/tools/registry.js';
import type { CapabilityDescriptor, ToolArguments, ToolInvocationRequest } from '../services/tools/types.js';
import type { Turn } from '../services/sessions/types.js';
import type { ConverseOptions, ModelGateway, ModelReply } from './types.js';

interface CompletionToolCall {
  id: string;
  function: { name: string; arguments: string };
}

interface CompletionLike {
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: CompletionToolCall[];
    };
  }>;
}

/** The slice of the OpenAI SDK this gateway uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number }
      ): Promise<CompletionLike>;
    };
  };
}

export interface OpenAIGatewayOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  client?: ChatCompletionsClient;
}

export const TOOL_RESULT_PREFIX = 'Tool results:\n';

export function toChatMessages(turns: readonly Turn[]): ChatCompletionMessageParam[] {
  return turns.map((turn): ChatCompletionMessageParam => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content };
      case 'user':
        return { role: 'user', content: turn.content };
      case 'assistant':
        return { role: 'assistant', content: turn.content };
      case 'tool-result':
        // Results are replayed as plain text; tool_call ids are not kept across turns
        return { role: 'user', content: TOOL_RESULT_PREFIX + turn.content };
    }
  });
}

export function toChatTools(capabilities: readonly CapabilityDescriptor[]): ChatCompletionTool[] {
  return capabilities.map((descriptor): ChatCompletionTool => ({
    type: 'function',
    function: toOpenAIFunction(descriptor),
  }));
}

function isToolArguments(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseToolCall(call: CompletionToolCall): ToolInvocationRequest {
  const raw = call.function.arguments.trim();
  if (!raw) {
    return { name: call.function.name, arguments: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { name: call.function.name, arguments: {}, argumentError: errorMessage(error) };
  }

  if (!isToolArguments(parsed)) {
    return { name: call.function.name, arguments: {}, argumentError: 'arguments must be a JSON object' };
  }
  return { name: call.function.name, arguments: parsed };
}

export function parseCompletion(completion: CompletionLike): ModelReply {
  const message = completion.choices[0]?.message;
  if (!message) {
    throw new ModelGatewayError('Model returned no choices');
  }

  const toolCalls = message.tool_calls ?? [];
  if (toolCalls.length > 0) {
    return { type: 'tool_requests', requests: toolCalls.map(parseToolCall) };
  }

  const text = message.content?.trim() ?? '';
  if (!text) {
    throw new ModelGatewayError('Model returned neither content nor tool calls');
  }
  return { type: 'text', text };
}

export class OpenAIGateway implements ModelGateway {
  name = 'openai';
  private client: ChatCompletionsClient | null;
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private temperature: number;
  private timeoutMs: number;

  constructor(options: OpenAIGatewayOptions = {}) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    this.baseUrl = options.baseUrl ?? env.OPENAI_BASE_URL;
    this.model = options.model ?? env.OPENAI_MODEL;
    this.temperature = options.temperature ?? env.MODEL_TEMPERATURE;
    this.timeoutMs = options.timeoutMs ?? env.MODEL_TIMEOUT_MS;
  }

  private getClient(): ChatCompletionsClient {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new ModelGatewayError('OPENAI_API_KEY is not configured');
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl || undefined,
      // A failed call fails the cycle; no SDK-level retries
      maxRetries: 0,
    });
    return this.client;
  }

  async converse(
    turns: readonly Turn[],
    capabilities: readonly CapabilityDescriptor[],
    options: ConverseOptions = {}
  ): Promise<ModelReply> {
    const client = this.getClient();
    const tools = toChatTools(capabilities);

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toChatMessages(turns),
      temperature: this.temperature,
    };
    if (tools.length > 0) {
      body.tools = tools;
      body.tool_choice = 'auto';
    }

    let completion: CompletionLike;
    try {
      completion = await client.chat.completions.create(body, {
        signal: options.signal,
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new ModelGatewayError(`OpenAI request failed: ${errorMessage(error)}`, { cause: error });
    }

    return parseCompletion(completion);
  }
}
