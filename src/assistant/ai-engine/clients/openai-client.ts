/**
 * OpenAI-compatible chat completions client
 */

import OpenAI from 'openai';
import {
  AIEngineError,
  AssistantTurn,
  ChatSession,
  ChatSessionOptions,
  ClientInfo,
  LLMClient,
  ToolArgs,
  ToolCall,
  ToolDefinition,
  ToolResult,
  isRecord,
  mapProviderError,
  normalizeHistory
} from '../interface';

export interface OpenAIClientConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
}

export type OpenAIResponse = {
  choices: Array<{ message: Pick<OpenAI.Chat.ChatCompletionMessage, 'content' | 'tool_calls'> }>;
  usage?: OpenAI.CompletionUsage;
};

export interface OpenAICompletionsApi {
  create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAIResponse>;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * OpenAI client; `baseUrl` points it at any compatible endpoint
 */
export class OpenAIClient implements LLMClient {
  private readonly config: Required<Omit<OpenAIClientConfig, 'baseUrl'>> & { baseUrl?: string };
  private readonly api: OpenAICompletionsApi;

  constructor(config: OpenAIClientConfig, api?: OpenAICompletionsApi) {
    if (!config.apiKey) {
      throw AIEngineError.configurationError('OpenAI API key is required');
    }

    this.config = {
      apiKey: config.apiKey,
      model: config.model || DEFAULT_OPENAI_MODEL,
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? 60000,
      maxRetries: config.maxRetries ?? 2,
      defaultMaxTokens: config.defaultMaxTokens ?? 2048,
      defaultTemperature: config.defaultTemperature ?? 0.7
    };

    if (api) {
      this.api = api;
    } else {
      const client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        timeout: this.config.timeout,
        maxRetries: this.config.maxRetries
      });
      this.api = { create: params => client.chat.completions.create(params) };
    }
  }

  startChat(options: ChatSessionOptions): ChatSession {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: options.systemPrompt },
      ...normalizeHistory(options.history).map(turn =>
        turn.role === 'user'
          ? { role: 'user' as const, content: turn.content }
          : { role: 'assistant' as const, content: turn.content }
      )
    ];

    const tools = options.tools.map(toOpenAITool);
    const maxTokens = options.maxTokens ?? this.config.defaultMaxTokens;
    const temperature = options.temperature ?? this.config.defaultTemperature;

    const send = async (pending: OpenAI.Chat.ChatCompletionMessageParam[]): Promise<AssistantTurn> => {
      let response: OpenAIResponse;
      try {
        response = await this.api.create({
          model: this.config.model,
          messages: [...messages, ...pending],
          tools,
          max_tokens: maxTokens,
          temperature
        });
      } catch (error) {
        throw this.handleError(error);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw AIEngineError.parsingError('OpenAI response contained no choices');
      }

      const message = choice.message;
      messages.push(...pending, {
        role: 'assistant',
        content: message.content,
        ...(message.tool_calls && message.tool_calls.length > 0 ? { tool_calls: message.tool_calls } : {})
      });

      return this.convertResponse(response, message);
    };

    return {
      sendMessage: text => send([{ role: 'user', content: text }]),
      sendToolResults: (results: ToolResult[]) =>
        send(
          results.map(result => ({
            role: 'tool' as const,
            tool_call_id: result.callId,
            content: JSON.stringify(result.response)
          }))
        )
    };
  }

  private convertResponse(response: OpenAIResponse, message: OpenAIResponse['choices'][number]['message']): AssistantTurn {
    const toolCalls: ToolCall[] = (message.tool_calls || []).map(call => ({
      id: call.id,
      name: call.function.name,
      args: parseArguments(call.function.arguments)
    }));

    return {
      text: message.content || '',
      toolCalls,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : undefined
    };
  }

  private handleError(error: unknown): AIEngineError {
    if (error instanceof OpenAI.APIError) {
      return mapProviderError('OpenAI', error, error.status, error.code ?? undefined, error.headers?.['retry-after']);
    }
    return mapProviderError('OpenAI', error);
  }

  getClientInfo(): ClientInfo {
    return {
      provider: 'openai',
      model: this.config.model,
      features: ['chat_completion', 'system_prompt', 'function_calling']
    };
  }
}

/**
 * Tool arguments arrive as a JSON string; anything but an object becomes `{}`
 */
export function parseArguments(raw: string): ToolArgs {
  if (!raw) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw AIEngineError.parsingError(`Invalid tool call arguments: ${raw}`, error);
  }
}

function toOpenAITool(tool: ToolDefinition): OpenAI.Chat.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: tool.parameters.properties,
        required: [...tool.parameters.required]
      }
    }
  };
}
