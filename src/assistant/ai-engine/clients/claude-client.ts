/**
 * Claude API client
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  AIEngineError,
  AssistantTurn,
  ChatSession,
  ChatSessionOptions,
  ClientInfo,
  LLMClient,
  ToolCall,
  ToolDefinition,
  ToolResult,
  isRecord,
  mapProviderError,
  normalizeHistory
} from '../interface';

export interface ClaudeClientConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
}

/**
 * The fields of a Messages API response the client reads
 */
export type ClaudeResponse = Pick<Anthropic.Message, 'content' | 'stop_reason'> & {
  usage: Pick<Anthropic.Usage, 'input_tokens' | 'output_tokens'>;
};

export interface ClaudeMessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<ClaudeResponse>;
}

export const DEFAULT_CLAUDE_MODEL = 'claude-3-5-sonnet-20241022';

/**
 * Claude client
 */
export class ClaudeClient implements LLMClient {
  private readonly config: Required<Omit<ClaudeClientConfig, 'baseUrl'>> & { baseUrl?: string };
  private readonly api: ClaudeMessagesApi;

  constructor(config: ClaudeClientConfig, api?: ClaudeMessagesApi) {
    if (!config.apiKey) {
      throw AIEngineError.configurationError('Claude API key is required');
    }

    this.config = {
      apiKey: config.apiKey,
      model: config.model || DEFAULT_CLAUDE_MODEL,
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? 60000,
      maxRetries: config.maxRetries ?? 2,
      defaultMaxTokens: config.defaultMaxTokens ?? 2048,
      defaultTemperature: config.defaultTemperature ?? 0.7
    };

    if (api) {
      this.api = api;
    } else {
      const client = new Anthropic({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        timeout: this.config.timeout,
        maxRetries: this.config.maxRetries
      });
      this.api = { create: params => client.messages.create(params) };
    }
  }

  startChat(options: ChatSessionOptions): ChatSession {
    const messages: Anthropic.MessageParam[] = normalizeHistory(options.history).map(turn => ({
      role: turn.role,
      content: turn.content
    }));

    const baseParams = {
      model: this.config.model,
      system: options.systemPrompt,
      tools: options.tools.map(toClaudeTool),
      max_tokens: options.maxTokens ?? this.config.defaultMaxTokens,
      temperature: options.temperature ?? this.config.defaultTemperature
    };

    const send = async (content: string | Anthropic.ToolResultBlockParam[]): Promise<AssistantTurn> => {
      messages.push({ role: 'user', content });

      let response: ClaudeResponse;
      try {
        response = await this.api.create({ ...baseParams, messages: [...messages] });
      } catch (error) {
        messages.pop();
        throw this.handleError(error);
      }

      messages.push({ role: 'assistant', content: response.content });
      return this.convertResponse(response);
    };

    return {
      sendMessage: text => send(text),
      sendToolResults: (results: ToolResult[]) => send(results.map(toToolResultBlock))
    };
  }

  private convertResponse(response: ClaudeResponse): AssistantTurn {
    let text = '';
    const toolCalls: ToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          args: isRecord(block.input) ? block.input : {}
        });
      }
    }

    return {
      text,
      toolCalls,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      }
    };
  }

  private handleError(error: unknown): AIEngineError {
    if (error instanceof Anthropic.APIError) {
      return mapProviderError('Claude', error, error.status, undefined, error.headers?.['retry-after']);
    }
    return mapProviderError('Claude', error);
  }

  getClientInfo(): ClientInfo {
    return {
      provider: 'anthropic',
      model: this.config.model,
      features: ['chat_completion', 'system_prompt', 'tool_use']
    };
  }
}

function toClaudeTool(tool: ToolDefinition): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.parameters.properties,
      required: [...tool.parameters.required]
    }
  };
}

function toToolResultBlock(result: ToolResult): Anthropic.ToolResultBlockParam {
  return {
    type: 'tool_result',
    tool_use_id: result.callId,
    content: JSON.stringify(result.response),
    is_error: result.response.type === 'error'
  };
}
