/**
 * LLM client interfaces
 *
 * Providers are reached through a chat session that keeps its own transcript,
 * so callers only exchange user text and tool results.
 */

/**
 * JSON schema subset used for tool parameters
 */
export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  enum?: readonly string[];
}

export interface ToolParameters {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: readonly string[];
}

/**
 * Provider-neutral function declaration
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export type ToolArgs = Record<string, unknown>;

export interface ToolCall {
  /** Provider call id; tool results must echo it */
  id: string;
  name: string;
  args: ToolArgs;
}

export interface ToolResult {
  callId: string;
  name: string;
  response: Record<string, unknown>;
}

/**
 * One model response: concatenated text parts and requested calls
 */
export interface AssistantTurn {
  text: string;
  toolCalls: ToolCall[];
  usage?: TokenUsage;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatSessionOptions {
  systemPrompt: string;
  history: ConversationTurn[];
  tools: readonly ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
}

export interface ChatSession {
  sendMessage(text: string): Promise<AssistantTurn>;

  /**
   * Answer every call of the previous turn in one request
   */
  sendToolResults(results: ToolResult[]): Promise<AssistantTurn>;
}

/**
 * LLM client
 */
export interface LLMClient {
  startChat(options: ChatSessionOptions): ChatSession;

  getClientInfo(): ClientInfo;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ClientInfo {
  provider: string;
  model: string;
  features: string[];
}

export enum AIEngineErrorType {
  API_ERROR = 'api_error',
  AUTHENTICATION_ERROR = 'authentication_error',
  RATE_LIMIT_ERROR = 'rate_limit_error',
  NETWORK_ERROR = 'network_error',
  CONFIGURATION_ERROR = 'configuration_error',
  PARSING_ERROR = 'parsing_error'
}

/**
 * AI engine error
 */
export class AIEngineError extends Error {
  constructor(
    message: string,
    public readonly type: AIEngineErrorType,
    public readonly code?: string,
    public readonly retryable: boolean = false,
    public readonly originalError?: unknown,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'AIEngineError';
  }

  static apiError(message: string, code?: string, originalError?: unknown): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.API_ERROR, code, true, originalError);
  }

  static authenticationError(message: string, code?: string): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.AUTHENTICATION_ERROR, code, false);
  }

  static rateLimitError(message: string, retryAfter?: number): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.RATE_LIMIT_ERROR, undefined, true, undefined, retryAfter);
  }

  static networkError(message: string, originalError?: unknown): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.NETWORK_ERROR, undefined, true, originalError);
  }

  static configurationError(message: string): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.CONFIGURATION_ERROR, undefined, false);
  }

  static parsingError(message: string, originalError?: unknown): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.PARSING_ERROR, undefined, false, originalError);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Providers that require alternating roles reject repeated or leading assistant turns
 */
export function normalizeHistory(history: readonly ConversationTurn[]): ConversationTurn[] {
  const turns: ConversationTurn[] = [];

  for (const turn of history) {
    if (!turn.content) {
      continue;
    }
    if (turns.length === 0 && turn.role === 'assistant') {
      continue;
    }

    const last = turns[turns.length - 1];
    if (last && last.role === turn.role) {
      last.content = `${last.content}\n\n${turn.content}`;
    } else {
      turns.push({ ...turn });
    }
  }

  return turns;
}

/**
 * Map a transport failure to an AIEngineError using its HTTP status, when it has one
 */
export function mapProviderError(provider: string, error: unknown, status?: number, code?: string, retryAfter?: string | null): AIEngineError {
  if (error instanceof AIEngineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (status !== undefined) {
    switch (status) {
      case 401:
      case 403:
        return AIEngineError.authenticationError(`${provider} API authentication failed`, code);

      case 429:
        return AIEngineError.rateLimitError(
          `${provider} API rate limit exceeded`,
          retryAfter ? parseInt(retryAfter, 10) : undefined
        );

      case 500:
      case 502:
      case 503:
      case 504:
        return AIEngineError.apiError(`${provider} API server error: ${message}`, code, error);

      default:
        return AIEngineError.apiError(`${provider} API error: ${message}`, code, error);
    }
  }

  const lower = message.toLowerCase();
  if (lower.includes('timeout') || lower.includes('timed out') || lower.includes('network') || lower.includes('connection')) {
    return AIEngineError.networkError(`Network error: ${message}`, error);
  }

  return AIEngineError.apiError(`Unknown error: ${message}`, undefined, error);
}
