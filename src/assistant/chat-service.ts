/**
 * Chat assistant: one user message, a bounded function-calling loop, then history
 */

import { AssistantConfig } from '../config/config-types';
import { ChatHistoryRepository, ReadRepository, TaskRepository } from '../db/types/repository';
import { AppError } from '../utils/error-handler';
import { AppLogger, createAssistantLogger } from '../utils/logger';
import { LLMClient, ToolCall, ToolResult } from './ai-engine/interface';
import { buildSystemPrompt, formatReadsContext, formatTasksContext } from './ai-engine/prompt-engine';
import { buildHistoryEntry } from './action-summary';
import { PersonaProvider } from './persona';
import { TOOL_DEFINITIONS } from './tools/tool-definitions';
import { ActionResult, FunctionExecutor } from './tools/function-executor';

export interface ChatReply {
  response: string;
  actions: ActionResult[];
}

export type ChatOptions = Pick<
  AssistantConfig,
  'maxToolRounds' | 'historyLimit' | 'contextLimit' | 'temperature' | 'maxOutputTokens'
>;

export interface ChatServiceDeps {
  tasks: TaskRepository;
  reads: ReadRepository;
  chatHistory: ChatHistoryRepository;
  executor: FunctionExecutor;
  persona: PersonaProvider;

  /** Null when no provider is configured */
  llm: LLMClient | null;
}

export class ChatService {
  private readonly logger: AppLogger;

  constructor(
    private readonly deps: ChatServiceDeps,
    private readonly options: ChatOptions,
    logger?: AppLogger
  ) {
    this.logger = logger || createAssistantLogger();
  }

  isAvailable(): boolean {
    return this.deps.llm !== null;
  }

  async chat(userEmail: string, message: string): Promise<ChatReply> {
    if (!message) {
      throw AppError.validation('Message required', 'chat');
    }

    const llm = this.deps.llm;
    if (!llm) {
      throw AppError.configuration('Assistant is not configured: no LLM API key', 'chat');
    }

    const systemPrompt = await this.buildPrompt();
    const history = await this.deps.chatHistory.findRecent(userEmail, this.options.historyLimit);

    const session = llm.startChat({
      systemPrompt,
      history: history.map(entry => ({ role: entry.role, content: entry.content })),
      tools: TOOL_DEFINITIONS,
      temperature: this.options.temperature,
      maxTokens: this.options.maxOutputTokens
    });

    let turn = await session.sendMessage(message);
    let reply = turn.text;
    const actions: ActionResult[] = [];

    for (let round = 1; round <= this.options.maxToolRounds && turn.toolCalls.length > 0; round++) {
      const results: ToolResult[] = [];

      for (const call of turn.toolCalls) {
        if (call.name === 'ask_clarification') {
          const question = clarificationQuestion(call);
          if (question && !reply) {
            reply = question;
          }
          actions.push({ type: 'clarification' });
          results.push({ callId: call.id, name: call.name, response: { status: 'asked' } });
          continue;
        }

        const result = await this.deps.executor.execute(call, userEmail);
        if (result.type !== 'error') {
          actions.push(result);
        }
        results.push({ callId: call.id, name: call.name, response: result });
      }

      this.logger.debug(`Round ${round}: ${turn.toolCalls.map(call => call.name).join(', ')}`, undefined, 'chat');
      turn = await session.sendToolResults(results);
      reply += turn.text;
    }

    if (turn.toolCalls.length > 0) {
      this.logger.warn(
        `Stopped after ${this.options.maxToolRounds} rounds; ignored calls: ${turn.toolCalls.map(call => call.name).join(', ')}`,
        undefined,
        'chat'
      );
    }

    await this.deps.chatHistory.append(userEmail, 'user', message);
    const entry = buildHistoryEntry(reply, actions);
    if (entry) {
      await this.deps.chatHistory.append(userEmail, 'assistant', entry);
    }

    return { response: reply, actions };
  }

  private async buildPrompt(): Promise<string> {
    const [tasks, reads, persona] = await Promise.all([
      this.deps.tasks.findRecent(this.options.contextLimit),
      this.deps.reads.findRecent(this.options.contextLimit),
      this.deps.persona.load()
    ]);

    return buildSystemPrompt(persona, formatTasksContext(tasks), formatReadsContext(reads));
  }
}

function clarificationQuestion(call: ToolCall): string {
  return typeof call.args.question === 'string' ? call.args.question : '';
}
