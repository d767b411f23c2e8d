import { AppConfig } from '../config/config-types';
import { SqlDatabase } from '../db/adapters/database';
import { Repositories, createRepositories } from '../db/repositories';
import { MagicLinkService } from '../auth/magic-link-service';
import { ChatService } from '../assistant/chat-service';
import { FunctionExecutor } from '../assistant/tools/function-executor';
import { PersonaLoader, PersonaProvider } from '../assistant/persona';
import { LLMClient } from '../assistant/ai-engine/interface';
import { createLLMClient } from '../assistant/ai-engine/client-factory';
import { ArxivSearchClient, PaperLink, PaperSearch } from '../integrations/arxiv-client';
import { CalendarSource, GoogleCalendarSource } from '../integrations/calendar-source';
import { EmailNotificationAdapter, NotificationAdapter } from '../system/notification';

export interface PaperFinder extends PaperSearch {
  findLink(query: string): Promise<PaperLink>;
}

/**
 * Services shared by the HTTP layer and the CLI
 */
export interface AppContext {
  config: AppConfig;
  db: SqlDatabase;
  repositories: Repositories;
  auth: MagicLinkService;
  chat: ChatService;
  papers: PaperFinder;
  calendar: CalendarSource;
  startedAt: Date;
}

/**
 * Replacements for the outbound collaborators
 */
export interface ContextOverrides {
  notifier?: NotificationAdapter;
  llm?: LLMClient | null;
  papers?: PaperFinder;
  calendar?: CalendarSource;
  persona?: PersonaProvider;
  clock?: () => Date;
}

export function createAppContext(config: AppConfig, db: SqlDatabase, overrides: ContextOverrides = {}): AppContext {
  const repositories = createRepositories(db);
  const papers = overrides.papers || new ArxivSearchClient(config.paperSearch);

  const auth = new MagicLinkService(
    repositories.users,
    repositories.magicLinks,
    overrides.notifier || new EmailNotificationAdapter(config.mail),
    {
      domain: config.server.domain,
      allowedEmailDomain: config.auth.allowedEmailDomain,
      ttlMinutes: config.auth.magicLinkTtlMinutes,
      logUndeliveredLinks: config.general.environment !== 'production'
    },
    overrides.clock
  );

  const chat = new ChatService(
    {
      tasks: repositories.tasks,
      reads: repositories.reads,
      chatHistory: repositories.chatHistory,
      executor: new FunctionExecutor(repositories.tasks, repositories.reads, papers),
      persona: overrides.persona || new PersonaLoader(config.assistant.personaPath),
      llm: overrides.llm !== undefined ? overrides.llm : createLLMClient(config.assistant)
    },
    config.assistant
  );

  return {
    config,
    db,
    repositories,
    auth,
    chat,
    papers,
    calendar: overrides.calendar || new GoogleCalendarSource(config.calendar, undefined, overrides.clock),
    startedAt: overrides.clock ? overrides.clock() : new Date()
  };
}
