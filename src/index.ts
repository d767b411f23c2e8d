export * from './config';
export { bootstrap, loadAppConfig } from './bootstrap';
export type { BootstrapOptions } from './bootstrap';
export { openDatabase, createDatabase } from './db/config/connection';
export type { SqlDatabase } from './db/adapters/database';
export { createRepositories } from './db/repositories';
export type { Repositories } from './db/repositories';
export * from './db/types';
export { MagicLinkService } from './auth/magic-link-service';
export { ChatService } from './assistant/chat-service';
export type { ChatReply } from './assistant/chat-service';
export { FunctionExecutor } from './assistant/tools/function-executor';
export type { ActionResult } from './assistant/tools/function-executor';
export { TOOL_DEFINITIONS } from './assistant/tools/tool-definitions';
export { createLLMClient } from './assistant/ai-engine/client-factory';
export { ArxivSearchClient } from './integrations/arxiv-client';
export { GoogleCalendarSource } from './integrations/calendar-source';
export { createAppContext } from './server/context';
export type { AppContext, ContextOverrides } from './server/context';
export { WebServer, createApp } from './server/web-server';
export { AppError, AppErrorType } from './utils/error-handler';
export { AppLogger, LogLevel } from './utils/logger';
