import { SqlDatabase } from '../../src/db/adapters/database';
import { createRepositories, Repositories } from '../../src/db/repositories';
import { ChatOptions, ChatService } from '../../src/assistant/chat-service';
import { FunctionExecutor } from '../../src/assistant/tools/function-executor';
import { PersonaProvider, defaultPersona } from '../../src/assistant/persona';
import { LLMClient, ToolResult } from '../../src/assistant/ai-engine/interface';
import { AppError } from '../../src/utils/error-handler';
import { createTestDatabase } from '../helpers/database';
import { ScriptedLLM, StubPapers, callTurn, silentLogger, textTurn } from '../helpers/fakes';

const USER = 'ana@fydy.ai';

const OPTIONS: ChatOptions = {
  maxToolRounds: 5,
  historyLimit: 20,
  contextLimit: 20,
  temperature: 0.7,
  maxOutputTokens: 1024
};

const persona: PersonaProvider = { load: async () => defaultPersona() };

function toolResults(input: string | ToolResult[] | undefined): ToolResult[] {
  if (!Array.isArray(input)) {
    throw new Error('Expected tool results');
  }
  return input;
}

describe('ChatService', () => {
  let db: SqlDatabase;
  let repos: Repositories;

  const createService = (llm: LLMClient | null, options: ChatOptions = OPTIONS) =>
    new ChatService(
      {
        tasks: repos.tasks,
        reads: repos.reads,
        chatHistory: repos.chatHistory,
        executor: new FunctionExecutor(repos.tasks, repos.reads, new StubPapers(), silentLogger),
        persona,
        llm
      },
      options,
      silentLogger
    );

  beforeEach(async () => {
    db = await createTestDatabase();
    repos = createRepositories(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should answer plain messages and store both sides', async () => {
    const llm = new ScriptedLLM([textTurn('Morning! Nothing urgent today.')]);

    const reply = await createService(llm).chat(USER, 'Anything urgent?');

    expect(reply).toEqual({ response: 'Morning! Nothing urgent today.', actions: [] });
    expect(llm.sent).toEqual(['Anything urgent?']);
    const history = await repos.chatHistory.findRecent(USER, 10);
    expect(history.map(entry => [entry.role, entry.content])).toEqual([
      ['user', 'Anything urgent?'],
      ['assistant', 'Morning! Nothing urgent today.']
    ]);
  });

  it('should start the session with the prompt, tools and sampling options', async () => {
    await repos.tasks.create({ title: 'Plan offsite', assigned_by: USER });
    const llm = new ScriptedLLM([textTurn('ok')]);

    await createService(llm).chat(USER, 'hi');

    const session = llm.sessions[0];
    expect(session.systemPrompt).toContain('## Current Tasks\n- [#1] [pending] Plan offsite\n');
    expect(session.tools).toHaveLength(10);
    expect(session.temperature).toBe(0.7);
    expect(session.maxTokens).toBe(1024);
  });

  it('should pass earlier messages as history', async () => {
    await repos.chatHistory.append(USER, 'user', 'Add a task to call Sam');
    await repos.chatHistory.append(USER, 'assistant', 'Done.\n[Added task: Call Sam]');
    await repos.chatHistory.append('ben@fydy.ai', 'user', 'not mine');
    const llm = new ScriptedLLM([textTurn('ok')]);

    await createService(llm).chat(USER, 'thanks');

    expect(llm.sessions[0].history).toEqual([
      { role: 'user', content: 'Add a task to call Sam' },
      { role: 'assistant', content: 'Done.\n[Added task: Call Sam]' }
    ]);
  });

  it('should run function calls and send their results back', async () => {
    const llm = new ScriptedLLM([
      callTurn('', ['add_task', { title: 'Review budget' }]),
      textTurn('Added "Review budget".')
    ]);

    const reply = await createService(llm).chat(USER, 'remind me to review the budget');

    expect(reply.response).toBe('Added "Review budget".');
    expect(reply.actions).toMatchObject([{ type: 'added', task: { title: 'Review budget', assigned_by: USER } }]);

    const results = toolResults(llm.sent[1]);
    expect(results).toHaveLength(1);
    expect(results[0].name).toBe('add_task');
    expect(results[0].response).toMatchObject({ type: 'added', task: { title: 'Review budget' } });

    const history = await repos.chatHistory.findRecent(USER, 10);
    expect(history[1].content).toBe('Added "Review budget".\n[Added task: Review budget]');
  });

  it('should keep failed calls out of the actions', async () => {
    const llm = new ScriptedLLM([callTurn('', ['delete_task', { id: 99 }]), textTurn('I could not find #99.')]);

    const reply = await createService(llm).chat(USER, 'delete 99');

    expect(reply).toEqual({ response: 'I could not find #99.', actions: [] });
    expect(toolResults(llm.sent[1])[0].response).toEqual({ type: 'error', message: 'Task #99 not found' });
  });

  it('should use the clarification question as the reply', async () => {
    const llm = new ScriptedLLM([
      callTurn('', ['ask_clarification', { question: 'Which report do you mean?' }]),
      textTurn('')
    ]);

    const reply = await createService(llm).chat(USER, 'finish the report');

    expect(reply).toEqual({ response: 'Which report do you mean?', actions: [{ type: 'clarification' }] });
    expect(toolResults(llm.sent[1])[0].response).toEqual({ status: 'asked' });
    const history = await repos.chatHistory.findRecent(USER, 10);
    expect(history[1].content).toBe('Which report do you mean?');
  });

  it('should keep model text over the clarification question', async () => {
    const llm = new ScriptedLLM([
      callTurn('Quick check: ', ['ask_clarification', { question: 'Which report?' }]),
      textTurn('which report?')
    ]);

    const reply = await createService(llm).chat(USER, 'finish the report');

    expect(reply.response).toBe('Quick check: which report?');
  });

  it('should stop after the configured number of rounds', async () => {
    const llm = new ScriptedLLM([
      callTurn('', ['add_task', { title: 'One' }]),
      callTurn('', ['add_task', { title: 'Two' }]),
      callTurn('Stopping here.', ['add_task', { title: 'Three' }])
    ]);

    const reply = await createService(llm, { ...OPTIONS, maxToolRounds: 2 }).chat(USER, 'add three tasks');

    expect(reply.response).toBe('Stopping here.');
    expect(reply.actions).toHaveLength(2);
    expect((await repos.tasks.findAll()).map(task => task.title)).toEqual(['Two', 'One']);
    expect(llm.sent).toHaveLength(3);
  });

  it('should not store an empty assistant entry', async () => {
    const llm = new ScriptedLLM([textTurn('')]);

    await expect(createService(llm).chat(USER, 'hello?')).resolves.toEqual({ response: '', actions: [] });

    const history = await repos.chatHistory.findRecent(USER, 10);
    expect(history.map(entry => entry.role)).toEqual(['user']);
  });

  it('should reject empty messages', async () => {
    const llm = new ScriptedLLM([]);

    await expect(createService(llm).chat(USER, '')).rejects.toThrow('Message required');
    expect(llm.sessions).toHaveLength(0);
  });

  it('should fail without a configured model', async () => {
    const service = createService(null);

    expect(service.isAvailable()).toBe(false);
    await expect(service.chat(USER, 'hi')).rejects.toBeInstanceOf(AppError);
    await expect(service.chat(USER, 'hi')).rejects.toThrow('Assistant is not configured: no LLM API key');
  });

  it('should not store history when the model fails', async () => {
    const llm = new ScriptedLLM([]);

    await expect(createService(llm).chat(USER, 'hi')).rejects.toThrow('No scripted turn left');
    await expect(repos.chatHistory.findRecent(USER, 10)).resolves.toEqual([]);
  });
});
