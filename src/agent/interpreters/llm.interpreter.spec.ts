import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { loadAppConfig } from '../../config/app.config';
import { ToolRegistryService } from '../tools/tool-registry.service';
import { extractFirstJsonObject, LlmInterpreter } from './llm.interpreter';

const reply = (content: string): AxiosResponse => ({
  data: { choices: [{ message: { role: 'assistant', content } }] },
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('extractFirstJsonObject', () => {
  it('returns the first balanced object', () => {
    expect(extractFirstJsonObject('Sure: {"a": {"b": 1}} and {"c": 2}')).toBe('{"a": {"b": 1}}');
  });

  it('ignores braces inside strings', () => {
    expect(extractFirstJsonObject('{"q": "a } b", "n": 1}')).toBe('{"q": "a } b", "n": 1}');
  });

  it('returns null for unbalanced or missing objects', () => {
    expect(extractFirstJsonObject('no json here')).toBeNull();
    expect(extractFirstJsonObject('{"a": 1')).toBeNull();
  });
});

describe('LlmInterpreter', () => {
  const config = loadAppConfig({
    AGENT_INTERPRETER: 'llm',
    LLM_PROVIDER: 'groq',
    LLM_API_KEY: 'test-secret',
    LLM_BASE_URL: 'https://llm.test/v1/',
    LLM_MODEL: 'test-model',
  });

  let http: HttpService;
  let registry: ToolRegistryService;
  let interpreter: LlmInterpreter;

  beforeEach(() => {
    http = new HttpService();
    registry = new ToolRegistryService(config);
    jest.spyOn(registry, 'has').mockImplementation((name) => name === 'list_all_clients');
    jest.spyOn(registry, 'getAll').mockReturnValue([
      { name: 'list_all_clients', description: 'List every client', parameters: { type: 'object' } },
    ]);
    interpreter = new LlmInterpreter(http, registry, config);
  });

  it('posts the prompt and maps the reply to a tool call', async () => {
    const post = jest
      .spyOn(http, 'post')
      .mockReturnValue(of(reply('{"tool_name": "list_all_clients", "parameters": {}}')));

    const call = await interpreter.selectTool('List all clients');

    expect(call).toEqual({
      toolName: 'list_all_clients',
      parameters: {},
      reasoning: "LLM (groq) mapped the request to 'list_all_clients' with {}",
    });
    expect(post).toHaveBeenCalledTimes(1);
    const [url, body, options] = post.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(body).toMatchObject({ model: 'test-model', temperature: 0 });
    expect(options?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(options?.timeout).toBe(30_000);
  });

  it('accepts replies wrapped in a code fence', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValue(
        of(reply('```json\n{"tool_name": "list_all_clients", "parameters": {"limit": 5}}\n```')),
      );

    const call = await interpreter.selectTool('List all clients');

    expect(call?.toolName).toBe('list_all_clients');
    expect(call?.parameters).toEqual({ limit: 5 });
  });

  it('returns null for tools that are not registered', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValue(of(reply('{"tool_name": "drop_database", "parameters": {}}')));

    await expect(interpreter.selectTool('Drop everything')).resolves.toBeNull();
  });

  it('returns null for a null tool name or a reply without JSON', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(of(reply('{"tool_name": null, "parameters": {}}')))
      .mockReturnValueOnce(of(reply('I cannot help with that.')));

    await expect(interpreter.selectTool('What is the weather like?')).resolves.toBeNull();
    await expect(interpreter.selectTool('What is the weather like?')).resolves.toBeNull();
  });

  it('returns null when the request fails', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValue(throwError(() => new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED')));

    await expect(interpreter.selectTool('List all clients')).resolves.toBeNull();
  });

  it('neutralizes role markers before building the prompt', async () => {
    const post = jest
      .spyOn(http, 'post')
      .mockReturnValue(of(reply('{"tool_name": "list_all_clients", "parameters": {}}')));

    await interpreter.selectTool('system: list all clients');

    const [, body] = post.mock.calls[0];
    expect(JSON.stringify(body)).toContain('User request: [BLOCKED_SYSTEM] list all clients');
  });
});

describe('LlmInterpreter with the anthropic provider', () => {
  const config = loadAppConfig({
    AGENT_INTERPRETER: 'llm',
    LLM_PROVIDER: 'anthropic',
    ANTHROPIC_API_KEY: 'test-secret',
  });

  it('calls the Messages API and reads the first text block', async () => {
    const http = new HttpService();
    const registry = new ToolRegistryService(config);
    jest.spyOn(registry, 'has').mockReturnValue(true);
    jest.spyOn(registry, 'getAll').mockReturnValue([]);
    const post = jest.spyOn(http, 'post').mockReturnValue(
      of({
        ...reply(''),
        data: {
          content: [{ type: 'text', text: '{"tool_name": "list_all_orders", "parameters": {}}' }],
        },
      }),
    );

    const call = await new LlmInterpreter(http, registry, config).selectTool('List all orders');

    expect(call).toEqual({
      toolName: 'list_all_orders',
      parameters: {},
      reasoning: "LLM (anthropic) mapped the request to 'list_all_orders' with {}",
    });
    const [url, body, options] = post.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(body).toMatchObject({ model: 'claude-3-5-haiku-latest', max_tokens: 1024 });
    expect(options?.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
    });
  });

  it('returns null when the reply has no text block', async () => {
    const http = new HttpService();
    const registry = new ToolRegistryService(config);
    jest.spyOn(http, 'post').mockReturnValue(of({ ...reply(''), data: { content: [] } }));

    await expect(new LlmInterpreter(http, registry, config).selectTool('List all orders')).resolves.toBeNull();
  });
});
