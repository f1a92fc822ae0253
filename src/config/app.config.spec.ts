import { join } from 'path';
import { loadAppConfig, parseApiKeys } from './app.config';

describe('loadAppConfig', () => {
  it('falls back to defaults', () => {
    const config = loadAppConfig({});

    expect(config.port).toBe(3000);
    expect(config.interpreter).toBe('pattern');
    expect(config.storage.clientsFile).toBe(join('data', 'clients.json'));
    expect(config.toolSchemaFiles).toEqual([
      'schemas/crm.tools.json',
      'schemas/erp.tools.json',
      'schemas/hr.tools.json',
    ]);
    expect(config.apiKeys.map((policy) => policy.tier)).toEqual(['free', 'premium', 'development']);
  });

  it('reads the data directory and explicit file overrides', () => {
    const config = loadAppConfig({ DATA_DIR: '/srv/data', ERP_DATA_FILE: '/tmp/orders.json' });

    expect(config.storage.employeesFile).toBe(join('/srv/data', 'employees.json'));
    expect(config.storage.ordersFile).toBe('/tmp/orders.json');
  });

  it('requires a key for the llm interpreter', () => {
    expect(() => loadAppConfig({ AGENT_INTERPRETER: 'llm' })).toThrow('LLM_API_KEY');
    expect(
      loadAppConfig({ AGENT_INTERPRETER: 'llm', LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' }).llm,
    ).toMatchObject({ provider: 'openai', apiKey: 'test-secret', baseUrl: 'https://api.openai.com/v1' });
  });

  it('picks the anthropic key and endpoint', () => {
    expect(
      loadAppConfig({ AGENT_INTERPRETER: 'llm', LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' }).llm,
    ).toEqual({
      provider: 'anthropic',
      baseUrl: 'https://api.anthropic.com/v1',
      model: 'claude-3-5-haiku-latest',
      apiKey: 'test-secret',
      timeoutMs: 30_000,
    });
  });

  it('rejects unknown interpreter names', () => {
    expect(() => loadAppConfig({ AGENT_INTERPRETER: 'magic' })).toThrow('AGENT_INTERPRETER');
  });
});

describe('parseApiKeys', () => {
  it('parses key:tier:limit entries with defaults', () => {
    expect(parseApiKeys('alpha:premium:50, beta, gamma:free:oops')).toEqual([
      { key: 'alpha', tier: 'premium', requestsPerHour: 50 },
      { key: 'beta', tier: 'free', requestsPerHour: 100 },
      { key: 'gamma', tier: 'free', requestsPerHour: 100 },
    ]);
  });
});
