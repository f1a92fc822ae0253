import { registerAs } from '@nestjs/config';
import { join } from 'path';

export type InterpreterKind = 'pattern' | 'llm';
export type LlmProvider = 'groq' | 'openai' | 'anthropic';

export interface ApiKeyPolicy {
  key: string;
  tier: string;
  requestsPerHour: number;
}

export interface LlmConfig {
  provider: LlmProvider;
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface StorageConfig {
  clientsFile: string;
  ordersFile: string;
  employeesFile: string;
  departmentsFile: string;
  reviewsFile: string;
}

export interface AppConfig {
  port: number;
  storage: StorageConfig;
  toolSchemaFiles: string[];
  interpreter: InterpreterKind;
  llm: LlmConfig;
  apiKeys: ApiKeyPolicy[];
  encryptionKey: string;
}

type Env = Record<string, string | undefined>;

const LLM_BASE_URLS: Record<LlmProvider, string> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: 'https://api.openai.com/v1',
  anthropic: 'https://api.anthropic.com/v1',
};

const LLM_DEFAULT_MODELS: Record<LlmProvider, string> = {
  groq: 'llama3-70b-8192',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

const LLM_PROVIDER_KEYS: Record<LlmProvider, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const DEFAULT_API_KEYS = 'demo-key-123:free:100,premium-key-456:premium:1000,dev-key-789:development:10000';

const DEFAULT_TOOL_SCHEMAS = [
  'schemas/crm.tools.json',
  'schemas/erp.tools.json',
  'schemas/hr.tools.json',
];

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.trunc(parsed);
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseApiKeys(raw: string): ApiKeyPolicy[] {
  return splitList(raw).map((entry) => {
    const [key, tier, limit] = entry.split(':').map((part) => part.trim());
    if (!key) {
      throw new Error(`Invalid API_KEYS entry: "${entry}"`);
    }
    return {
      key,
      tier: tier || 'free',
      requestsPerHour: positiveInt(limit, 100),
    };
  });
}

function parseInterpreter(raw: string | undefined): InterpreterKind {
  const value = (raw ?? 'pattern').trim().toLowerCase();
  if (value === 'pattern' || value === 'llm') {
    return value;
  }
  throw new Error(`AGENT_INTERPRETER must be "pattern" or "llm", got "${raw}"`);
}

function parseProvider(raw: string | undefined): LlmProvider {
  const value = (raw ?? 'groq').trim().toLowerCase();
  if (value === 'groq' || value === 'openai' || value === 'anthropic') {
    return value;
  }
  throw new Error(`LLM_PROVIDER must be "groq", "openai" or "anthropic", got "${raw}"`);
}

/**
 * Builds the application configuration from environment variables.
 * Read once at startup; throws when the selected interpreter cannot run.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const dataDir = env.DATA_DIR ?? 'data';
  const provider = parseProvider(env.LLM_PROVIDER);
  const providerKey = env[LLM_PROVIDER_KEYS[provider]];
  const interpreter = parseInterpreter(env.AGENT_INTERPRETER);

  const llm: LlmConfig = {
    provider,
    baseUrl: env.LLM_BASE_URL ?? LLM_BASE_URLS[provider],
    model: env.LLM_MODEL ?? LLM_DEFAULT_MODELS[provider],
    apiKey: env.LLM_API_KEY ?? providerKey,
    timeoutMs: positiveInt(env.LLM_TIMEOUT_MS, 30_000),
  };

  if (interpreter === 'llm' && !llm.apiKey) {
    throw new Error(
      `AGENT_INTERPRETER=llm requires LLM_API_KEY (or ${LLM_PROVIDER_KEYS[provider]}) to be set`,
    );
  }

  const schemaFiles = splitList(env.TOOL_SCHEMA_FILES);

  return {
    port: positiveInt(env.PORT, 3000),
    storage: {
      clientsFile: env.CRM_DATA_FILE ?? join(dataDir, 'clients.json'),
      ordersFile: env.ERP_DATA_FILE ?? join(dataDir, 'orders.json'),
      employeesFile: env.HR_EMPLOYEES_FILE ?? join(dataDir, 'employees.json'),
      departmentsFile: env.HR_DEPARTMENTS_FILE ?? join(dataDir, 'departments.json'),
      reviewsFile: env.HR_REVIEWS_FILE ?? join(dataDir, 'reviews.json'),
    },
    toolSchemaFiles: schemaFiles.length > 0 ? schemaFiles : DEFAULT_TOOL_SCHEMAS,
    interpreter,
    llm,
    apiKeys: parseApiKeys(env.API_KEYS ?? DEFAULT_API_KEYS),
    encryptionKey: env.DATA_ENCRYPTION_KEY ?? 'local-development-key',
  };
}

export const appConfig = registerAs('app', () => loadAppConfig());
