import { HttpService } from '@nestjs/axios';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { appConfig } from '../../config/app.config';
import { sanitizePromptInput } from '../../security/prompt-sanitizer';
import { toolSelectionPrompt } from '../agent.prompts';
import { ToolRegistryService } from '../tools/tool-registry.service';
import { ToolCall } from '../tools/tool.type';
import { RequestInterpreter } from './request-interpreter';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the first balanced `{...}` block in `input`, ignoring braces inside strings. */
export function extractFirstJsonObject(input: string): string | null {
  const start = input.indexOf('{');
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let isEscaped = false;

  for (let i = start; i < input.length; i++) {
    const ch = input[i];

    if (isEscaped) {
      isEscaped = false;
      continue;
    }
    if (ch === '\\') {
      isEscaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (!inString) {
      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          return input.slice(start, i + 1);
        }
      }
    }
  }

  return null;
}

const ANTHROPIC_VERSION = '2023-06-01';
const ANTHROPIC_MAX_TOKENS = 1024;

interface CompletionRequest {
  url: string;
  body: Record<string, unknown>;
  headers: Record<string, string>;
}

// OpenAI-compatible chat completion: choices[0].message.content
function chatCompletionContent(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return null;
  }
  const [first] = data.choices;
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  const { content } = first.message;
  return typeof content === 'string' ? content : null;
}

// Anthropic Messages API: content[0].text
function messagesContent(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.content)) {
    return null;
  }
  const [first] = data.content;
  if (!isRecord(first) || typeof first.text !== 'string') {
    return null;
  }
  return first.text;
}

/**
 * Asks the configured LLM provider to pick the tool: an OpenAI-compatible chat
 * completion endpoint (Groq, OpenAI) or the Anthropic Messages API. Any
 * upstream or parsing failure yields `null`.
 */
@Injectable()
export class LlmInterpreter extends RequestInterpreter {
  readonly kind = 'llm';
  private readonly logger = new Logger(LlmInterpreter.name);

  constructor(
    private readonly http: HttpService,
    private readonly registry: ToolRegistryService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {
    super();
  }

  private get baseUrl(): string {
    return this.config.llm.baseUrl.trim().replace(/\/+$/, '');
  }

  private buildRequest(prompt: string): CompletionRequest {
    const { provider, model, apiKey = '' } = this.config.llm;
    const messages = [{ role: 'user', content: prompt }];

    if (provider === 'anthropic') {
      return {
        url: `${this.baseUrl}/messages`,
        body: { model, max_tokens: ANTHROPIC_MAX_TOKENS, temperature: 0, messages },
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
      };
    }
    return {
      url: `${this.baseUrl}/chat/completions`,
      body: { model, messages, temperature: 0 },
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
    };
  }

  async selectTool(text: string): Promise<ToolCall | null> {
    const prompt = toolSelectionPrompt(this.registry.getAll(), sanitizePromptInput(text));
    const { url, body, headers } = this.buildRequest(prompt);

    let content: string | null;
    try {
      const res = await firstValueFrom(
        this.http.post(url, body, { headers, timeout: this.config.llm.timeoutMs }),
      );
      content =
        this.config.llm.provider === 'anthropic'
          ? messagesContent(res.data)
          : chatCompletionContent(res.data);
    } catch (err) {
      this.logger.error(`llm_request_failed | provider=${this.config.llm.provider} | ${this.describeError(err)}`);
      return null;
    }

    if (!content) {
      this.logger.warn('llm_empty_reply');
      return null;
    }
    return this.parseToolCall(content);
  }

  parseToolCall(reply: string): ToolCall | null {
    const cleaned = reply.replace(/```(?:json)?/gi, '').trim();
    const json = extractFirstJsonObject(cleaned);
    if (!json) {
      this.logger.warn(`llm_reply_without_json | reply=${cleaned.slice(0, 200)}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      this.logger.warn(`llm_reply_invalid_json | ${String(err)}`);
      return null;
    }

    if (!isRecord(parsed) || typeof parsed.tool_name !== 'string') {
      return null;
    }
    const toolName = parsed.tool_name.trim();
    if (!this.registry.has(toolName)) {
      this.logger.warn(`llm_unregistered_tool | tool=${toolName}`);
      return null;
    }

    const parameters = isRecord(parsed.parameters) ? parsed.parameters : {};
    return {
      toolName,
      parameters,
      reasoning: `LLM (${this.config.llm.provider}) mapped the request to '${toolName}' with ${JSON.stringify(parameters)}`,
    };
  }

  private describeError(err: unknown): string {
    if (isAxiosError(err)) {
      const status = err.response?.status;
      if (status) {
        return `status=${status}`;
      }
      return `code=${err.code ?? 'unknown'} | ${err.message}`;
    }
    return err instanceof Error ? err.message : String(err);
  }
}
