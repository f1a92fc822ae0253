import { Injectable, Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { AgentErrors } from '../common/errors/agent.errors';
import { DataProtectionService } from '../security/data-protection.service';
import { RequestInterpreter } from './interpreters/request-interpreter';
import { ToolErrorKind, ToolParameters } from './tools/tool.type';
import { ToolService } from './tools/tool.service';

export type HistoryEntryType = 'user_input' | 'agent_response';

export interface HistoryEntry {
  timestamp: string;
  type: HistoryEntryType;
  content: string;
}

export interface AgentNoToolResponse {
  success: false;
  error: string;
  execution_time: number;
}

export interface AgentToolResponse {
  success: boolean;
  tool_used: string;
  parameters: ToolParameters;
  reasoning: string;
  result: unknown;
  error_message: string | null;
  error_kind: ToolErrorKind | null;
  execution_time: number;
}

export type AgentResponse = AgentNoToolResponse | AgentToolResponse;

@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);
  // content is kept encrypted; see recordHistory/getConversationHistory
  private readonly history: HistoryEntry[] = [];

  constructor(
    private readonly interpreter: RequestInterpreter,
    private readonly tools: ToolService,
    private readonly dataProtection: DataProtectionService,
  ) {}

  async processUserRequest(userInput: string): Promise<AgentResponse> {
    const startedAt = performance.now();
    const elapsed = () => (performance.now() - startedAt) / 1000;

    this.logger.log(`agent_request | interpreter=${this.interpreter.kind} | length=${userInput.length}`);
    this.recordHistory('user_input', userInput);

    const call = await this.interpreter.selectTool(userInput);
    if (!call) {
      this.logger.warn('agent_no_tool');
      return {
        success: false,
        error: AgentErrors.NO_TOOL_MATCHED.message,
        execution_time: elapsed(),
      };
    }

    const outcome = await this.tools.execute(call);
    const response: AgentToolResponse = {
      success: outcome.success,
      tool_used: call.toolName,
      parameters: call.parameters,
      reasoning: call.reasoning,
      result: outcome.success ? outcome.result : null,
      error_message: outcome.success ? null : outcome.errorMessage,
      error_kind: outcome.success ? null : outcome.errorKind,
      execution_time: outcome.executionTime,
    };

    this.recordHistory(
      'agent_response',
      JSON.stringify({ tool_used: response.tool_used, success: response.success }),
    );
    this.logger.log(
      `agent_completed | tool=${call.toolName} | success=${response.success} | seconds=${elapsed().toFixed(3)}`,
    );
    return response;
  }

  getConversationHistory(): HistoryEntry[] {
    return this.history.map((entry) => ({
      ...entry,
      content: this.dataProtection.decrypt(entry.content),
    }));
  }

  clearConversationHistory(): void {
    this.history.length = 0;
    this.logger.log('Conversation history cleared');
  }

  private recordHistory(type: HistoryEntryType, content: string) {
    this.history.push({
      timestamp: new Date().toISOString(),
      type,
      content: this.dataProtection.encrypt(content),
    });
  }
}
