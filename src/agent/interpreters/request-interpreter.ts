import { ToolCall } from '../tools/tool.type';

/**
 * Maps a natural-language request to a single tool call. Resolves to `null`
 * when no tool fits; never rejects.
 */
export abstract class RequestInterpreter {
  abstract readonly kind: string;

  abstract selectTool(text: string): Promise<ToolCall | null>;
}
