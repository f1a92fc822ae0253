import { ToolSchema } from './tools/tool.type';

export function toolSelectionPrompt(tools: ToolSchema[], userInput: string): string {
  const toolList = tools.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n');

  return `
You are an AI agent that maps business requests to exactly one tool call.
Answer ONLY with a single JSON object of the form:
{"tool_name": "<one of the tool names below>", "parameters": {...}}

RULES:
1. No text, explanation or markdown before or after the JSON object.
2. Use only parameter names from the tool's schema. Never invent placeholder ids.
3. Use "filter_clients_by_balance" for balance criteria:
   "over 5000" -> {"min_balance": 5000}, "under 1000" -> {"max_balance": 1000}.
4. Order statuses: pending, processing, shipped, delivered, cancelled.
5. If no tool fits, answer {"tool_name": null, "parameters": {}}.

TOOLS:
${toolList}

User request: ${userInput}
`.trim();
}
