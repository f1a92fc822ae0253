export const MAX_PROMPT_INPUT_LENGTH = 1000;

const BLOCKED_PATTERNS = [
  'system:',
  'user:',
  'assistant:',
  'role:',
  'function:',
  '```',
  "'''",
  '<!--',
  '-->',
  '<script>',
  '</script>',
  'javascript:',
  'data:',
  'vbscript:',
  'onload=',
  'onerror=',
];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const BLOCKED_RULES = BLOCKED_PATTERNS.map((pattern) => ({
  regex: new RegExp(escapeRegExp(pattern), 'gi'),
  replacement: `[BLOCKED_${pattern.toUpperCase().replace(/:/g, '')}]`,
}));

/**
 * Neutralises chat role markers and script fragments in text that will be
 * embedded into an LLM prompt, then caps its length.
 */
export function sanitizePromptInput(input: string | null | undefined): string {
  if (!input) {
    return '';
  }

  let sanitized = String(input);
  for (const rule of BLOCKED_RULES) {
    sanitized = sanitized.replace(rule.regex, rule.replacement);
  }

  if (sanitized.length > MAX_PROMPT_INPUT_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_PROMPT_INPUT_LENGTH)}... [TRUNCATED]`;
  }
  return sanitized;
}
