/**
 * Sanitize prompts, outputs and error text before they reach the log.
 */

const TRUNCATE_SUFFIX = "... [truncated]";

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
  [/\b(api[_-]?key|token|password|secret)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s,;&]+)/gi, "$1$2[REDACTED]"],
  [/\bBearer\s+[^\s,;]+/g, "Bearer [REDACTED]"],
];

export function sanitizeForLogging(value: unknown, maxLength: number = 200): string {
  if (value === null || value === undefined) return "";

  let text = typeof value === "string" ? value : safeStringify(value);
  for (const [pattern, replacement] of SENSITIVE_PATTERNS) {
    text = text.replace(pattern, replacement);
  }

  if (text.length > maxLength) {
    return text.slice(0, maxLength) + TRUNCATE_SUFFIX;
  }
  return text;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
