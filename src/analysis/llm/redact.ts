/**
 * Masks credentials in raw log text before it leaves the process.
 * Order matters: the specific patterns run before the generic long-token one.
 */
const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/(Authorization:\s*Bearer\s+)\S+/gi, "$1[REDACTED]"],
  [/eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, "[REDACTED_JWT]"],
  [/(password\s*[=:]\s*)\S+/gi, "$1[REDACTED]"],
  [/\b(api[_-]?key|token|secret)\b\s*[=:]\s*\S+/gi, "$1=[REDACTED]"],
  [/\bAKIA[0-9A-Z]{16}\b/g, "[REDACTED_AWS_KEY]"],
  [/\b[A-Za-z0-9_-]{32,}\b/g, "[REDACTED_TOKEN]"],
];

export function redact(text: string): string {
  return REDACTIONS.reduce((out, [pattern, replacement]) => out.replace(pattern, replacement), text);
}
