/**
 * Line normalization for proxy/web logs.
 *
 * Recognizes two dialects: a brace-delimited JSON object (optionally behind a
 * syslog-style prefix, optionally wrapped in a vendor `{"event": {...}}`
 * envelope) and a `key=value` token stream. Field names are resolved through
 * the alias table in vocabulary.json, so the same extraction serves both.
 *
 * Only a line that cannot be tokenized is a failure. Anything that tokenizes
 * becomes an event, with unparseable fields left null.
 */

import type { EventDraft, EventFields, LogDialect } from "@/analysis/types";
import { ParseError } from "@/lib/errors";
import {
  type FieldValue,
  hostFromUrl,
  normalizeAction,
  normalizeSeverity,
  normalizeThreatCategory,
  parseTimestamp,
  toInt,
  toIp,
  toText,
} from "./fields";
import vocabulary from "./vocabulary.json";

type FieldName = keyof EventFields;
type RawFields = Map<string, FieldValue>;

export type NormalizeResult =
  | { ok: true; event: EventDraft }
  | { ok: false; error: ParseError };

const FIELD_ALIASES: Record<FieldName, readonly string[]> = vocabulary.fieldAliases;

/**
 * Pick the dialect for a single line.
 * JSON when the line opens with a brace, or ends with one behind a prefix
 * that is not itself a key=value stream.
 */
export function detectDialect(line: string): LogDialect {
  const trimmed = line.trim();
  if (trimmed.startsWith("{")) return "json";
  if (trimmed.endsWith("}")) {
    const open = trimmed.indexOf("{");
    if (open > 0 && !trimmed.slice(0, open).includes("=")) return "json";
  }
  return "kv";
}

/**
 * Slice out the first balanced `{...}` object, honoring string literals.
 * Anything after the closing brace other than whitespace is corruption.
 */
function extractJsonObject(line: string, lineNumber: number): string {
  const start = line.indexOf("{");
  if (start < 0) throw new ParseError("No JSON object on line", lineNumber);

  let depth = 0;
  let inString = false;
  for (let i = start; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) {
        if (line.slice(i + 1).trim()) {
          throw new ParseError("Trailing content after JSON object", lineNumber);
        }
        return line.slice(start, i + 1);
      }
    }
  }
  throw new ParseError("Unbalanced braces in JSON object", lineNumber);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested objects into `parent_child` keys. Keys are lower-cased and
 * the first occurrence of a key wins.
 */
function flattenObject(obj: Record<string, unknown>, into: RawFields, prefix = ""): RawFields {
  for (const [key, value] of Object.entries(obj)) {
    const name = (prefix ? `${prefix}_${key}` : key).toLowerCase();
    if (value === null || value === undefined) continue;
    if (isRecord(value)) {
      flattenObject(value, into, name);
    } else if (
      (typeof value === "string" || typeof value === "number" || typeof value === "boolean") &&
      !into.has(name)
    ) {
      into.set(name, value);
    }
  }
  return into;
}

function tokenizeJson(line: string, lineNumber: number): RawFields {
  const text = extractJsonObject(line, lineNumber);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : "invalid JSON";
    throw new ParseError(`Invalid JSON: ${detail}`, lineNumber);
  }
  if (!isRecord(parsed)) throw new ParseError("JSON line is not an object", lineNumber);

  // Zscaler NSS and similar feeds wrap the record: {"sourcetype": ..., "event": {...}}
  const body = isRecord(parsed.event) ? parsed.event : parsed;
  return flattenObject(body, new Map());
}

/**
 * Split a `key=value` stream. Values may be double-quoted with backslash
 * escapes; bare words without `=` are skipped.
 */
function tokenizeKv(line: string, lineNumber: number): RawFields {
  const fields: RawFields = new Map();
  let i = 0;
  const n = line.length;

  while (i < n) {
    while (i < n && /\s/.test(line[i])) i++;
    if (i >= n) break;

    const keyStart = i;
    while (i < n && line[i] !== "=" && !/\s/.test(line[i])) i++;
    if (i >= n || line[i] !== "=" || i === keyStart) {
      // bare word
      while (i < n && !/\s/.test(line[i])) i++;
      continue;
    }
    const key = line.slice(keyStart, i).toLowerCase();
    i++; // '='

    let value = "";
    if (line[i] === '"') {
      i++;
      let closed = false;
      while (i < n) {
        const ch = line[i];
        if (ch === "\\" && i + 1 < n) {
          value += line[i + 1];
          i += 2;
          continue;
        }
        if (ch === '"') {
          closed = true;
          i++;
          break;
        }
        value += ch;
        i++;
      }
      if (!closed) throw new ParseError(`Unterminated quote in value of "${key}"`, lineNumber);
    } else {
      const valueStart = i;
      while (i < n && !/\s/.test(line[i])) i++;
      value = line.slice(valueStart, i);
    }

    if (!fields.has(key)) fields.set(key, value);
  }

  if (fields.size === 0) throw new ParseError("No key=value pairs on line", lineNumber);
  return fields;
}

function pick(fields: RawFields, name: FieldName): FieldValue | undefined {
  for (const alias of FIELD_ALIASES[name]) {
    const value = fields.get(alias);
    if (value !== undefined) return value;
  }
  return undefined;
}

/** Map tokenized fields onto the typed event shape. */
export function extractFields(fields: RawFields): EventFields {
  const url = toText(pick(fields, "url"));
  const host = toText(pick(fields, "destHost"));

  return {
    eventTime: parseTimestamp(pick(fields, "eventTime")),
    eventId: toText(pick(fields, "eventId")),
    vendor: toText(pick(fields, "vendor")),

    action: normalizeAction(pick(fields, "action")),
    reason: toText(pick(fields, "reason")),
    severity: normalizeSeverity(pick(fields, "severity")),
    status: toInt(pick(fields, "status")),

    userEmail: toText(pick(fields, "userEmail")),
    department: toText(pick(fields, "department")),
    location: toText(pick(fields, "location")),

    clientIp: toIp(pick(fields, "clientIp")),
    serverIp: toIp(pick(fields, "serverIp")),
    destHost: host ? host.toLowerCase() : hostFromUrl(url),
    url,
    requestMethod: toText(pick(fields, "requestMethod"))?.toUpperCase() ?? null,

    urlCategory: toText(pick(fields, "urlCategory")),
    threatCategory: normalizeThreatCategory(pick(fields, "threatCategory")),
    threatName: toText(pick(fields, "threatName")),
    riskScore: toInt(pick(fields, "riskScore")),

    requestSize: toInt(pick(fields, "requestSize")),
    responseSize: toInt(pick(fields, "responseSize")),
    transactionSize: toInt(pick(fields, "transactionSize")),
  };
}

/**
 * Normalize one raw line into an event draft.
 * Never throws for malformed input; a line that cannot be tokenized comes
 * back as `{ ok: false }` carrying the ParseError.
 */
export function normalizeLine(line: string, lineNumber: number): NormalizeResult {
  const dialect = detectDialect(line);
  try {
    const fields = dialect === "json" ? tokenizeJson(line, lineNumber) : tokenizeKv(line, lineNumber);
    return {
      ok: true,
      event: { ...extractFields(fields), lineNumber, dialect, raw: line },
    };
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err };
    throw err;
  }
}
