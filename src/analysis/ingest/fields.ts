import { z } from "zod/v4";
import vocabulary from "./vocabulary.json";

const ipSchema = z.union([z.ipv4(), z.ipv6()]);

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Values that vendors emit in place of an absent field. */
const EMPTY_MARKERS = new Set(["", "-", "null", "undefined"]);

interface TimestampFormat {
  name: string;
  parse(value: string): Date | null;
}

function validDate(ms: number): Date | null {
  return Number.isFinite(ms) ? new Date(ms) : null;
}

function utcFromParts(
  year: string,
  monthIndex: number | undefined,
  day: string,
  hh: string,
  mm: string,
  ss: string,
  fraction?: string,
): Date | null {
  if (monthIndex === undefined) return null;
  const ms = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;
  const date = new Date(
    Date.UTC(Number(year), monthIndex, Number(day), Number(hh), Number(mm), Number(ss), ms),
  );
  // Date.UTC rolls invalid components over (Feb 30 → Mar 2); reject those
  if (date.getUTCDate() !== Number(day) || date.getUTCMonth() !== monthIndex) return null;
  return date;
}

/**
 * Accepted timestamp formats, tried in order. Zone-less formats are read as UTC.
 */
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    // 2024-03-01T12:00:00Z, 2024-03-01T12:00:00.250+02:00, 2024-03-01T12:00:00+0200
    name: "iso8601",
    parse(value) {
      const m = value.match(
        /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}:?\d{2})?$/i,
      );
      if (!m) return null;
      let zone = m[2] ?? "Z";
      if (/^[+-]\d{4}$/.test(zone)) zone = `${zone.slice(0, 3)}:${zone.slice(3)}`;
      return validDate(Date.parse(m[1] + zone.toUpperCase()));
    },
  },
  {
    // 2024-03-01 12:00:00 or 2024-03-01 12:00:00.050233
    name: "datetime",
    parse(value) {
      const m = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/);
      if (!m) return null;
      return utcFromParts(m[1], Number(m[2]) - 1, m[3], m[4], m[5], m[6], m[7]);
    },
  },
  {
    // 10/Oct/2023:13:55:36 +0000, optionally bracketed
    name: "clf",
    parse(value) {
      const m = value.match(
        /^\[?(\d{2})\/(\w{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})\]?$/,
      );
      if (!m) return null;
      const base = utcFromParts(m[3], MONTHS[m[2].toLowerCase()], m[1], m[4], m[5], m[6]);
      if (!base) return null;
      const offsetMs = (Number(m[8]) * 60 + Number(m[9])) * 60_000;
      return new Date(base.getTime() - (m[7] === "+" ? offsetMs : -offsetMs));
    },
  },
  {
    // Mon Jun 20 15:29:11 2022
    name: "ctime",
    parse(value) {
      const m = value.match(/^\w{3} (\w{3}) +(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/);
      if (!m) return null;
      return utcFromParts(m[6], MONTHS[m[1].toLowerCase()], m[2], m[3], m[4], m[5]);
    },
  },
  {
    name: "epoch-seconds",
    parse(value) {
      return /^\d{9,10}(?:\.\d+)?$/.test(value) ? validDate(Number(value) * 1000) : null;
    },
  },
  {
    name: "epoch-millis",
    parse(value) {
      return /^\d{12,13}$/.test(value) ? validDate(Number(value)) : null;
    },
  },
];

export type FieldValue = string | number | boolean;

/**
 * Parse a timestamp against the accepted formats.
 * Returns null (never throws) when no format matches.
 */
export function parseTimestamp(value: FieldValue | undefined): Date | null {
  if (value === undefined || typeof value === "boolean") return null;
  const text = String(value).trim();
  if (!text) return null;
  for (const format of TIMESTAMP_FORMATS) {
    const parsed = format.parse(text);
    if (parsed) return parsed;
  }
  return null;
}

export function toText(value: FieldValue | undefined): string | null {
  if (value === undefined) return null;
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text.toLowerCase()) ? null : text;
}

export function toInt(value: FieldValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  const text = toText(value);
  if (text === null || !/^-?\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

/** Validated IPv4/IPv6 address, or null. */
export function toIp(value: FieldValue | undefined): string | null {
  const text = toText(value);
  if (text === null) return null;
  const result = ipSchema.safeParse(text);
  return result.success ? result.data : null;
}

export function isIpAddress(value: string): boolean {
  return ipSchema.safeParse(value).success;
}

function mapVocabulary(value: string | null, table: Record<string, string>): string | null {
  if (value === null) return null;
  return table[value.toLowerCase()] ?? value;
}

export function normalizeAction(value: FieldValue | undefined): string | null {
  return mapVocabulary(toText(value), vocabulary.actions);
}

export function normalizeSeverity(value: FieldValue | undefined): string | null {
  return mapVocabulary(toText(value), vocabulary.severities);
}

export function normalizeThreatCategory(value: FieldValue | undefined): string | null {
  const text = toText(value);
  if (text === null || vocabulary.emptyThreatCategories.includes(text.toLowerCase())) {
    return null;
  }
  return mapVocabulary(text, vocabulary.threatCategories);
}

/**
 * Host portion of a URL. Proxy logs frequently omit the scheme
 * ("www.example.com/path"), so a bare URL is retried with one.
 */
/** Absolute forms to try for a logged URL. Path-only URLs carry no host. */
function urlCandidates(url: string): string[] {
  if (url.startsWith("//")) return [`http:${url}`];
  if (/^[/?#]/.test(url)) return [];
  return [url, `http://${url}`];
}

export function hostFromUrl(url: string | null): string | null {
  if (!url) return null;
  for (const candidate of urlCandidates(url)) {
    try {
      const host = new URL(candidate).hostname;
      if (host) return host.toLowerCase();
    } catch {
      // try the next candidate
    }
  }
  return null;
}
