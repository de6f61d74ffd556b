import type { Evidence } from "@/analysis/types";
import { UNSET } from "@/lib/constants";

/** Evidence keys that name an affected entity, single- and list-valued. */
export const ENTITY_FIELDS = [
  { prefix: "user", single: "user_email", list: "user_emails" },
  { prefix: "ip", single: "client_ip", list: "client_ips" },
  { prefix: "host", single: "dest_host", list: "dest_hosts" },
  { prefix: "category", single: "threat_category", list: "threat_categories" },
] as const;

export type EntityField = (typeof ENTITY_FIELDS)[number];

export const [USER_FIELD, IP_FIELD, HOST_FIELD, CATEGORY_FIELD] = ENTITY_FIELDS;

function usable(value: unknown): value is string {
  return typeof value === "string" && value !== "" && value !== UNSET;
}

export function evidenceString(evidence: Evidence, key: string): string | null {
  const value = evidence[key];
  return usable(value) ? value : null;
}

export function evidenceList(evidence: Evidence, key: string): string[] {
  const value = evidence[key];
  return Array.isArray(value) ? value.filter(usable) : [];
}

/** Every value an entity field takes in `evidence`, single value first. */
export function entityValues(evidence: Evidence, field: EntityField): string[] {
  const single = evidenceString(evidence, field.single);
  return [...(single ? [single] : []), ...evidenceList(evidence, field.list)];
}

export function linkedEventIds(evidence: Evidence): string[] {
  return evidenceList(evidence, "event_ids");
}
