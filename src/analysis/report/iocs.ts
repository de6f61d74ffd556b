import type { IocSets, NormalizedEvent } from "@/analysis/types";
import { HOST_FIELD, IP_FIELD, USER_FIELD, entityValues, evidenceString } from "./evidence";
import type { IncidentCluster } from "./incidents";

/**
 * Collect domains, URLs, IPs and users from every finding's evidence and
 * the events it links to. Each set keeps the first-seen order with exact
 * duplicates removed.
 */
export function extractIocs(
  clusters: readonly IncidentCluster[],
  eventsById: ReadonlyMap<string, NormalizedEvent>,
): IocSets {
  const domains = new Set<string>();
  const urls = new Set<string>();
  const ips = new Set<string>();
  const users = new Set<string>();
  const add = (set: Set<string>, value: string | null) => {
    if (value) set.add(value);
  };

  for (const { incident, findings } of clusters) {
    for (const finding of findings) {
      const { evidence } = finding;
      for (const user of entityValues(evidence, USER_FIELD)) users.add(user);
      for (const ip of entityValues(evidence, IP_FIELD)) ips.add(ip);
      for (const host of entityValues(evidence, HOST_FIELD)) domains.add(host);
      add(urls, evidenceString(evidence, "url"));
    }

    for (const id of incident.evidence_event_ids) {
      const event = eventsById.get(id);
      if (!event) continue;
      add(users, event.userEmail);
      add(ips, event.clientIp);
      add(ips, event.serverIp);
      add(domains, event.destHost);
      add(urls, event.url);
    }
  }

  return { domains: [...domains], urls: [...urls], ips: [...ips], users: [...users] };
}
