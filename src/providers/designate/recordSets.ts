/**
 * Aggregation of endpoint changes into Designate record sets
 *
 * Designate stores one record set per (name, type) holding every target, while
 * external-dns plans changes per endpoint. All changes touching the same name
 * and type are folded into a single entry whose target map records, for each
 * value, whether it should exist once the batch is applied.
 */
import {
  DesignateLabels,
  ORIGINAL_RECORDS_SEPARATOR,
  isManagedRecordType,
  type Changes,
  type Endpoint,
} from '../../types/index.js';
import { canonicalizeDomainName, canonicalizeDomainNames } from './zones.js';

export type ChangeOperation = 'add' | 'remove';

export interface RecordSetEntry {
  /** Canonical FQDN */
  dnsName: string;
  recordType: string;
  /** Empty until known */
  zoneId: string;
  /** Empty until the record set exists */
  recordSetId: string;
  ttl?: number;
  /** target -> wanted */
  names: Map<string, boolean>;
}

export interface IdentityLabels {
  zoneId?: string;
  recordSetId?: string;
}

export function recordSetKey(dnsName: string, recordType: string): string {
  return `${canonicalizeDomainName(dnsName)}/${recordType}`;
}

function configuredTTL(endpoint: Endpoint): number | undefined {
  return endpoint.recordTTL && endpoint.recordTTL > 0 ? endpoint.recordTTL : undefined;
}

/**
 * Zone and record set IDs for an endpoint. Labels the endpoint lacks are taken
 * from the first current endpoint with the same record type and raw DNS name,
 * since the TXT registry may regenerate endpoints without them.
 */
export function resolveIdentityLabels(endpoint: Endpoint, currentEndpoints: readonly Endpoint[]): IdentityLabels {
  const labels: IdentityLabels = {
    zoneId: endpoint.labels[DesignateLabels.ZONE_ID],
    recordSetId: endpoint.labels[DesignateLabels.RECORD_SET_ID],
  };
  if (labels.zoneId !== undefined && labels.recordSetId !== undefined) {
    return labels;
  }

  const existing = currentEndpoints.find(
    (candidate) => candidate.recordType === endpoint.recordType && candidate.dnsName === endpoint.dnsName
  );
  if (!existing) {
    return labels;
  }

  return {
    zoneId: labels.zoneId ?? existing.labels[DesignateLabels.ZONE_ID],
    recordSetId: labels.recordSetId ?? existing.labels[DesignateLabels.RECORD_SET_ID],
  };
}

/**
 * Values of the original-records label
 */
export function parseOriginalRecords(endpoint: Endpoint): string[] {
  const value = endpoint.labels[DesignateLabels.ORIGINAL_RECORDS] ?? '';
  return value.split(ORIGINAL_RECORDS_SEPARATOR).filter((record) => record !== '');
}

/**
 * Folds one endpoint into the aggregation
 */
export function addEndpoint(
  entries: Map<string, RecordSetEntry>,
  endpoint: Endpoint,
  operation: ChangeOperation,
  currentEndpoints: readonly Endpoint[]
): void {
  const key = recordSetKey(endpoint.dnsName, endpoint.recordType);
  const entry: RecordSetEntry = entries.get(key) ?? {
    dnsName: canonicalizeDomainName(endpoint.dnsName),
    recordType: endpoint.recordType,
    zoneId: '',
    recordSetId: '',
    ttl: configuredTTL(endpoint),
    names: new Map<string, boolean>(),
  };

  const identity = resolveIdentityLabels(endpoint, currentEndpoints);
  if (!entry.zoneId) {
    entry.zoneId = identity.zoneId ?? '';
  }
  if (!entry.recordSetId) {
    entry.recordSetId = identity.recordSetId ?? '';
  }

  // Baseline: values present before this batch stay unless removed
  for (const record of parseOriginalRecords(endpoint)) {
    if (!entry.names.has(record)) {
      entry.names.set(record, true);
    }
  }

  const targets = endpoint.recordType === 'CNAME' ? canonicalizeDomainNames(endpoint.targets) : endpoint.targets;
  for (const target of targets) {
    entry.names.set(target, operation === 'add');
  }

  // Additions carry the desired TTL
  const ttl = configuredTTL(endpoint);
  if (operation === 'add' && ttl !== undefined) {
    entry.ttl = ttl;
  }

  entries.set(key, entry);
}

/**
 * Aggregates a change batch into record set entries.
 *
 * Phases run in a fixed order: creates, update-old (removals), update-new
 * (additions), deletes. The planner must pair update-old and update-new
 * endpoints; an unpaired one is resolved by this order alone.
 */
export function foldChanges(changes: Changes, currentEndpoints: readonly Endpoint[]): Map<string, RecordSetEntry> {
  const phases: Array<[Endpoint[], ChangeOperation]> = [
    [changes.create, 'add'],
    [changes.updateOld, 'remove'],
    [changes.updateNew, 'add'],
    [changes.delete, 'remove'],
  ];

  const entries = new Map<string, RecordSetEntry>();
  for (const [endpoints, operation] of phases) {
    for (const endpoint of endpoints) {
      if (!isManagedRecordType(endpoint.recordType)) {
        continue;
      }
      addEndpoint(entries, endpoint, operation, currentEndpoints);
    }
  }
  return entries;
}

/**
 * Targets that should exist after the batch, sorted for stable API calls
 */
export function wantedRecords(entry: RecordSetEntry): string[] {
  const records: string[] = [];
  for (const [record, wanted] of entry.names) {
    if (wanted) {
      records.push(record);
    }
  }
  return records.sort();
}
