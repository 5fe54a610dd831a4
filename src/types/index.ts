/**
 * Core type definitions for the Designate webhook
 */

// Record types the reconciliation engine reads and writes
export type ManagedRecordType = 'A' | 'TXT' | 'CNAME';

export const MANAGED_RECORD_TYPES: readonly ManagedRecordType[] = ['A', 'TXT', 'CNAME'];

export function isManagedRecordType(type: string): type is ManagedRecordType {
  return MANAGED_RECORD_TYPES.some((managed) => managed === type);
}

/**
 * Identity labels attached to endpoints read from Designate
 */
export const DesignateLabels = {
  /** ID of the record set the endpoint was built from */
  RECORD_SET_ID: 'designate-recordset-id',
  /** ID of the zone owning the record set */
  ZONE_ID: 'designate-record-id',
  /**
   * Record values observed at the last read, joined by NUL. Keeps targets that
   * are not part of a change when a name carries several of them.
   */
  ORIGINAL_RECORDS: 'designate-original-records',
} as const;

export const ORIGINAL_RECORDS_SEPARATOR = '\u0000';

export interface ProviderSpecificProperty {
  name: string;
  value: string;
}

/**
 * A logical DNS fact as exchanged with external-dns
 */
export interface Endpoint {
  dnsName: string;
  targets: string[];
  recordType: string;
  setIdentifier?: string;
  recordTTL?: number;
  labels: Record<string, string>;
  providerSpecific?: ProviderSpecificProperty[];
}

/**
 * Change batch produced by the external-dns planner
 */
export interface Changes {
  create: Endpoint[];
  updateOld: Endpoint[];
  updateNew: Endpoint[];
  delete: Endpoint[];
}

// Designate API shapes

export interface DesignateZone {
  id: string;
  name: string;
  type?: string;
  status: string;
}

export interface DesignateRecordSet {
  id: string;
  zone_id: string;
  name: string;
  type: string;
  records: string[];
  ttl?: number | null;
}

export interface RecordSetCreateInput {
  name: string;
  type: string;
  records: string[];
  ttl?: number;
}

export interface RecordSetUpdateInput {
  records: string[];
  ttl?: number;
}

/** Zone ID -> canonical zone name */
export type ManagedZones = Map<string, string>;
