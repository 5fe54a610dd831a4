/**
 * OpenStack Designate DNS Provider Implementation
 */
import { DNSProvider, type ProviderOptions } from '../base/DNSProvider.js';
import {
  DesignateLabels,
  ORIGINAL_RECORDS_SEPARATOR,
  isManagedRecordType,
  type Changes,
  type DesignateRecordSet,
  type Endpoint,
  type ManagedZones,
} from '../../types/index.js';
import type { DesignateClientInterface } from './DesignateClient.js';
import { RecordListingError, RecordMutationError, ZoneListingError } from './errors.js';
import { foldChanges, wantedRecords, type RecordSetEntry } from './recordSets.js';
import { canonicalizeDomainName, isZoneManaged, matchZone } from './zones.js';

function trimTrailingDot(value: string): string {
  return value.endsWith('.') ? value.slice(0, -1) : value;
}

/**
 * Builds the endpoint for a record set, tagged with its Designate identity
 */
export function recordSetToEndpoint(recordSet: DesignateRecordSet): Endpoint {
  const endpoint: Endpoint = {
    dnsName: trimTrailingDot(recordSet.name),
    recordType: recordSet.type,
    targets: recordSet.records.map(trimTrailingDot),
    labels: {
      [DesignateLabels.RECORD_SET_ID]: recordSet.id,
      [DesignateLabels.ZONE_ID]: recordSet.zone_id,
      [DesignateLabels.ORIGINAL_RECORDS]: recordSet.records.join(ORIGINAL_RECORDS_SEPARATOR),
    },
  };
  if (recordSet.ttl && recordSet.ttl > 0) {
    endpoint.recordTTL = recordSet.ttl;
  }
  return endpoint;
}

export class DesignateProvider extends DNSProvider {
  constructor(
    private readonly client: DesignateClientInterface,
    options: ProviderOptions
  ) {
    super('Designate', options);
  }

  /**
   * Zone ID -> canonical name for active primary zones accepted by the domain filter
   */
  async listManagedZones(signal?: AbortSignal): Promise<ManagedZones> {
    const result: ManagedZones = new Map();

    try {
      await this.client.forEachZone((zone) => {
        if (isZoneManaged(zone, this.domainFilter)) {
          result.set(zone.id, canonicalizeDomainName(zone.name));
        }
      }, signal);
    } catch (error) {
      throw new ZoneListingError(error);
    }

    this.logger.debug({ count: result.size }, 'Managed zones listed');
    return result;
  }

  async records(signal?: AbortSignal): Promise<Endpoint[]> {
    const managedZones = await this.listManagedZones(signal);
    return this.readEndpoints(managedZones, signal);
  }

  async applyChanges(changes: Changes, signal?: AbortSignal): Promise<void> {
    const managedZones = await this.listManagedZones(signal);

    let currentEndpoints: Endpoint[];
    try {
      currentEndpoints = await this.readEndpoints(managedZones, signal);
    } catch (error) {
      this.logger.error({ error }, 'Failed to fetch active records');
      throw error;
    }

    const entries = foldChanges(changes, currentEndpoints);
    this.logger.debug({ count: entries.size }, 'Changes aggregated into record sets');

    let firstError: RecordMutationError | undefined;
    for (const entry of entries.values()) {
      signal?.throwIfAborted();
      try {
        await this.upsertRecordSet(entry, managedZones, signal);
      } catch (error) {
        if (!(error instanceof RecordMutationError)) {
          throw error;
        }
        this.logger.error({ dnsName: entry.dnsName, recordType: entry.recordType }, error.message);
        if (!firstError) {
          firstError = error;
        }
      }
    }

    if (firstError) {
      throw firstError;
    }
  }

  private async readEndpoints(managedZones: ManagedZones, signal?: AbortSignal): Promise<Endpoint[]> {
    const result: Endpoint[] = [];

    for (const zoneId of managedZones.keys()) {
      try {
        await this.client.forEachRecordSet(
          zoneId,
          (recordSet) => {
            if (isManagedRecordType(recordSet.type)) {
              result.push(recordSetToEndpoint(recordSet));
            }
          },
          signal
        );
      } catch (error) {
        throw new RecordListingError(zoneId, error);
      }
    }

    return result;
  }

  /**
   * Creates, updates or deletes the record set for one aggregated entry
   */
  private async upsertRecordSet(
    entry: RecordSetEntry,
    managedZones: ManagedZones,
    signal?: AbortSignal
  ): Promise<void> {
    const zoneId = entry.zoneId || matchZone(entry.dnsName, managedZones);
    if (!zoneId) {
      this.logger.debug(
        { dnsName: entry.dnsName },
        'Skipping record because no hosted zone matching record DNS Name was detected'
      );
      return;
    }

    const records = wantedRecords(entry);
    const context = { dnsName: entry.dnsName, recordType: entry.recordType, records, zoneId };

    if (!entry.recordSetId) {
      if (records.length === 0) {
        return;
      }
      this.logger.info(context, `Creating records: ${entry.dnsName}/${entry.recordType}`);
      if (this.dryRun) {
        return;
      }
      try {
        await this.client.createRecordSet(
          zoneId,
          { name: entry.dnsName, type: entry.recordType, records, ttl: entry.ttl },
          signal
        );
      } catch (error) {
        throw new RecordMutationError('create', entry.dnsName, entry.recordType, error);
      }
      return;
    }

    if (records.length === 0) {
      this.logger.info(context, `Deleting records for ${entry.dnsName}/${entry.recordType}`);
      if (this.dryRun) {
        return;
      }
      try {
        await this.client.deleteRecordSet(zoneId, entry.recordSetId, signal);
      } catch (error) {
        throw new RecordMutationError('delete', entry.dnsName, entry.recordType, error);
      }
      return;
    }

    this.logger.info(context, `Updating records: ${entry.dnsName}/${entry.recordType}`);
    if (this.dryRun) {
      return;
    }
    try {
      await this.client.updateRecordSet(zoneId, entry.recordSetId, { records, ttl: entry.ttl }, signal);
    } catch (error) {
      throw new RecordMutationError('update', entry.dnsName, entry.recordType, error);
    }
  }
}
