/**
 * Designate provider exports
 */
export { DesignateProvider, recordSetToEndpoint } from './DesignateProvider.js';
export { DesignateClient, type DesignateClientInterface } from './DesignateClient.js';
export { InstrumentedDesignateClient } from './InstrumentedDesignateClient.js';
export { KeystoneAuth, buildAuthRequest, findDnsEndpoint, toDesignateV2Url } from './KeystoneAuth.js';
export {
  DesignateApiError,
  ZoneListingError,
  RecordListingError,
  RecordMutationError,
  type RecordMutation,
} from './errors.js';
export {
  foldChanges,
  addEndpoint,
  resolveIdentityLabels,
  parseOriginalRecords,
  recordSetKey,
  wantedRecords,
  type RecordSetEntry,
  type ChangeOperation,
  type IdentityLabels,
} from './recordSets.js';
export { canonicalizeDomainName, canonicalizeDomainNames, isInZone, isZoneManaged, matchZone } from './zones.js';
